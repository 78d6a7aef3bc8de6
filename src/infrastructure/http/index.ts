export type { CharacterDetails, IESIClient } from './ESIClient';
export { UnifiedESIClient } from './UnifiedESIClient';
export type { ESIClientConfig } from './UnifiedESIClient';
