export { ReconciliationSweeper } from './ReconciliationSweeper';
export type { ISweeper, SweepResult, SweepScope } from './ReconciliationSweeper';
export { ReconciliationScheduler } from './ReconciliationScheduler';
