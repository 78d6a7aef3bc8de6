import { SheetKind } from '../../shared/enums';

export interface SheetDefinition {
  readonly kind: SheetKind;
  /** Sheet name inside the workbook */
  readonly sheetName: string;
  /** Name used in error messages */
  readonly label: string;
  readonly requiredColumns: readonly string[];
  /** A row is skipped when any of these cells is blank; other blank numbers count as zero */
  readonly mandatoryColumns: readonly string[];
}

export const ActivityColumns = {
  NAME: '名字',
  TITLE: 'Title',
  POINTS: 'PAP',
  STRATEGIC_POINTS: '战略PAP',
} as const;

export const BountyColumns = {
  NAME: '名字',
  TAX: '纳税(isk)',
} as const;

export const MiningColumns = {
  NAME: '名字',
  MAIN_CHARACTER: '主人物',
  VOLUME: '体积(m3)',
} as const;

export const SHEET_DEFINITIONS: readonly SheetDefinition[] = [
  {
    kind: SheetKind.ACTIVITY,
    sheetName: 'PAP',
    label: 'PAP',
    requiredColumns: Object.values(ActivityColumns),
    mandatoryColumns: [ActivityColumns.NAME, ActivityColumns.TITLE],
  },
  {
    kind: SheetKind.BOUNTY,
    sheetName: '赏金',
    label: 'Bounty',
    requiredColumns: Object.values(BountyColumns),
    mandatoryColumns: [BountyColumns.NAME, BountyColumns.TAX],
  },
  {
    kind: SheetKind.MINING,
    sheetName: '挖矿',
    label: 'Mining',
    requiredColumns: Object.values(MiningColumns),
    mandatoryColumns: [MiningColumns.NAME, MiningColumns.VOLUME],
  },
];

/** Normalised rows, in file order */
export interface ActivityRow {
  name: string;
  title: string;
  points: number;
  strategicPoints: number;
}

export interface BountyRow {
  name: string;
  taxIsk: number;
}

export interface MiningRow {
  name: string;
  mainCharacter: string | null;
  volumeM3: number;
}

export interface ParsedWorkbook {
  activity: ActivityRow[];
  bounty: BountyRow[];
  mining: MiningRow[];
}

export type SheetCounts = Record<`${SheetKind}`, number>;
