import { utils, write } from 'xlsx';

type Cell = string | number | null;

export const ACTIVITY_HEADER = ['名字', 'Title', 'PAP', '战略PAP'];
export const BOUNTY_HEADER = ['名字', '纳税(isk)'];
export const MINING_HEADER = ['名字', '主人物', '体积(m3)'];

export interface WorkbookSheets {
  activity?: Cell[][];
  bounty?: Cell[][];
  mining?: Cell[][];
  /** Sheets to leave out entirely */
  omit?: Array<'PAP' | '赏金' | '挖矿'>;
  /** Replace a sheet's header row */
  headers?: Partial<Record<'PAP' | '赏金' | '挖矿', string[]>>;
}

/**
 * Build an xlsx workbook in memory. Rows are data rows; the header is added.
 */
export function buildWorkbook(sheets: WorkbookSheets = {}): Buffer {
  const book = utils.book_new();
  const definitions: Array<['PAP' | '赏金' | '挖矿', string[], Cell[][]]> = [
    ['PAP', ACTIVITY_HEADER, sheets.activity ?? []],
    ['赏金', BOUNTY_HEADER, sheets.bounty ?? []],
    ['挖矿', MINING_HEADER, sheets.mining ?? []],
  ];

  for (const [name, header, rows] of definitions) {
    if (sheets.omit?.includes(name)) {
      continue;
    }
    utils.book_append_sheet(book, utils.aoa_to_sheet([sheets.headers?.[name] ?? header, ...rows]), name);
  }

  const output: unknown = write(book, { type: 'buffer', bookType: 'xlsx' });
  if (!Buffer.isBuffer(output)) {
    throw new Error('xlsx did not produce a buffer');
  }
  return output;
}
