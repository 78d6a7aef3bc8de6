import { read, utils, type WorkBook, type WorkSheet } from 'xlsx';
import {
  ActivityColumns,
  ActivityRow,
  BountyColumns,
  BountyRow,
  MiningColumns,
  MiningRow,
  ParsedWorkbook,
  SHEET_DEFINITIONS,
  SheetDefinition,
} from '../../domain/upload/sheets';
import { createLogger } from '../../lib/logger';
import { Executor } from '../../infrastructure/persistence/client';
import { createRepositories } from '../../infrastructure/repositories';
import { SheetKind } from '../../shared/enums';
import { UploadError, ValidationIssue } from '../../shared/errors';
import { cellNumber, cellText } from '../../shared/utilities/cells';
import { IdentityResolver } from '../identity/IdentityResolver';

const logger = createLogger('spreadsheet-ingestor');

type Cell = string | number | boolean | Date | null;

/**
 * A sheet's data rows keyed by header
 */
interface SheetTable {
  definition: SheetDefinition;
  headers: (string | null)[];
  rows: Cell[][];
}

function readWorkbook(buffer: Buffer): WorkBook {
  try {
    return read(buffer, { type: 'buffer', cellDates: true });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new UploadError('validation', `Unreadable workbook: ${message}`, [
      { field: 'workbook', constraint: 'format', message: 'file is not a readable Excel workbook' },
    ]);
  }
}

function readTable(definition: SheetDefinition, sheet: WorkSheet): SheetTable {
  const [header = [], ...rows] = utils.sheet_to_json<Cell[]>(sheet, {
    header: 1,
    defval: null,
    raw: true,
    blankrows: true,
  });
  return { definition, headers: header.map(cellText), rows };
}

function columnIndex(table: SheetTable, column: string): number {
  return table.headers.indexOf(column);
}

function cellAt(table: SheetTable, row: Cell[], column: string): Cell {
  return row[columnIndex(table, column)] ?? null;
}

function numberAt(table: SheetTable, row: Cell[], rowIndex: number, column: string): number {
  const value = cellNumber(cellAt(table, row, column));
  if (value === null) {
    return 0;
  }
  if (Number.isNaN(value)) {
    // Header is row 1, so data row i sits on spreadsheet row i + 2
    const rowNumber = rowIndex + 2;
    const raw = String(cellAt(table, row, column));
    throw new UploadError(
      'validation',
      `${table.definition.label} sheet row ${rowNumber}: '${raw}' in column ${column} is not a number`,
      [{ field: `${table.definition.sheetName}.${column}`, value: raw, constraint: 'number', message: 'must be a number' }]
    );
  }
  return value;
}

function isIncomplete(table: SheetTable, row: Cell[]): boolean {
  return table.definition.mandatoryColumns.some(column => cellText(cellAt(table, row, column)) === null);
}

/**
 * Reads the monthly workbook and writes its rows as records
 */
export class SpreadsheetIngestor {
  /**
   * Validate and normalise a workbook. Nothing is written.
   */
  parse(buffer: Buffer): ParsedWorkbook {
    const workbook = readWorkbook(buffer);

    const missingSheets = SHEET_DEFINITIONS.filter(definition => !workbook.Sheets[definition.sheetName]).map(
      definition => definition.sheetName
    );
    if (missingSheets.length > 0) {
      throw new UploadError(
        'validation',
        `Missing required sheets: ${missingSheets.join(', ')}`,
        missingSheets.map<ValidationIssue>(sheet => ({ field: sheet, constraint: 'required', message: 'sheet is missing' }))
      );
    }

    const tables = new Map<SheetKind, SheetTable>();
    for (const definition of SHEET_DEFINITIONS) {
      const table = readTable(definition, workbook.Sheets[definition.sheetName]);
      this.validateColumns(table);
      tables.set(definition.kind, table);
    }

    const parsed: ParsedWorkbook = {
      activity: this.parseActivity(tables.get(SheetKind.ACTIVITY)),
      bounty: this.parseBounty(tables.get(SheetKind.BOUNTY)),
      mining: this.parseMining(tables.get(SheetKind.MINING)),
    };

    logger.debug(
      { activity: parsed.activity.length, bounty: parsed.bounty.length, mining: parsed.mining.length },
      'Parsed workbook'
    );
    return parsed;
  }

  /**
   * Write one sheet's rows in a single transaction
   * @returns Number of records written
   */
  importSheet(db: Executor, kind: SheetKind, uploadId: number, workbook: ParsedWorkbook): number {
    return db.transaction(tx => {
      const repositories = createRepositories(tx);
      const resolver = new IdentityResolver(repositories.characters, repositories.players);

      switch (kind) {
        case SheetKind.ACTIVITY:
          for (const row of workbook.activity) {
            const character = resolver.resolve(row.name, row.title);
            repositories.records.insertActivity({
              uploadId,
              characterId: character.id,
              rawName: row.name,
              rawTitle: row.title,
              points: row.points,
              strategicPoints: row.strategicPoints,
            });
          }
          return workbook.activity.length;

        case SheetKind.BOUNTY:
          for (const row of workbook.bounty) {
            const character = resolver.resolve(row.name);
            repositories.records.insertBounty({ uploadId, characterId: character.id, rawName: row.name, taxIsk: row.taxIsk });
          }
          return workbook.bounty.length;

        case SheetKind.MINING:
          for (const row of workbook.mining) {
            const character = resolver.resolveWithMainCharacter(row.name, row.mainCharacter);
            repositories.records.insertMining({
              uploadId,
              characterId: character.id,
              rawName: row.name,
              volumeM3: row.volumeM3,
            });
          }
          return workbook.mining.length;

        default:
          throw new Error(`Unknown sheet kind: ${String(kind)}`);
      }
    });
  }

  private validateColumns(table: SheetTable): void {
    // A sheet without data rows imports nothing, whatever its header says
    if (table.rows.length === 0) {
      return;
    }

    const missing = table.definition.requiredColumns.filter(column => columnIndex(table, column) < 0);
    if (missing.length > 0) {
      throw new UploadError(
        'validation',
        `${table.definition.label} sheet missing columns: ${missing.join(', ')}`,
        missing.map<ValidationIssue>(column => ({
          field: `${table.definition.sheetName}.${column}`,
          constraint: 'required',
          message: 'column is missing',
        }))
      );
    }
  }

  private parseActivity(table: SheetTable | undefined): ActivityRow[] {
    if (!table) return [];
    const rows: ActivityRow[] = [];
    table.rows.forEach((row, index) => {
      if (isIncomplete(table, row)) return;
      rows.push({
        name: this.requiredText(table, row, ActivityColumns.NAME),
        title: this.requiredText(table, row, ActivityColumns.TITLE),
        points: numberAt(table, row, index, ActivityColumns.POINTS),
        strategicPoints: numberAt(table, row, index, ActivityColumns.STRATEGIC_POINTS),
      });
    });
    return rows;
  }

  private parseBounty(table: SheetTable | undefined): BountyRow[] {
    if (!table) return [];
    const rows: BountyRow[] = [];
    table.rows.forEach((row, index) => {
      if (isIncomplete(table, row)) return;
      rows.push({
        name: this.requiredText(table, row, BountyColumns.NAME),
        taxIsk: numberAt(table, row, index, BountyColumns.TAX),
      });
    });
    return rows;
  }

  private parseMining(table: SheetTable | undefined): MiningRow[] {
    if (!table) return [];
    const rows: MiningRow[] = [];
    table.rows.forEach((row, index) => {
      if (isIncomplete(table, row)) return;
      rows.push({
        name: this.requiredText(table, row, MiningColumns.NAME),
        mainCharacter: cellText(cellAt(table, row, MiningColumns.MAIN_CHARACTER)),
        volumeM3: numberAt(table, row, index, MiningColumns.VOLUME),
      });
    });
    return rows;
  }

  private requiredText(table: SheetTable, row: Cell[], column: string): string {
    return cellText(cellAt(table, row, column)) ?? '';
  }
}
