import { parse as parseCsv, CsvError } from 'csv-parse';
import { ParseError } from '../errors';
import {
  ParseResult,
  SANCTION_RECORD_FIELDS,
  SanctionRecord,
  SanctionRecordField,
  SkipReason
} from '../types/sdn.types';
import { createLogger } from '../utils/logger';

const log = createLogger('sdn-parser');

export interface ParserOptions {
  /** Fraction of data rows that may be skipped before the parse fails */
  maxSkipRatio: number;
}

export interface DatasetParser {
  parse(raw: Buffer | string): Promise<ParseResult>;
}

type ColumnIndex = Record<SanctionRecordField, number>;

/**
 * Parses the "targets.simple" CSV export into sanction records.
 *
 * The header must name every column of SanctionRecord; other columns are
 * ignored. Rows lacking an id, a name or a dataset tag are dropped and
 * counted, as are repeated ids.
 */
export class SdnCsvParser implements DatasetParser {
  constructor(private readonly options: ParserOptions) {}

  async parse(raw: Buffer | string): Promise<ParseResult> {
    const text = typeof raw === 'string' ? raw : raw.toString('utf8');
    const rows = await readRows(text);

    const header = rows[0];
    if (!header) {
      throw new ParseError('Dataset is empty');
    }

    const columns = resolveColumns(header);
    const dataRows = rows.slice(1);

    if (dataRows.length === 0) {
      throw new ParseError('Dataset has a header but no data rows');
    }

    const records: SanctionRecord[] = [];
    const seenIds = new Set<string>();
    const skipReasons: Record<SkipReason, number> = {
      missing_id: 0,
      missing_name: 0,
      missing_dataset: 0,
      duplicate_id: 0
    };

    for (const row of dataRows) {
      const record = toRecord(row, columns);
      const reason = skipReasonFor(record, seenIds);
      if (reason) {
        skipReasons[reason]++;
        continue;
      }
      seenIds.add(record.id);
      records.push(record);
    }

    const skippedRows = dataRows.length - records.length;
    const skipRatio = skippedRows / dataRows.length;

    if (skipRatio > this.options.maxSkipRatio) {
      throw new ParseError(
        `Skipped ${skippedRows} of ${dataRows.length} rows, above the allowed ratio of ${this.options.maxSkipRatio}`
      );
    }

    if (skippedRows > 0) {
      log.warn({ skippedRows, totalRows: dataRows.length, skipReasons }, 'Skipped malformed SDN rows');
    }

    return {
      records,
      totalRows: dataRows.length,
      skippedRows,
      skipReasons
    };
  }
}

// =============================================================================
// HELPERS
// =============================================================================

function readRows(text: string): Promise<string[][]> {
  return new Promise((resolve, reject) => {
    parseCsv(text, {
      bom: true,
      skip_empty_lines: true,
      relax_column_count: true,
      trim: true
    }, (error: CsvError | undefined, output: unknown) => {
      if (error) {
        reject(new ParseError(`Malformed CSV: ${error.message}`, {
          line: lineOf(error),
          cause: error
        }));
        return;
      }
      if (!isRowList(output)) {
        reject(new ParseError('CSV reader returned an unexpected shape'));
        return;
      }
      resolve(output);
    });
  });
}

function isRowList(value: unknown): value is string[][] {
  return Array.isArray(value) && value.every(row =>
    Array.isArray(row) && row.every(cell => typeof cell === 'string'));
}

function lineOf(error: CsvError): number | undefined {
  const lines: unknown = Reflect.get(error, 'lines');
  return typeof lines === 'number' ? lines : undefined;
}

function resolveColumns(header: string[]): ColumnIndex {
  const normalized = header.map(name => name.trim().toLowerCase());
  const missing = SANCTION_RECORD_FIELDS.filter(field => !normalized.includes(field));

  if (missing.length > 0) {
    throw new ParseError(`Header is missing required columns: ${missing.join(', ')}`, { line: 1 });
  }

  const at = (field: SanctionRecordField): number => normalized.indexOf(field);
  return {
    id: at('id'),
    name: at('name'),
    birth_date: at('birth_date'),
    countries: at('countries'),
    addresses: at('addresses'),
    sanctions: at('sanctions'),
    dataset: at('dataset')
  };
}

function toRecord(row: string[], columns: ColumnIndex): SanctionRecord {
  const cell = (field: SanctionRecordField): string => (row[columns[field]] ?? '').trim();

  return {
    id: cell('id'),
    name: cell('name'),
    birth_date: cell('birth_date'),
    countries: cell('countries'),
    addresses: cell('addresses'),
    sanctions: cell('sanctions'),
    dataset: cell('dataset')
  };
}

function skipReasonFor(record: SanctionRecord, seenIds: Set<string>): SkipReason | null {
  if (!record.id) return 'missing_id';
  if (!record.name) return 'missing_name';
  if (!record.dataset) return 'missing_dataset';
  if (seenIds.has(record.id)) return 'duplicate_id';
  return null;
}
