import fs from 'fs/promises';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import type { FeatureSpec, FeatureValues, ReferenceRow } from '@vigil/schemas';
import { ReferenceDataError, toError } from './errors';
import { log, type Logger } from './logger';

export interface ReferenceSource {
  readonly location: string;
  load(features: readonly FeatureSpec[]): Promise<ReferenceRow[]>;
}

const CsvRows = z.array(z.record(z.string()));

export function parseCell(cell: string | undefined): number | null {
  if (cell === undefined) return null;
  const trimmed = cell.trim();
  if (trimmed === '') return null;
  const n = Number(trimmed);
  return Number.isFinite(n) ? n : null;
}

export type ParsedReference = { rows: ReferenceRow[]; columns: string[] };

/**
 * Projects CSV text onto the declared features. Columns outside the declared
 * list are dropped; a declared column missing from the header reads as
 * missing values on every row.
 */
export function parseReferenceCsv(text: string, features: readonly FeatureSpec[]): ParsedReference {
  let columns: string[] = [];
  const records = CsvRows.parse(
    parse(text, {
      columns: (header: string[]) => (columns = header),
      skip_empty_lines: true,
      trim: true,
      bom: true,
    }),
  );
  const rows = records.map((record) => {
    const values: FeatureValues = {};
    for (const { name } of features) values[name] = parseCell(record[name]);
    return {
      features: values,
      prediction: parseCell(record.prediction),
      target: parseCell(record.target),
    };
  });
  return { rows, columns };
}

export class CsvReferenceSource implements ReferenceSource {
  private readonly logger: Logger;

  constructor(readonly location: string, logger: Logger = log) {
    this.logger = logger.child({ component: 'reference' });
  }

  async load(features: readonly FeatureSpec[]): Promise<ReferenceRow[]> {
    let text: string;
    try {
      text = await fs.readFile(this.location, 'utf8');
    } catch (err) {
      if (typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT') {
        throw new ReferenceDataError('reference_missing', `Reference data not found at ${this.location}`, { cause: err });
      }
      throw new ReferenceDataError('reference_unreadable', `Reference data at ${this.location} could not be read`, {
        cause: err,
      });
    }

    let parsed: ParsedReference;
    try {
      parsed = parseReferenceCsv(text, features);
    } catch (err) {
      throw new ReferenceDataError('reference_unreadable', `Reference data at ${this.location} is not valid CSV: ${toError(err).message}`, {
        cause: err,
      });
    }
    const { rows, columns } = parsed;
    if (rows.length === 0) {
      throw new ReferenceDataError('reference_empty', `Reference data at ${this.location} has no rows`);
    }

    const absent = features.filter((f) => !columns.includes(f.name));
    if (absent.length > 0) {
      this.logger.warn({ features: absent.map((f) => f.name) }, 'declared features absent from reference data');
    }
    this.logger.info({ rows: rows.length, location: this.location }, 'reference data loaded');
    return rows;
  }
}

/** Fixed rows, for callers that already hold the baseline in memory. */
export class StaticReferenceSource implements ReferenceSource {
  readonly location = 'memory';

  constructor(private readonly rows: ReferenceRow[]) {}

  async load(): Promise<ReferenceRow[]> {
    if (this.rows.length === 0) throw new ReferenceDataError('reference_empty', 'Reference data has no rows');
    return this.rows;
  }
}
