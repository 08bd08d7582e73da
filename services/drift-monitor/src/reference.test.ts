import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import pino from 'pino';
import type { FeatureSpec } from '@vigil/schemas';
import { ReferenceDataError } from './errors';
import { CsvReferenceSource, parseCell, parseReferenceCsv, StaticReferenceSource } from './reference';

const features: FeatureSpec[] = [
  { name: 'feature_1', kind: 'numeric' },
  { name: 'feature_2', kind: 'numeric' },
];
const quiet = pino({ level: 'silent' });

describe('parseCell', () => {
  it('reads numbers and maps blanks and junk to null', () => {
    expect(parseCell('1.25')).toBe(1.25);
    expect(parseCell(' -3 ')).toBe(-3);
    expect(parseCell('')).toBeNull();
    expect(parseCell('NaN')).toBeNull();
    expect(parseCell('n/a')).toBeNull();
    expect(parseCell(undefined)).toBeNull();
  });
});

describe('parseReferenceCsv', () => {
  it('projects rows onto the declared features', () => {
    const text = 'feature_1,feature_2,extra,target\n1.5,3,9,1\n2,,8,0\n';
    const { rows, columns } = parseReferenceCsv(text, features);
    expect(columns).toEqual(['feature_1', 'feature_2', 'extra', 'target']);
    expect(rows).toEqual([
      { features: { feature_1: 1.5, feature_2: 3 }, prediction: null, target: 1 },
      { features: { feature_1: 2, feature_2: null }, prediction: null, target: 0 },
    ]);
  });

  it('reads a declared column absent from the header as missing', () => {
    const { rows } = parseReferenceCsv('feature_1\n4\n', features);
    expect(rows).toEqual([{ features: { feature_1: 4, feature_2: null }, prediction: null, target: null }]);
  });
});

describe('CsvReferenceSource', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'vigil-ref-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('loads a reference file', async () => {
    const file = path.join(dir, 'reference_data.csv');
    await fs.writeFile(file, 'feature_1,feature_2,target\n0.5,1.5,0\n7,12,1\n');
    const rows = await new CsvReferenceSource(file, quiet).load(features);
    expect(rows).toHaveLength(2);
    expect(rows[1].features).toEqual({ feature_1: 7, feature_2: 12 });
  });

  it('fails with reference_missing when the file does not exist', async () => {
    const source = new CsvReferenceSource(path.join(dir, 'absent.csv'), quiet);
    await expect(source.load(features)).rejects.toBeInstanceOf(ReferenceDataError);
    await expect(source.load(features)).rejects.toMatchObject({ code: 'reference_missing' });
  });

  it('fails with reference_empty for a header-only file', async () => {
    const file = path.join(dir, 'empty.csv');
    await fs.writeFile(file, 'feature_1,feature_2\n');
    await expect(new CsvReferenceSource(file, quiet).load(features)).rejects.toMatchObject({ code: 'reference_empty' });
  });

  it('fails with reference_unreadable for ragged rows', async () => {
    const file = path.join(dir, 'ragged.csv');
    await fs.writeFile(file, 'feature_1,feature_2\n1,2,3\n');
    await expect(new CsvReferenceSource(file, quiet).load(features)).rejects.toMatchObject({
      code: 'reference_unreadable',
    });
  });

  it('fails with reference_unreadable when the path is a directory', async () => {
    await expect(new CsvReferenceSource(dir, quiet).load(features)).rejects.toMatchObject({
      code: 'reference_unreadable',
    });
  });
});

describe('StaticReferenceSource', () => {
  it('returns its rows and refuses to be empty', async () => {
    const rows = [{ features: { feature_1: 1 } }];
    await expect(new StaticReferenceSource(rows).load()).resolves.toBe(rows);
    await expect(new StaticReferenceSource([]).load()).rejects.toMatchObject({ code: 'reference_empty' });
  });
});
