import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { ConfigurationError } from '../../errors.mts';
import {
  formatRunRecord,
  hostsToResume,
  parseRunRecord,
  readRunRecord,
  recordFileName,
  writeRunRecord,
} from './run-record.mts';
import type { RunRecord } from './types.mts';

const record: RunRecord = {
  timestamp: '2026-01-02T03:04:05.000Z',
  ipPrefix: '10.0.1.*',
  desiredDNS: ['10.0.0.1', '10.0.0.2'],
  outcomeLists: {
    Changed: ['host-b'],
    Unchanged: ['host-a', 'host-d'],
    Offline: ['host-c'],
    Error: [],
  },
};

const recordText = [
  '2026-01-02T03:04:05.000Z',
  'LocalIPPrefix:10.0.1.*',
  'NewDNS:10.0.0.1,10.0.0.2',
  '',
  'Changed:',
  'host-b',
  '',
  'Unchanged:',
  'host-a',
  'host-d',
  '',
  'Offline:',
  'host-c',
  '',
].join('\n');

describe('formatRunRecord', () => {
  it('writes the header and the non-empty sections', () => {
    expect(formatRunRecord(record)).toBe(recordText);
  });

  it('writes only the header when every list is empty', () => {
    const text = formatRunRecord({
      ...record,
      outcomeLists: { Changed: [], Unchanged: [], Offline: [], Error: [] },
    });

    expect(text).toBe(
      '2026-01-02T03:04:05.000Z\n' +
        'LocalIPPrefix:10.0.1.*\n' +
        'NewDNS:10.0.0.1,10.0.0.2\n',
    );
  });
});

describe('recordFileName', () => {
  it('stamps the local date and time', () => {
    expect(recordFileName(new Date(2026, 0, 2, 3, 4, 5))).toBe(
      'dns-reconcile-20260102-030405.log',
    );
  });
});

describe('parseRunRecord', () => {
  it('reads back what formatRunRecord wrote', () => {
    expect(parseRunRecord(recordText)).toEqual({
      timestamp: '2026-01-02T03:04:05.000Z',
      ipPrefix: '10.0.1.*',
      desiredDNS: ['10.0.0.1', '10.0.0.2'],
      outcomeLists: record.outcomeLists,
    });
  });

  it('tolerates missing sections and CRLF line endings', () => {
    const text = [
      '2026-01-02T03:04:05.000Z',
      'LocalIPPrefix:10.0.1.*',
      'NewDNS:10.0.0.1, 10.0.0.2',
      '',
      'Error:',
      'host-x',
      'host-y',
    ].join('\r\n');

    const parsed = parseRunRecord(text);

    expect(parsed.desiredDNS).toEqual(['10.0.0.1', '10.0.0.2']);
    expect(parsed.outcomeLists).toEqual({
      Changed: [],
      Unchanged: [],
      Offline: [],
      Error: ['host-x', 'host-y'],
    });
  });

  it('stops a section at the next header even without a blank line', () => {
    const text = [
      'LocalIPPrefix:10.0.1.*',
      'NewDNS:10.0.0.1',
      'Offline:',
      'host-c',
      'Changed:',
      'host-b',
      'Error:',
      'host-e',
    ].join('\n');

    const parsed = parseRunRecord(text);

    expect(parsed.timestamp).toBeUndefined();
    expect(parsed.outcomeLists.Offline).toEqual(['host-c']);
    expect(parsed.outcomeLists.Changed).toEqual(['host-b']);
    expect(parsed.outcomeLists.Error).toEqual(['host-e']);
  });

  it('rejects a record without LocalIPPrefix', () => {
    expect(() =>
      parseRunRecord('2026-01-02\nNewDNS:10.0.0.1\n', 'old.log'),
    ).toThrow(new ConfigurationError('old.log has no LocalIPPrefix: header'));
  });

  it('rejects a record with an empty NewDNS', () => {
    expect(() =>
      parseRunRecord('LocalIPPrefix:10.0.1.*\nNewDNS:\n', 'old.log'),
    ).toThrow('old.log has no NewDNS: header');
  });
});

describe('hostsToResume', () => {
  it('returns Offline hosts then Error hosts', () => {
    expect(
      hostsToResume({
        outcomeLists: {
          Changed: ['b'],
          Unchanged: ['a'],
          Offline: ['c1', 'c2'],
          Error: ['e1'],
        },
      }),
    ).toEqual(['c1', 'c2', 'e1']);
  });
});

describe('record files', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'run-record-test-'));
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('writes the record under its timestamped name', async () => {
    const filePath = await writeRunRecord(
      tempDir,
      record,
      new Date(2026, 0, 2, 3, 4, 5),
    );

    expect(filePath).toBe(join(tempDir, 'dns-reconcile-20260102-030405.log'));
    expect(readFileSync(filePath, 'utf8')).toBe(recordText);
  });

  it('reads a record from disk', async () => {
    const filePath = join(tempDir, 'previous.log');
    writeFileSync(filePath, recordText);

    const parsed = await readRunRecord(filePath);

    expect(parsed.ipPrefix).toBe('10.0.1.*');
    expect(parsed.outcomeLists.Offline).toEqual(['host-c']);
  });

  it('fails with a configuration error when the file is missing', async () => {
    await expect(
      readRunRecord(join(tempDir, 'missing.log')),
    ).rejects.toBeInstanceOf(ConfigurationError);
  });
});
