import { constants } from 'node:fs';
import { access, readFile, stat, writeFile } from 'node:fs/promises';
import path from 'node:path';

import { ConfigurationError, describeError } from '../../errors.mts';
import type { HostIdentifier, OutcomeLists, RunRecord } from './types.mts';
import type { Outcome } from './util.ts';
import { isOutcome, OUTCOME, OUTCOME_ORDER } from './util.ts';

const PREFIX_KEY = 'LocalIPPrefix:';
const DNS_KEY = 'NewDNS:';

export function formatRunRecord(record: RunRecord) {
  const blocks = [
    [
      record.timestamp,
      `${PREFIX_KEY}${record.ipPrefix}`,
      `${DNS_KEY}${record.desiredDNS.join(',')}`,
    ].join('\n'),
  ];

  for (const outcome of OUTCOME_ORDER) {
    const hosts = record.outcomeLists[outcome];
    if (hosts.length > 0) {
      blocks.push([`${outcome}:`, ...hosts].join('\n'));
    }
  }

  return `${blocks.join('\n\n')}\n`;
}

export function recordFileName(date: Date) {
  const pad = (value: number) => value.toString().padStart(2, '0');
  const day = [
    date.getFullYear().toString(),
    pad(date.getMonth() + 1),
    pad(date.getDate()),
  ].join('');
  const time = [
    pad(date.getHours()),
    pad(date.getMinutes()),
    pad(date.getSeconds()),
  ].join('');
  return `dns-reconcile-${day}-${time}.log`;
}

// The record is the only resume input, so an unusable directory is fatal.
export async function ensureRecordDir(directory: string) {
  try {
    const info = await stat(directory);
    if (!info.isDirectory()) {
      throw new Error('not a directory');
    }
    await access(directory, constants.W_OK);
  } catch (error) {
    throw new ConfigurationError(
      `Run record directory ${directory} is not writable: ` +
        describeError(error),
      { cause: error },
    );
  }
}

export async function writeRunRecord(
  directory: string,
  record: RunRecord,
  date: Date,
) {
  const filePath = path.join(directory, recordFileName(date));
  await writeFile(filePath, formatRunRecord(record), 'utf8');
  return filePath;
}

export interface ParsedRunRecord {
  timestamp?: string;
  ipPrefix: string;
  desiredDNS: string[];
  outcomeLists: OutcomeLists;
}

function sectionHeader(line: string): Outcome | undefined {
  if (!line.endsWith(':')) {
    return undefined;
  }
  const name = line.slice(0, -1);
  return isOutcome(name) ? name : undefined;
}

/**
 * Reads a run record back. Section bodies run until the next section header
 * or the end of the text; any section may be missing.
 */
export function parseRunRecord(
  text: string,
  source = 'run record',
): ParsedRunRecord {
  type State = { kind: 'header' } | { kind: 'section'; outcome: Outcome };

  let state: State = { kind: 'header' };
  let timestamp: string | undefined;
  let ipPrefix: string | undefined;
  let desiredDNS: string[] | undefined;
  const outcomeLists: OutcomeLists = {
    [OUTCOME.CHANGED]: [],
    [OUTCOME.UNCHANGED]: [],
    [OUTCOME.OFFLINE]: [],
    [OUTCOME.ERROR]: [],
  };

  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (line === '') {
      continue;
    }

    const outcome = sectionHeader(line);
    if (outcome) {
      state = { kind: 'section', outcome };
      continue;
    }

    switch (state.kind) {
      case 'header':
        if (line.startsWith(PREFIX_KEY)) {
          ipPrefix = line.slice(PREFIX_KEY.length).trim();
        } else if (line.startsWith(DNS_KEY)) {
          desiredDNS = line
            .slice(DNS_KEY.length)
            .split(',')
            .map((address) => address.trim())
            .filter((address) => address !== '');
        } else {
          timestamp ??= line;
        }
        break;
      case 'section':
        outcomeLists[state.outcome].push(line);
        break;
    }
  }

  if (!ipPrefix) {
    throw new ConfigurationError(`${source} has no ${PREFIX_KEY} header`);
  }
  if (!desiredDNS || desiredDNS.length === 0) {
    throw new ConfigurationError(`${source} has no ${DNS_KEY} header`);
  }

  return { timestamp, ipPrefix, desiredDNS, outcomeLists };
}

export async function readRunRecord(filePath: string) {
  let text: string;
  try {
    text = await readFile(filePath, 'utf8');
  } catch (error) {
    throw new ConfigurationError(
      `Cannot read run record ${filePath}: ${describeError(error)}`,
      { cause: error },
    );
  }
  return parseRunRecord(text, filePath);
}

// Hosts to retry: Offline first, then Error, each in recorded order.
export function hostsToResume(record: Pick<ParsedRunRecord, 'outcomeLists'>) {
  const hosts: HostIdentifier[] = [];
  const seen = new Set<HostIdentifier>();
  for (const host of [
    ...record.outcomeLists[OUTCOME.OFFLINE],
    ...record.outcomeLists[OUTCOME.ERROR],
  ]) {
    if (!seen.has(host)) {
      seen.add(host);
      hosts.push(host);
    }
  }
  return hosts;
}
