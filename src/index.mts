#!/usr/bin/env -S node --import tsx
import { Command } from 'commander';
import { config as dotenvConfig } from 'dotenv';
import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

import { loadConfig } from './config.mts';
import { createController } from './controller/builder.mts';
import {
  formatSummary,
  uiHeader,
  uiHost,
  uiInfo,
  uiWarn,
} from './controller/console.mts';
import { extractRunOptions } from './controller/util.ts';
import { LdapDirectoryClient } from './interactors/directory/interactor.mts';
import { TcpReachabilityProbe } from './interactors/probe/tcp-probe.mts';
import { RouterOSInteractorBuilder } from './interactors/routeros/builder.mts';
import { createLogger } from './logger.mts';
import type {
  RunReconciliationDependencies,
  RunRequest,
} from './services/dns-reconciler/run-reconciliation.mts';
import {
  runReconciliation,
} from './services/dns-reconciler/run-reconciliation.mts';

// Load environment variables
dotenvConfig();

const PROBE_ATTEMPTS = 2;

const packagePath = join(
  dirname(fileURLToPath(import.meta.url)),
  '..',
  'package.json',
);
const pkg: unknown = JSON.parse(readFileSync(packagePath, 'utf8'));
const version =
  typeof pkg === 'object' &&
  pkg !== null &&
  'version' in pkg &&
  typeof pkg.version === 'string'
    ? pkg.version
    : '0.0.0';

function buildDependencies(): RunReconciliationDependencies {
  const config = loadConfig();
  const logger = createLogger({ level: config.app.logLevel });

  const { url, bindDN, bindPassword, filter } = config.directory;

  return {
    probe: new TcpReachabilityProbe(config.routeros.port, logger),
    remote: new RouterOSInteractorBuilder(config.routeros, logger),
    directory: url
      ? new LdapDirectoryClient({ url, bindDN, bindPassword, filter }, logger)
      : undefined,
    options: {
      probeAttempts: PROBE_ATTEMPTS,
      probeTimeoutMs: config.app.probeTimeoutMs,
      hostTimeoutMs: config.app.hostTimeoutMs,
      concurrency: config.app.concurrency,
    },
    recordDir: config.app.recordDir,
    logger,
  };
}

const abort = new AbortController();
const onSignal = () => {
  uiWarn('Interrupted, finishing in-flight hosts and writing the run record');
  abort.abort();
};
process.once('SIGINT', onSignal);
process.once('SIGTERM', onSignal);

const reconcileController = createController(buildDependencies);

const program = new Command()
  .name('dns-reconcile')
  .description(
    'Bring the DNS server order of every interface matching a subnet ' +
      'into line across a fleet',
  )
  .version(version)
  .option(
    '--ou <path>',
    'organizational path to query, e.g. example.com\\Servers\\Branch',
  )
  .option(
    '--prev-log <path>',
    'resume the Offline and Error hosts of an earlier run record',
  )
  .option(
    '--local-ip-prefix <pattern>',
    'wildcard selecting interfaces by IP, e.g. 10.0.1.*',
  )
  .option(
    '--new-dns <addresses>',
    'comma-separated DNS servers to apply, in order',
  )
  .option('--dry-run', 'report intended changes without applying them', false)
  .option('--concurrency <n>', 'hosts processed at the same time')
  .option('--record-dir <dir>', 'directory the run record is written to')
  .action(
    reconcileController(runReconciliation)
      .extractParams((options): RunRequest => {
        const extracted = extractRunOptions(options);
        for (const flag of extracted.ignored) {
          uiWarn(
            `${flag} is ignored when resuming, ` +
              "the run record's value is used",
          );
        }
        return {
          input: extracted.input,
          concurrency: extracted.concurrency,
          recordDir: extracted.recordDir,
          signal: abort.signal,
          onHostDone: uiHost,
        };
      })
      .renderSuccess((result) => {
        uiHeader(result.parameters.dryRun ? 'Summary (dry run)' : 'Summary');
        uiInfo(formatSummary(result.summary));
        uiInfo(`Run record: ${result.recordPath}`);
        if (result.interrupted) {
          uiWarn(
            `Run was interrupted; resume with --prev-log ${result.recordPath}`,
          );
          process.exitCode = 130;
        }
      })
      .buildAction(),
  );

await program.parseAsync(process.argv);

process.off('SIGINT', onSignal);
process.off('SIGTERM', onSignal);
