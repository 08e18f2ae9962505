import { resolveHosts } from './host-source.mts';
import type { RunInput } from './host-source.mts';
import { reconcileFleet } from './reconcile-fleet.mts';
import { ensureRecordDir, writeRunRecord } from './run-record.mts';
import type {
  DirectoryClient,
  DNSReconcilerDependencies,
  HostReport,
  OutcomeLists,
  RunParameters,
  RunSummary,
} from './types.mts';

export interface RunReconciliationDependencies
  extends DNSReconcilerDependencies {
  directory?: DirectoryClient;
  recordDir: string;
  now?: () => Date;
}

export interface RunRequest {
  input: RunInput;
  concurrency?: number;
  recordDir?: string;
  signal?: AbortSignal;
  onHostDone?: (report: HostReport) => void;
}

export interface RunOutcome {
  parameters: RunParameters;
  summary: RunSummary;
  outcomeLists: OutcomeLists;
  reports: HostReport[];
  recordPath: string;
  interrupted: boolean;
}

export const runReconciliation = {
  execute:
    (deps: RunReconciliationDependencies) =>
    async (params: RunRequest): Promise<RunOutcome> => {
      const { logger } = deps;
      const now = deps.now ?? (() => new Date());

      const recordDir = params.recordDir ?? deps.recordDir;
      await ensureRecordDir(recordDir);

      const { hosts, parameters, distinguishedName } =
        await resolveHosts.execute(deps)(params.input);
      logger.info(
        { hosts: hosts.length, distinguishedName, mode: params.input.mode },
        'Hosts resolved',
      );

      const reconcile = reconcileFleet.execute({
        ...deps,
        options: {
          ...deps.options,
          concurrency: params.concurrency ?? deps.options.concurrency,
        },
      });
      const { aggregator, reports, interrupted } = await reconcile({
        hosts,
        parameters,
        signal: params.signal,
        onHostDone: params.onHostDone,
      });

      const finishedAt = now();
      const outcomeLists = aggregator.lists();
      const recordPath = await writeRunRecord(
        recordDir,
        {
          timestamp: finishedAt.toISOString(),
          ipPrefix: parameters.ipPrefix,
          desiredDNS: parameters.desiredDNS,
          outcomeLists,
        },
        finishedAt,
      );
      logger.info({ recordPath }, 'Run record written');

      return {
        parameters,
        summary: aggregator.summary(),
        outcomeLists,
        reports,
        recordPath,
        interrupted,
      };
    },
};
