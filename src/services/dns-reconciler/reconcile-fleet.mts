import {
  ConfigurationError,
  describeError,
  RemoteAccessError,
  UnreachableHostError,
} from '../../errors.mts';
import { RunAggregator } from './aggregator.mts';
import { applyDNS } from './apply-change.mts';
import { isInScope, requiresChange } from './comparator.mts';
import type {
  DNSReconcilerDependencies,
  HostIdentifier,
  HostReport,
  InterfaceDecision,
  NetworkInterfaceSnapshot,
  RunParameters,
} from './types.mts';
import { OUTCOME } from './util.ts';

export const NO_MATCHING_INTERFACE = 'no matching interface';
export const RUN_INTERRUPTED = 'run interrupted before this host was processed';

class HostPassAborted extends Error {
  public constructor(hostId: HostIdentifier) {
    super(`Pass on ${hostId} was abandoned`);
    this.name = 'HostPassAborted';
  }
}

// Checked before every remote step of a host pass.
function ensureActive(signal: AbortSignal, hostId: HostIdentifier) {
  if (signal.aborted) {
    throw new HostPassAborted(hostId);
  }
}

async function decideInterface(
  deps: DNSReconcilerDependencies,
  snapshot: NetworkInterfaceSnapshot,
  parameters: RunParameters,
  signal: AbortSignal,
): Promise<InterfaceDecision> {
  const { logger } = deps;
  const interfaceName = snapshot.ref.name;

  if (!requiresChange(snapshot.currentDNS, parameters.desiredDNS)) {
    logger.info(
      { host: snapshot.hostId, iface: interfaceName, dns: snapshot.currentDNS },
      'DNS order already matches',
    );
    return { interfaceName, outcome: OUTCOME.UNCHANGED };
  }

  logger.info(
    {
      host: snapshot.hostId,
      iface: interfaceName,
      current: snapshot.currentDNS,
      desired: parameters.desiredDNS,
    },
    'DNS order differs',
  );

  ensureActive(signal, snapshot.hostId);
  const result = await applyDNS.execute(deps)({
    ref: snapshot.ref,
    desiredDNS: parameters.desiredDNS,
    dryRun: parameters.dryRun,
  });

  if (!result.success) {
    return { interfaceName, outcome: OUTCOME.ERROR, note: result.message };
  }

  let note: string | undefined;
  if (result.simulated) {
    note = 'would change (dry run)';
  } else if (result.resultCode === 1) {
    note = 'changed, reboot required';
  }
  return { interfaceName, outcome: OUTCOME.CHANGED, note };
}

async function reconcileHost(
  deps: DNSReconcilerDependencies,
  hostId: HostIdentifier,
  parameters: RunParameters,
  signal: AbortSignal,
): Promise<HostReport> {
  const { probe, remote, options, logger } = deps;

  logger.debug({ host: hostId }, 'Probing host');
  const reachable = await probe.probe(
    hostId,
    options.probeAttempts,
    options.probeTimeoutMs,
  );
  if (!reachable) {
    logger.warn({ host: hostId }, 'Host is offline');
    return { hostId, decisions: [{ outcome: OUTCOME.OFFLINE }] };
  }

  ensureActive(signal, hostId);
  let snapshots: NetworkInterfaceSnapshot[];
  try {
    snapshots = await remote.listNetworkConfig(hostId);
  } catch (error) {
    const message =
      error instanceof RemoteAccessError
        ? error.message
        : `Cannot read network configuration: ${describeError(error)}`;
    logger.error({ host: hostId, err: error }, 'Interface inspection failed');
    return { hostId, decisions: [{ outcome: OUTCOME.ERROR, note: message }] };
  }

  const inScope = snapshots.filter((snapshot) =>
    isInScope(snapshot, parameters.ipPrefix),
  );
  if (inScope.length === 0) {
    logger.info(
      { host: hostId, ipPrefix: parameters.ipPrefix },
      'No matching interface',
    );
    return {
      hostId,
      decisions: [{ outcome: OUTCOME.UNCHANGED, note: NO_MATCHING_INTERFACE }],
    };
  }

  const decisions: InterfaceDecision[] = [];
  for (const snapshot of inScope) {
    decisions.push(await decideInterface(deps, snapshot, parameters, signal));
  }
  return { hostId, decisions };
}

/**
 * Runs one host pass against the per-host budget. On expiry the pass is
 * aborted, so it makes no further remote call, and its late result is
 * dropped.
 */
async function reconcileHostWithin(
  deps: DNSReconcilerDependencies,
  hostId: HostIdentifier,
  parameters: RunParameters,
): Promise<HostReport> {
  const { hostTimeoutMs } = deps.options;
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<HostReport>((resolve) => {
    timer = setTimeout(() => {
      controller.abort();
      const error = new UnreachableHostError(
        hostId,
        `Host did not finish within ${hostTimeoutMs.toString()}ms`,
      );
      deps.logger.error({ host: hostId }, error.message);
      resolve({
        hostId,
        decisions: [{ outcome: OUTCOME.ERROR, note: error.message }],
      });
    }, hostTimeoutMs);
  });

  const pass = reconcileHost(deps, hostId, parameters, controller.signal).catch(
    (error: unknown): HostReport => {
      if (error instanceof HostPassAborted) {
        deps.logger.debug({ host: hostId }, error.message);
      } else {
        deps.logger.error({ host: hostId, err: error }, 'Unexpected failure');
      }
      return {
        hostId,
        decisions: [{ outcome: OUTCOME.ERROR, note: describeError(error) }],
      };
    },
  );

  try {
    return await Promise.race([pass, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

export interface ReconcileFleetParams {
  hosts: readonly HostIdentifier[];
  parameters: RunParameters;
  signal?: AbortSignal;
  onHostDone?: (report: HostReport) => void;
}

export interface ReconcileFleetResult {
  aggregator: RunAggregator;
  reports: HostReport[];
  interrupted: boolean;
}

export const reconcileFleet = {
  execute:
    (deps: DNSReconcilerDependencies) =>
    async (params: ReconcileFleetParams): Promise<ReconcileFleetResult> => {
      const { options, logger } = deps;
      const { parameters, signal, onHostDone } = params;
      const hosts = [...new Set(params.hosts)];

      if (parameters.desiredDNS.length === 0) {
        throw new ConfigurationError('Desired DNS list must not be empty');
      }

      const aggregator = new RunAggregator();
      const reports: HostReport[] = [];
      const collect = (report: HostReport) => {
        aggregator.record(report);
        reports.push(report);
        onHostDone?.(report);
      };

      logger.info(
        {
          hosts: hosts.length,
          ipPrefix: parameters.ipPrefix,
          dns: parameters.desiredDNS,
          dryRun: parameters.dryRun,
          concurrency: options.concurrency,
        },
        'Starting reconciliation',
      );

      let next = 0;
      const worker = async () => {
        while (next < hosts.length && !signal?.aborted) {
          const hostId = hosts[next];
          next += 1;
          if (hostId === undefined) {
            break;
          }
          collect(await reconcileHostWithin(deps, hostId, parameters));
        }
      };

      const poolSize = Math.max(1, Math.min(options.concurrency, hosts.length));
      await Promise.all(Array.from({ length: poolSize }, worker));

      const interrupted = signal?.aborted ?? false;
      if (interrupted) {
        const pending = hosts.filter((hostId) => !aggregator.has(hostId));
        logger.warn({ pending: pending.length }, 'Run interrupted');
        for (const hostId of pending) {
          collect({
            hostId,
            decisions: [{ outcome: OUTCOME.ERROR, note: RUN_INTERRUPTED }],
          });
        }
      }

      logger.info(aggregator.summary(), 'Reconciliation finished');
      return { aggregator, reports, interrupted };
    },
};
