import { setTimeout as delay } from 'node:timers/promises';

import { RemoteAccessError } from '../../errors.mts';
import { createLogger } from '../../logger.mts';
import type {
  DNSReconcilerDependencies,
  HostIdentifier,
  InterfaceRef,
  NetworkInterfaceSnapshot,
  ReachabilityProbe,
  ReconcileOptions,
  RemoteManagement,
} from './types.mts';

export interface FakeInterface {
  name: string;
  ips: string[];
  dns: string[];
}

export class FakeProbe implements ReachabilityProbe {
  public readonly calls: {
    host: string;
    attempts: number;
    timeoutMs: number;
  }[] = [];
  private offline: Set<string>;

  public constructor(offline: Iterable<string> = []) {
    this.offline = new Set(offline);
  }

  public async probe(host: string, attempts: number, timeoutMs: number) {
    this.calls.push({ host, attempts, timeoutMs });
    return Promise.resolve(!this.offline.has(host));
  }
}

/**
 * In-memory fleet. A successful apply rewrites the interface's DNS list, so
 * a second pass sees the new state.
 */
export class FakeRemote implements RemoteManagement {
  public readonly listed: HostIdentifier[] = [];
  public readonly applied: {
    host: string;
    iface: string;
    addresses: string[];
  }[] = [];

  // Result code per `host/iface`, 0 when absent.
  public resultCodes: Record<string, number> = {};
  public failApply = new Set<string>();
  public hang = new Set<string>();
  public listDelayMs = 0;

  private fleet: Map<HostIdentifier, FakeInterface[]>;

  public constructor(fleet: Record<HostIdentifier, FakeInterface[]>) {
    this.fleet = new Map(Object.entries(fleet));
  }

  public async listNetworkConfig(
    host: string,
  ): Promise<NetworkInterfaceSnapshot[]> {
    this.listed.push(host);
    if (this.listDelayMs > 0) {
      await delay(this.listDelayMs);
    }
    if (this.hang.has(host)) {
      return new Promise<NetworkInterfaceSnapshot[]>(() => undefined);
    }
    const interfaces = this.fleet.get(host);
    if (!interfaces) {
      throw new RemoteAccessError(host, `Access denied on ${host}`);
    }
    return Promise.resolve(
      interfaces.map((iface) => ({
        hostId: host,
        ref: { hostId: host, name: iface.name },
        ipAddresses: [...iface.ips],
        currentDNS: [...iface.dns],
      })),
    );
  }

  public async setDNSOrder(ref: InterfaceRef, addresses: readonly string[]) {
    const key = `${ref.hostId}/${ref.name}`;
    this.applied.push({
      host: ref.hostId,
      iface: ref.name,
      addresses: [...addresses],
    });
    if (this.failApply.has(key)) {
      throw new RemoteAccessError(
        ref.hostId,
        `RPC server unavailable on ${ref.hostId}`,
      );
    }

    const code = this.resultCodes[key] ?? 0;
    if (code === 0 || code === 1) {
      const iface = this.fleet
        .get(ref.hostId)
        ?.find((entry) => entry.name === ref.name);
      if (iface) {
        iface.dns = [...addresses];
      }
    }
    return Promise.resolve(code);
  }
}

export const silentLogger = createLogger({ level: 'silent' });

export function fakeDependencies(
  probe: ReachabilityProbe,
  remote: RemoteManagement,
  options: Partial<ReconcileOptions> = {},
): DNSReconcilerDependencies {
  return {
    probe,
    remote,
    logger: silentLogger,
    options: {
      probeAttempts: 2,
      probeTimeoutMs: 1000,
      hostTimeoutMs: 5000,
      concurrency: 1,
      ...options,
    },
  };
}

// On 10.0.1.*: a is in sync and b is not; c is meant to be offline and
// d has no matching interface.
export function scenarioFleet(): Record<HostIdentifier, FakeInterface[]> {
  return {
    'host-a': [
      { name: 'ether1', ips: ['10.0.1.5'], dns: ['10.0.0.2', '10.0.0.1'] },
    ],
    'host-b': [{ name: 'ether1', ips: ['10.0.1.6'], dns: ['8.8.8.8'] }],
    'host-c': [{ name: 'ether1', ips: ['10.0.1.7'], dns: ['8.8.8.8'] }],
    'host-d': [{ name: 'ether1', ips: ['192.168.88.1'], dns: ['8.8.8.8'] }],
  };
}
