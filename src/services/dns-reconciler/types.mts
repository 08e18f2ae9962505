import type { Logger } from '../../logger.mts';
import type { Outcome } from './util.ts';

export type HostIdentifier = string;

export interface RunParameters {
  ipPrefix: string;
  desiredDNS: readonly string[];
  dryRun: boolean;
}

/**
 * Handle used only to address an interface when applying a new DNS order.
 * Adapters put whatever they need behind `name`.
 */
export interface InterfaceRef {
  hostId: HostIdentifier;
  name: string;
}

export interface NetworkInterfaceSnapshot {
  hostId: HostIdentifier;
  ref: InterfaceRef;
  ipAddresses: readonly string[];
  currentDNS: readonly string[];
}

export type ApplyResult =
  | { success: true; resultCode: number; simulated: boolean }
  | { success: false; resultCode?: number; message: string };

export interface InterfaceDecision {
  interfaceName?: string;
  outcome: Outcome;
  note?: string;
}

export interface HostReport {
  hostId: HostIdentifier;
  decisions: InterfaceDecision[];
}

export interface RunSummary {
  changed: number;
  unchanged: number;
  offline: number;
  error: number;
}

export type OutcomeLists = Record<Outcome, HostIdentifier[]>;

export interface RunRecord {
  timestamp: string;
  ipPrefix: string;
  desiredDNS: readonly string[];
  outcomeLists: OutcomeLists;
}

// Capability interfaces consumed by the orchestrator.

export interface DirectoryClient {
  listComputers(distinguishedName: string): Promise<HostIdentifier[]>;
}

export interface ReachabilityProbe {
  probe(
    host: HostIdentifier,
    attempts: number,
    timeoutMs: number,
  ): Promise<boolean>;
}

export interface RemoteManagement {
  listNetworkConfig(host: HostIdentifier): Promise<NetworkInterfaceSnapshot[]>;
  setDNSOrder(ref: InterfaceRef, addresses: readonly string[]): Promise<number>;
}

export interface ReconcileOptions {
  probeAttempts: number;
  probeTimeoutMs: number;
  hostTimeoutMs: number;
  concurrency: number;
}

export interface DNSReconcilerDependencies {
  probe: ReachabilityProbe;
  remote: RemoteManagement;
  options: ReconcileOptions;
  logger: Logger;
}
