import type { Logger } from '../../logger.mts';
import type {
  NetworkInterfaceSnapshot,
} from '../../services/dns-reconciler/types.mts';
import { dnsSettingsSchema, ipAddressListSchema } from './types.mts';

// The slice of the routeros-client menu API this interactor talks to.
export interface RosMenuClient {
  menu(path: string): {
    get(): Promise<unknown>;
    getOnly(): Promise<unknown>;
    exec(command: string, data: Record<string, string>): Promise<unknown>;
  };
}

export function splitServers(servers: string) {
  return servers
    .split(',')
    .map((server) => server.trim())
    .filter((server) => server !== '');
}

// `10.0.1.5/24` -> `10.0.1.5`
export function stripMask(address: string) {
  const slash = address.indexOf('/');
  return slash === -1 ? address : address.slice(0, slash);
}

export class RouterOSInteractor {
  private client: RosMenuClient;
  private host: string;
  private logger: Logger;

  public constructor(client: RosMenuClient, host: string, logger: Logger) {
    this.client = client;
    this.host = host;
    this.logger = logger;
  }

  public async getIPAddresses() {
    const result: unknown = await this.client.menu('/ip address').get();
    return ipAddressListSchema.parse(result);
  }

  public async getDNSSettings() {
    const result: unknown = await this.client.menu('/ip dns').getOnly();
    return dnsSettingsSchema.parse(result);
  }

  public async setDNSServers(servers: readonly string[]) {
    await this.client
      .menu('/ip dns')
      .exec('set', { servers: servers.join(',') });
    this.logger.info({ host: this.host, servers }, 'Set DNS servers');
  }

  /**
   * One snapshot per interface that has an enabled address. The device has a
   * single resolver list, so every snapshot carries the same `currentDNS`.
   */
  public async getNetworkConfig(): Promise<NetworkInterfaceSnapshot[]> {
    const addresses = await this.getIPAddresses();
    const dns = await this.getDNSSettings();
    const currentDNS = splitServers(dns.servers);

    const byInterface = new Map<string, string[]>();
    for (const entry of addresses) {
      if (entry.disabled || entry.invalid) {
        continue;
      }
      const bound = byInterface.get(entry.interface) ?? [];
      bound.push(stripMask(entry.address));
      byInterface.set(entry.interface, bound);
    }

    this.logger.debug(
      { host: this.host, interfaces: [...byInterface.keys()] },
      'Read network configuration',
    );

    return [...byInterface].map(([name, ipAddresses]) => ({
      hostId: this.host,
      ref: { hostId: this.host, name },
      ipAddresses,
      currentDNS,
    }));
  }
}
