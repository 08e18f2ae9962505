import { RouterOSClient } from 'routeros-client';

import { describeError, RemoteAccessError } from '../../errors.mts';
import type { Logger } from '../../logger.mts';
import type {
  InterfaceRef,
  RemoteManagement,
} from '../../services/dns-reconciler/types.mts';
import type { RosMenuClient } from './interactor.mts';
import { RouterOSInteractor } from './interactor.mts';
import type { RouterOSConnectionOptions } from './types.mts';

export interface RouterOSSessionOptions {
  host: string;
  user: string;
  password: string;
  port: number;
  timeout: number;
}

export interface RouterOSSession {
  connect(): Promise<RosMenuClient>;
  close(): Promise<unknown>;
}

export type RouterOSSessionFactory = (
  options: RouterOSSessionOptions,
) => RouterOSSession;

const createRouterOSSession: RouterOSSessionFactory = (options) =>
  new RouterOSClient(options);

export class RouterOSInteractorBuilder implements RemoteManagement {
  private config: RouterOSConnectionOptions;
  private logger: Logger;
  private createSession: RouterOSSessionFactory;

  public constructor(
    config: RouterOSConnectionOptions,
    logger: Logger,
    createSession: RouterOSSessionFactory = createRouterOSSession,
  ) {
    this.config = config;
    this.logger = logger;
    this.createSession = createSession;
  }

  public async execute<T>(
    host: string,
    action: (client: RouterOSInteractor) => Promise<T>,
  ): Promise<T> {
    const api = this.createSession({
      host,
      user: this.config.username,
      password: this.config.password,
      port: this.config.port,
      timeout: this.config.timeout,
    });

    let client: RosMenuClient;
    try {
      client = await api.connect();
    } catch (error) {
      throw new RemoteAccessError(
        host,
        `Cannot open management session on ${host}: ${describeError(error)}`,
        { cause: error },
      );
    }

    try {
      return await action(new RouterOSInteractor(client, host, this.logger));
    } catch (error) {
      throw new RemoteAccessError(
        host,
        `Management call on ${host} failed: ${describeError(error)}`,
        { cause: error },
      );
    } finally {
      await api.close().catch((error: unknown) => {
        this.logger.warn(
          { host, err: error },
          'Failed to close management session',
        );
      });
    }
  }

  public async listNetworkConfig(host: string) {
    return this.execute(host, async (routeros) => routeros.getNetworkConfig());
  }

  public async setDNSOrder(ref: InterfaceRef, addresses: readonly string[]) {
    return this.execute(ref.hostId, async (routeros) => {
      await routeros.setDNSServers(addresses);
      return 0;
    });
  }
}
