import type { Entry, SearchOptions } from 'ldapts';
import { Client } from 'ldapts';

import type { Logger } from '../../logger.mts';
import type { DirectoryClient } from '../../services/dns-reconciler/types.mts';

export interface DirectoryConnectionOptions {
  url: string;
  bindDN?: string;
  bindPassword?: string;
  filter: string;
}

// The slice of the ldapts client this interactor talks to.
export interface LdapSearchClient {
  bind(dn: string, password: string): Promise<void>;
  search(
    baseDN: string,
    options: SearchOptions,
  ): Promise<{ searchEntries: Entry[] }>;
  unbind(): Promise<void>;
}

export type LdapClientFactory = (url: string) => LdapSearchClient;

const createLdapClient: LdapClientFactory = (url) => new Client({ url });

type AttributeValue = Entry[string];

export function firstValue(value: AttributeValue | undefined) {
  if (value === undefined) {
    return undefined;
  }
  const first = Array.isArray(value) ? value[0] : value;
  if (first === undefined) {
    return undefined;
  }
  return typeof first === 'string' ? first : first.toString('utf8');
}

export class LdapDirectoryClient implements DirectoryClient {
  private config: DirectoryConnectionOptions;
  private logger: Logger;
  private createClient: LdapClientFactory;

  public constructor(
    config: DirectoryConnectionOptions,
    logger: Logger,
    createClient: LdapClientFactory = createLdapClient,
  ) {
    this.config = config;
    this.logger = logger;
    this.createClient = createClient;
  }

  public async listComputers(distinguishedName: string) {
    const client = this.createClient(this.config.url);

    try {
      if (this.config.bindDN) {
        await client.bind(this.config.bindDN, this.config.bindPassword ?? '');
      }

      const { searchEntries } = await client.search(distinguishedName, {
        scope: 'sub',
        filter: this.config.filter,
        attributes: ['dNSHostName', 'cn'],
      });

      const hosts: string[] = [];
      for (const entry of searchEntries) {
        const host = firstValue(entry.dNSHostName) ?? firstValue(entry.cn);
        if (host) {
          hosts.push(host);
        } else {
          this.logger.warn(
            { dn: entry.dn },
            'Directory entry has no host name',
          );
        }
      }
      return hosts;
    } finally {
      await client.unbind();
    }
  }
}
