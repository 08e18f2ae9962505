import type { Entry, SearchOptions } from 'ldapts';
import { describe, expect, it } from 'vitest';

import { createLogger } from '../../logger.mts';
import type { LdapSearchClient } from './interactor.mts';
import { firstValue, LdapDirectoryClient } from './interactor.mts';

const logger = createLogger({ level: 'silent' });

function fakeLdap(entries: Entry[], searchError?: Error) {
  const calls: string[] = [];
  const searches: { baseDN: string; options: SearchOptions }[] = [];
  const client: LdapSearchClient = {
    bind: async (dn) => {
      calls.push(`bind ${dn}`);
      return Promise.resolve();
    },
    search: async (baseDN, options) => {
      calls.push('search');
      searches.push({ baseDN, options });
      return searchError
        ? Promise.reject(searchError)
        : Promise.resolve({ searchEntries: entries });
    },
    unbind: async () => {
      calls.push('unbind');
      return Promise.resolve();
    },
  };
  const urls: string[] = [];
  const factory = (url: string) => {
    urls.push(url);
    return client;
  };
  return { factory, calls, searches, urls };
}

describe('firstValue', () => {
  it('reads strings, arrays and buffers', () => {
    expect(firstValue('host-a.example.com')).toBe('host-a.example.com');
    expect(firstValue(['host-a', 'host-b'])).toBe('host-a');
    expect(firstValue(Buffer.from('host-c', 'utf8'))).toBe('host-c');
    expect(firstValue([Buffer.from('host-d', 'utf8')])).toBe('host-d');
  });

  it('returns undefined for missing or empty values', () => {
    expect(firstValue(undefined)).toBeUndefined();
    expect(firstValue([])).toBeUndefined();
  });
});

describe('LdapDirectoryClient', () => {
  const config = {
    url: 'ldap://dc01.example.com',
    bindDN: 'CN=svc-dns,DC=example,DC=com',
    bindPassword: 'test-secret',
    filter: '(objectClass=computer)',
  };

  it('prefers dNSHostName and falls back to cn', async () => {
    const { factory, calls, searches, urls } = fakeLdap([
      {
        dn: 'CN=HOST-A,OU=Branch,DC=example,DC=com',
        dNSHostName: 'host-a.example.com',
        cn: 'HOST-A',
      },
      { dn: 'CN=HOST-B,OU=Branch,DC=example,DC=com', cn: 'HOST-B' },
      {
        dn: 'CN=HOST-C,OU=Branch,DC=example,DC=com',
        dNSHostName: Buffer.from('host-c.example.com', 'utf8'),
      },
      { dn: 'CN=EMPTY,OU=Branch,DC=example,DC=com' },
    ]);

    const hosts = await new LdapDirectoryClient(
      config,
      logger,
      factory,
    ).listComputers('OU=Branch,DC=example,DC=com');

    expect(hosts).toEqual([
      'host-a.example.com',
      'HOST-B',
      'host-c.example.com',
    ]);
    expect(urls).toEqual(['ldap://dc01.example.com']);
    expect(calls).toEqual([
      'bind CN=svc-dns,DC=example,DC=com',
      'search',
      'unbind',
    ]);
    expect(searches).toEqual([
      {
        baseDN: 'OU=Branch,DC=example,DC=com',
        options: {
          scope: 'sub',
          filter: '(objectClass=computer)',
          attributes: ['dNSHostName', 'cn'],
        },
      },
    ]);
  });

  it('skips the bind without a bind DN', async () => {
    const { factory, calls } = fakeLdap([]);

    await new LdapDirectoryClient(
      { url: config.url, filter: config.filter },
      logger,
      factory,
    ).listComputers('DC=example,DC=com');

    expect(calls).toEqual(['search', 'unbind']);
  });

  it('unbinds when the search fails', async () => {
    const { factory, calls } = fakeLdap([], new Error('No Such Object'));

    await expect(
      new LdapDirectoryClient(config, logger, factory).listComputers(
        'OU=Missing,DC=example,DC=com',
      ),
    ).rejects.toThrow('No Such Object');
    expect(calls).toEqual([
      'bind CN=svc-dns,DC=example,DC=com',
      'search',
      'unbind',
    ]);
  });
});
