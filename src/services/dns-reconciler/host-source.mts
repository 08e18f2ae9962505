import { ConfigurationError } from '../../errors.mts';
import type { Logger } from '../../logger.mts';
import { hostsToResume, readRunRecord } from './run-record.mts';
import type {
  DirectoryClient,
  HostIdentifier,
  RunParameters,
} from './types.mts';

export type RunInput =
  | {
      mode: 'directory';
      ouPath: string;
      ipPrefix: string;
      desiredDNS: readonly string[];
      dryRun: boolean;
    }
  | { mode: 'resume'; recordPath: string; dryRun: boolean };

export interface ResolvedHosts {
  hosts: HostIdentifier[];
  parameters: RunParameters;
  distinguishedName?: string;
}

/**
 * Turns `example.com\ParentOU\ChildOU` into
 * `OU=ChildOU,OU=ParentOU,DC=example,DC=com`.
 */
export function toDistinguishedName(ouPath: string) {
  const segments = ouPath
    .split(/[\\/]/)
    .map((segment) => segment.trim())
    .filter((segment) => segment !== '');

  const [domain, ...units] = segments;
  if (domain === undefined) {
    throw new ConfigurationError(
      `Organizational path "${ouPath}" has no segments`,
    );
  }

  const domainParts = domain.split('.').map((part) => part.trim());
  if (domainParts.some((part) => part === '')) {
    throw new ConfigurationError(
      `Organizational path "${ouPath}" has a malformed domain segment ` +
        `"${domain}"`,
    );
  }

  return [
    ...units.reverse().map((unit) => `OU=${unit}`),
    ...domainParts.map((part) => `DC=${part}`),
  ].join(',');
}

function uniqueHosts(hosts: readonly HostIdentifier[]) {
  const names = hosts.map((host) => host.trim()).filter((host) => host !== '');
  return [...new Set(names)];
}

export const resolveHosts = {
  execute:
    (deps: { directory?: DirectoryClient; logger: Logger }) =>
    async (input: RunInput): Promise<ResolvedHosts> => {
      const { directory, logger } = deps;

      if (input.mode === 'resume') {
        const record = await readRunRecord(input.recordPath);
        const hosts = hostsToResume(record);
        logger.info(
          { recordPath: input.recordPath, hosts: hosts.length },
          'Resuming from run record',
        );
        return {
          hosts,
          parameters: {
            ipPrefix: record.ipPrefix,
            desiredDNS: record.desiredDNS,
            dryRun: input.dryRun,
          },
        };
      }

      const distinguishedName = toDistinguishedName(input.ouPath);
      if (!directory) {
        throw new ConfigurationError(
          'Directory mode needs LDAP_URL to be configured',
        );
      }

      logger.info({ distinguishedName }, 'Querying directory for computers');
      const hosts = uniqueHosts(
        await directory.listComputers(distinguishedName),
      );
      logger.info(
        { distinguishedName, hosts: hosts.length },
        'Directory query done',
      );

      return {
        hosts,
        distinguishedName,
        parameters: {
          ipPrefix: input.ipPrefix,
          desiredDNS: input.desiredDNS,
          dryRun: input.dryRun,
        },
      };
    },
};
