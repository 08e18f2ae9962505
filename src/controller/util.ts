import { z } from 'zod';

import { ConfigurationError } from '../errors.mts';
import type { RunInput } from '../services/dns-reconciler/host-source.mts';

const dnsAddressSchema = z.union([z.ipv4(), z.ipv6()]);

const cliOptionsSchema = z.object({
  ou: z.string().optional(),
  prevLog: z.string().optional(),
  localIpPrefix: z.string().optional(),
  newDns: z.string().optional(),
  dryRun: z.boolean().default(false),
  concurrency: z.coerce.number().int().min(1).optional(),
  recordDir: z.string().min(1).optional(),
});

export interface ExtractedRunOptions {
  input: RunInput;
  concurrency?: number;
  recordDir?: string;
  ignored: string[];
}

export function parseDNSList(value: string) {
  const addresses = value
    .split(',')
    .map((address) => address.trim())
    .filter((address) => address !== '');

  if (addresses.length === 0) {
    throw new ConfigurationError('--new-dns needs at least one address');
  }

  const invalid = addresses.filter(
    (address) => !dnsAddressSchema.safeParse(address).success,
  );
  if (invalid.length > 0) {
    throw new ConfigurationError(
      `--new-dns has invalid addresses: ${invalid.join(', ')}`,
    );
  }

  return addresses;
}

// Validates the CLI flags and works out which input mode the run uses.
export function extractRunOptions(
  options: Record<string, unknown>,
): ExtractedRunOptions {
  const parsed = cliOptionsSchema.safeParse(options);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid options: ${details}`);
  }
  const {
    ou,
    prevLog,
    localIpPrefix,
    newDns,
    dryRun,
    concurrency,
    recordDir,
  } = parsed.data;

  if (ou !== undefined && prevLog !== undefined) {
    throw new ConfigurationError('--ou and --prev-log cannot be used together');
  }

  if (prevLog !== undefined) {
    if (prevLog.trim() === '') {
      throw new ConfigurationError('--prev-log needs a file path');
    }
    const ignored = [
      ...(localIpPrefix === undefined ? [] : ['--local-ip-prefix']),
      ...(newDns === undefined ? [] : ['--new-dns']),
    ];
    return {
      input: { mode: 'resume', recordPath: prevLog, dryRun },
      concurrency,
      recordDir,
      ignored,
    };
  }

  if (ou === undefined) {
    throw new ConfigurationError('Either --ou or --prev-log is required');
  }

  const missing = [
    ...(localIpPrefix?.trim() ? [] : ['--local-ip-prefix']),
    ...(newDns === undefined ? ['--new-dns'] : []),
  ];
  if (missing.length > 0) {
    throw new ConfigurationError(`--ou also needs ${missing.join(' and ')}`);
  }

  return {
    input: {
      mode: 'directory',
      ouPath: ou,
      ipPrefix: (localIpPrefix ?? '').trim(),
      desiredDNS: parseDNSList(newDns ?? ''),
      dryRun,
    },
    concurrency,
    recordDir,
    ignored: [],
  };
}
