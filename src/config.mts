import { z } from 'zod';

import { ConfigurationError } from './errors.mts';

const configSchema = z.object({
  routeros: z.object({
    username: z.string().min(1, 'RouterOS username is required'),
    password: z.string().min(1, 'RouterOS password is required'),
    port: z.coerce.number().int().positive().default(8728),
    timeout: z.coerce.number().positive().default(10),
  }),
  directory: z.object({
    url: z.string().min(1).optional(),
    bindDN: z.string().min(1).optional(),
    bindPassword: z.string().optional(),
    filter: z.string().min(1).default('(objectClass=computer)'),
  }),
  app: z.object({
    probeTimeoutMs: z.coerce.number().int().positive().default(1000),
    hostTimeoutMs: z.coerce.number().int().positive().default(60_000),
    concurrency: z.coerce.number().int().min(1).default(1),
    recordDir: z.string().min(1).default('.'),
    logLevel: z
      .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
      .default('info'),
  }),
});

export type Config = z.infer<typeof configSchema>;

type Env = Record<string, string | undefined>;

// Empty strings count as unset so that `FOO=` in .env falls back to defaults.
function read(env: Env, key: string) {
  const value = env[key];
  return value === undefined || value === '' ? undefined : value;
}

export function loadConfig(env: Env = process.env): Config {
  const result = configSchema.safeParse({
    routeros: {
      username: read(env, 'ROUTEROS_USERNAME'),
      password: read(env, 'ROUTEROS_PASSWORD'),
      port: read(env, 'ROUTEROS_PORT'),
      timeout: read(env, 'ROUTEROS_TIMEOUT'),
    },
    directory: {
      url: read(env, 'LDAP_URL'),
      bindDN: read(env, 'LDAP_BIND_DN'),
      bindPassword: read(env, 'LDAP_BIND_PASSWORD'),
      filter: read(env, 'LDAP_FILTER'),
    },
    app: {
      probeTimeoutMs: read(env, 'PROBE_TIMEOUT_MS'),
      hostTimeoutMs: read(env, 'HOST_TIMEOUT_MS'),
      concurrency: read(env, 'CONCURRENCY'),
      recordDir: read(env, 'RECORD_DIR'),
      logLevel: read(env, 'LOG_LEVEL'),
    },
  });

  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(
      `Invalid environment configuration: ${details}`,
      { cause: result.error },
    );
  }

  return result.data;
}
