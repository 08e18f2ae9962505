import { z } from 'zod';

// routeros-client camel-cases field names and turns "true"/"false"
// into booleans.
const flag = z
  .union([z.boolean(), z.enum(['true', 'false'])])
  .transform((value) => value === true || value === 'true');

export const ipAddressEntrySchema = z.object({
  id: z.string().optional(),
  address: z.string(),
  interface: z.string(),
  disabled: flag.optional(),
  invalid: flag.optional(),
  comment: z.string().optional(),
});

export const ipAddressListSchema = z.array(ipAddressEntrySchema);

export const dnsSettingsSchema = z.object({
  servers: z.string().default(''),
  dynamicServers: z.string().optional(),
  allowRemoteRequests: flag.optional(),
});

export interface RouterOSConnectionOptions {
  username: string;
  password: string;
  port: number;
  timeout: number;
}
