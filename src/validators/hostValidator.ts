import { z } from 'zod';
import { CMS_STATUSES, HOST_STATUSES, Host } from '../types';

/*
 * Address syntax is checked by the host store, which reports InvalidAddressError
 * rather than a generic validation failure.
 */

const textField = z.string().default('');
const countField = z.number().int().nonnegative().default(0);

/**
 * Some peers encode "never" as the zero time (0001-01-01).
 */
const timestampField = z
  .union([z.string(), z.null()])
  .optional()
  .transform((value) => {
    if (!value || value.startsWith('0001-01-01')) {
      return null;
    }
    const parsed = new Date(value);
    return Number.isNaN(parsed.getTime()) ? null : parsed.toISOString();
  });

const hostStatusField = z.enum(HOST_STATUSES);
const cmsStatusField = z.enum(CMS_STATUSES);

/**
 * One host record as it travels between peers and as it is stored.
 * Missing fields take their empty defaults.
 */
export const hostRecordSchema = z.object({
  id: z.string().trim().default(''),
  nickname: textField,
  ip_address: z.string().trim().default(''),
  vpn_ip_address: z.string().trim().default(''),
  hostname: textField,
  notes: textField,
  status: hostStatusField.default('Unreachable'),
  status_vpn: z.union([hostStatusField, z.literal('')]).default(''),
  nsm_status: textField,
  nsm_status_vpn: textField,
  nsm_version: textField,
  nsm_version_vpn: textField,
  anthias_version: textField,
  anthias_version_vpn: textField,
  anthias_status: textField,
  anthias_status_vpn: textField,
  cms_status: cmsStatusField.default('Unknown'),
  cms_status_vpn: z.union([cmsStatusField, z.literal('')]).default(''),
  asset_count: countField,
  asset_count_vpn: countField,
  dashboard_url: textField,
  dashboard_url_vpn: textField,
  last_checked: timestampField,
  last_checked_vpn: timestampField,
}) satisfies z.ZodType<Host, z.ZodTypeDef, unknown>;

function withoutNulls(value: unknown): unknown {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return value;
  }
  return Object.fromEntries(Object.entries(value).filter(([, field]) => field !== null));
}

/**
 * A row read back from the store file. Rows written by older releases may
 * carry NULL columns or status text outside the current vocabulary; those
 * fall back to the record defaults.
 */
export const storedHostSchema = z.preprocess(
  withoutNulls,
  hostRecordSchema.extend({
    status: hostStatusField.catch('Unreachable'),
    status_vpn: z.union([hostStatusField, z.literal('')]).catch(''),
    cms_status: cmsStatusField.catch('Unknown'),
    cms_status_vpn: z.union([cmsStatusField, z.literal('')]).catch(''),
    asset_count: countField.catch(0),
    asset_count_vpn: countField.catch(0),
  })
) satisfies z.ZodType<Host, z.ZodTypeDef, unknown>;

/**
 * Gossip payload: an ordered list of host records
 */
export const rosterPayloadSchema = z.array(hostRecordSchema);

/**
 * Schema for validating host creation data
 */
export const addHostSchema = z.object({
  nickname: z.string().max(255, 'Nickname must not exceed 255 characters').trim().default(''),
  ip_address: z.string({ required_error: 'ip_address is required' }).trim().min(1, 'ip_address is required'),
  vpn_ip_address: z.string().trim().default(''),
  hostname: z.string().max(255, 'Hostname must not exceed 255 characters').trim().default(''),
  notes: z.string().max(2_000, 'Notes must not exceed 2000 characters').trim().default(''),
});

/**
 * Schema for validating inline host edits
 */
export const updateHostSchema = z
  .object({
    nickname: z.string().max(255, 'Nickname must not exceed 255 characters').trim().optional(),
    ip_address: z.string().trim().min(1, 'ip_address must not be empty').optional(),
    vpn_ip_address: z.string().trim().optional(),
    notes: z.string().max(2_000, 'Notes must not exceed 2000 characters').trim().optional(),
  })
  .refine((data) => Object.values(data).some((value) => value !== undefined), {
    message: 'At least one field must be provided for update',
  });

export type UpdateHostInput = z.infer<typeof updateHostSchema>;

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .optional()
  .transform((value) => value === 'true' || value === '1');

export const receiveQuerySchema = z.object({
  merge: booleanFlag,
});

export const pushBodySchema = z
  .object({
    targets: z.array(z.string().trim().min(1)).optional(),
  })
  .default({});

export const scanQuerySchema = z.object({
  interface_ip: z.string().trim().min(1).optional(),
});

export const restoreBackupSchema = z
  .object({
    file: z.string().trim().min(1, 'file must not be empty').optional(),
  })
  .default({});
