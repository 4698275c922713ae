import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { StorageError, UnsupportedFormatError } from './errors.js';
import { type Felt, FeltSchema, parseFelt } from './felt.js';
import type { CairoVersion } from './calls.js';

const DeploymentSchema = z.discriminatedUnion('status', [
  z.object({ status: z.literal('deployed'), class_hash: FeltSchema, address: FeltSchema }),
  z.object({ status: z.literal('undeployed'), class_hash: FeltSchema, salt: FeltSchema }).passthrough(),
]);

export const AccountConfigSchema = z.object({
  version: z.literal(1),
  variant: z
    .object({
      type: z.string(),
      version: z.number().int(),
      public_key: FeltSchema,
      legacy: z.boolean().default(false),
    })
    .passthrough(),
  deployment: DeploymentSchema,
});

export type AccountConfig = z.infer<typeof AccountConfigSchema>;

export interface AccountInfo {
  address: Felt;
  publicKey: Felt;
  cairoVersion: CairoVersion;
}

export function parseAccountConfig(raw: unknown): AccountConfig {
  const parsed = AccountConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new UnsupportedFormatError('MalformedAccount', `Invalid account config: ${parsed.error.message}`);
  }
  return parsed.data;
}

export function readAccountConfig(file: string): AccountConfig {
  const p = path.resolve(file);
  if (!fs.existsSync(p)) throw new StorageError('NotFound', `account config file not found: ${p}`);
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(p, 'utf8'));
  } catch (e) {
    throw new UnsupportedFormatError('MalformedAccount', `Account config ${p} is not valid JSON`, { cause: e });
  }
  return parseAccountConfig(raw);
}

/** Only deployed accounts can send transactions. */
export function accountInfo(config: AccountConfig): AccountInfo {
  if (config.deployment.status !== 'deployed') {
    throw new StorageError('AccountNotDeployed', 'account not deployed');
  }
  return {
    address: config.deployment.address,
    publicKey: config.variant.public_key,
    cairoVersion: config.variant.legacy ? 0 : 1,
  };
}

/**
 * Resolves `STARKNET_ACCOUNT`: a path to an account file, or a bare
 * address for a Cairo 1 account.
 */
export function resolveAccount(ref: string): { address: Felt; cairoVersion: CairoVersion } {
  if (/^0[xX][0-9a-fA-F]+$/.test(ref.trim())) {
    return { address: parseFelt(ref), cairoVersion: 1 };
  }
  return accountInfo(readAccountConfig(ref));
}
