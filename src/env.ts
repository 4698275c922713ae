import { z } from 'zod';
import dotenv from 'dotenv';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { MIN_FEE_MULTIPLIER } from './fees.js';
import { isPowerOfTwo } from './keystore.js';
import { LOG_LEVELS } from './logger.js';

export const CONFIG_DIR = path.join(os.homedir(), '.cairn');
export const GLOBAL_ENV_FILE = path.join(CONFIG_DIR, '.env');

function getEnvArgvPath(argv: readonly string[]): string | null {
  const idx = argv.findIndex((a) => a === '--env');
  if (idx !== -1 && argv[idx + 1]) return argv[idx + 1];

  const eq = argv.find((a) => a.startsWith('--env='));
  if (eq) return eq.slice('--env='.length);

  return null;
}

/** The first env file that applies: `--env`, then `./.env`, then `~/.cairn/.env`. */
export function locateEnvFile(argv: readonly string[] = process.argv, cwd = process.cwd()): string | null {
  const explicit = getEnvArgvPath(argv);
  if (explicit) return explicit;

  const local = path.resolve(cwd, '.env');
  if (fs.existsSync(local)) return local;

  if (fs.existsSync(GLOBAL_ENV_FILE)) return GLOBAL_ENV_FILE;
  return null;
}

let loaded = false;

function loadDotEnvOnce() {
  if (loaded) return;
  loaded = true;
  const file = locateEnvFile();
  if (file) dotenv.config({ path: file });
}

const optionalText = z
  .string()
  .optional()
  .transform((v) => (v === undefined || v.trim() === '' ? undefined : v.trim()));

export const EnvSchema = z.object({
  // Default RPC: community public endpoint; override if you have your own.
  STARKNET_RPC_URL: z.string().url().default('https://starknet-sepolia-rpc.publicnode.com'),
  STARKNET_ACCOUNT: optionalText,
  STARKNET_KEYSTORE: optionalText,
  STARKNET_PRIVATE_KEY: optionalText,
  STARKNET_KEYSTORE_PASSWORD: z.string().optional(),
  STARKNET_CHAIN_ID: optionalText,
  CAIRN_FEE_MULTIPLIER: z.coerce.number().min(MIN_FEE_MULTIPLIER).default(1.5),
  CAIRN_RPC_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  CAIRN_KEYSTORE_SCRYPT_N: z.coerce
    .number()
    .int()
    .refine(isPowerOfTwo, 'must be a power of two')
    .default(131072),
  CAIRN_LOG_LEVEL: z.enum(LOG_LEVELS).default('warn'),
});

export type Env = z.infer<typeof EnvSchema>;

export function parseEnv(source: NodeJS.ProcessEnv): Env {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    throw new Error(
      `Invalid env: ${parsed.error.message}\n\n` +
        `Expected env file at one of:\n` +
        `  - --env <path>\n` +
        `  - ${path.resolve(process.cwd(), '.env')}\n` +
        `  - ${GLOBAL_ENV_FILE}\n`,
    );
  }
  return parsed.data;
}

export function getEnv(): Env {
  loadDotEnvOnce();
  return parseEnv(process.env);
}

export const ENV_TEMPLATE = `# cairn config
#
# Account: path to an account JSON file, or a deployed account address
STARKNET_ACCOUNT=
# Signer: an encrypted keystore (preferred) or a raw private key
STARKNET_KEYSTORE=
# STARKNET_PRIVATE_KEY=0x...

# Optional
STARKNET_RPC_URL=https://starknet-sepolia-rpc.publicnode.com
# STARKNET_CHAIN_ID=SN_SEPOLIA
CAIRN_FEE_MULTIPLIER=1.5
CAIRN_RPC_TIMEOUT_MS=30000
CAIRN_LOG_LEVEL=warn
`;
