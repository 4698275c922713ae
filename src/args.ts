import { parseUnits } from 'ethers';
import { EncodingError } from './errors.js';
import { type Felt, parseFelt } from './felt.js';
import { encodeShortString } from './hashing.js';
import { parseInteger } from './literals.js';
import { type FeeSetting, type TransactionFee, MIN_FEE_MULTIPLIER } from './fees.js';
import type { ResourceBound } from './tx-hash.js';

export const CALL_SEPARATOR = '/';

export interface FeeOptions {
  maxFee?: string;
  maxFeeRaw?: string;
  l1Gas?: string;
  l1GasPrice?: string;
  l2Gas?: string;
  l2GasPrice?: string;
  l1DataGas?: string;
  l1DataGasPrice?: string;
  feeMultiplier?: string;
  estimateOnly?: boolean;
}

export interface CallGroup {
  to: string;
  entrypoint: string;
  args: string[];
}

/** `<to> <entrypoint> [args...] / <to> <entrypoint> [args...]` */
export function splitCallGroups(tokens: readonly string[]): CallGroup[] {
  const groups: string[][] = [[]];
  for (const t of tokens) {
    if (t === CALL_SEPARATOR) groups.push([]);
    else groups[groups.length - 1].push(t);
  }
  return groups.map((g, i) => {
    const [to, entrypoint, ...args] = g;
    if (to === undefined || entrypoint === undefined) {
      throw new EncodingError('Malformed', `Call #${i + 1} needs a contract address and an entrypoint`);
    }
    return { to, entrypoint, args };
  });
}

export function parseTxVersion(text: string | undefined): 1 | 2 | 3 | undefined {
  if (text === undefined) return undefined;
  switch (text.trim().replace(/^v/i, '')) {
    case '1':
      return 1;
    case '2':
      return 2;
    case '3':
      return 3;
    default:
      throw new EncodingError('Malformed', `Unsupported transaction version '${text}' (expected 1, 2 or 3)`);
  }
}

export function parseNonNegative(text: string, label: string): bigint {
  const v = parseInteger(text);
  if (v < 0n) throw new EncodingError('OutOfRange', `${label} must not be negative`);
  return v;
}

function parseMultiplier(text: string): number {
  const v = Number(text);
  if (!Number.isFinite(v) || v < MIN_FEE_MULTIPLIER) {
    throw new EncodingError('Malformed', `Fee multiplier must be at least ${MIN_FEE_MULTIPLIER}, got '${text}'`);
  }
  return v;
}

function manualFee(opts: FeeOptions, version: number): TransactionFee | undefined {
  const maxFee =
    opts.maxFeeRaw !== undefined
      ? parseNonNegative(opts.maxFeeRaw, '--max-fee-raw')
      : opts.maxFee !== undefined
        ? parseUnits(opts.maxFee, 18)
        : undefined;

  const bound = (amount: string | undefined, price: string | undefined, name: string): ResourceBound | undefined =>
    amount === undefined && price === undefined
      ? undefined
      : {
          maxAmount: amount === undefined ? 0n : parseNonNegative(amount, `--${name}`),
          maxPricePerUnit: price === undefined ? 0n : parseNonNegative(price, `--${name}-price`),
        };
  const l1Gas = bound(opts.l1Gas, opts.l1GasPrice, 'l1-gas');
  const l2Gas = bound(opts.l2Gas, opts.l2GasPrice, 'l2-gas');
  const l1DataGas = bound(opts.l1DataGas, opts.l1DataGasPrice, 'l1-data-gas');
  const hasBounds = l1Gas !== undefined || l2Gas !== undefined || l1DataGas !== undefined;

  if (maxFee !== undefined && hasBounds) {
    throw new EncodingError('Malformed', '--max-fee and resource bounds cannot be combined');
  }
  if (maxFee !== undefined) {
    if (version === 3) throw new EncodingError('Malformed', '--max-fee applies to v1/v2 transactions; use --l1-gas etc. for v3');
    return { kind: 'max-fee', maxFee };
  }
  if (hasBounds) {
    if (version !== 3) throw new EncodingError('Malformed', 'Resource bounds apply to v3 transactions only');
    const zero = { maxAmount: 0n, maxPricePerUnit: 0n };
    return {
      kind: 'resource-bounds',
      bounds: { l1Gas: l1Gas ?? zero, l2Gas: l2Gas ?? zero, l1DataGas: l1DataGas ?? zero },
    };
  }
  return undefined;
}

/** A manual fee when one is given (and not in estimate-only mode), otherwise estimation. */
export function feeSettingFromOptions(opts: FeeOptions, version: number, defaultMultiplier: number): FeeSetting {
  const multiplier = opts.feeMultiplier !== undefined ? parseMultiplier(opts.feeMultiplier) : defaultMultiplier;
  const fee = manualFee(opts, version);
  if (fee && !opts.estimateOnly) return { kind: 'manual', fee };
  return { kind: 'estimate', multiplier };
}

const KNOWN_CHAINS: Record<string, string> = {
  SN_MAIN: 'SN_MAIN',
  MAINNET: 'SN_MAIN',
  SN_SEPOLIA: 'SN_SEPOLIA',
  SEPOLIA: 'SN_SEPOLIA',
};

/** `SN_MAIN`, `SN_SEPOLIA` (or `mainnet`, `sepolia`), or a raw felt. */
export function parseChainId(text: string): Felt {
  const key = text.trim().toUpperCase();
  const name = Object.hasOwn(KNOWN_CHAINS, key) ? KNOWN_CHAINS[key] : undefined;
  if (name) return encodeShortString(name);
  return parseFelt(text);
}
