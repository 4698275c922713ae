import { z } from 'zod';
import { EncodingError } from './errors.js';

declare const feltBrand: unique symbol;

/** Starknet field element: an integer in `[0, P)`. */
export type Felt = bigint & { readonly [feltBrand]: true };

export type Radix = 'hex' | 'dec';

// P = 2^251 + 17 * 2^192 + 1
export const FIELD_PRIME = 2n ** 251n + 17n * 2n ** 192n + 1n;
export const FELT_MAX = FIELD_PRIME - 1n;

const HEX_RE = /^0[xX][0-9a-fA-F]+$/;
const DEC_RE = /^[0-9]+$/;

export function isFelt(value: bigint): value is Felt {
  return value >= 0n && value < FIELD_PRIME;
}

export function toFelt(value: bigint | number): Felt {
  const v = BigInt(value);
  if (!isFelt(v)) {
    throw new EncodingError('OutOfRange', `Value ${v} is outside the field [0, P)`);
  }
  return v;
}

/** Reduces any integer (negative ones included) into the field. */
export function feltFromModulo(value: bigint): Felt {
  const r = value % FIELD_PRIME;
  return toFelt(r < 0n ? r + FIELD_PRIME : r);
}

export function parseFelt(text: string): Felt {
  const s = text.trim();
  if (!HEX_RE.test(s) && !DEC_RE.test(s)) {
    throw new EncodingError('Malformed', `Not a decimal or 0x-prefixed hex number: '${text}'`);
  }
  return toFelt(BigInt(s));
}

export function formatFelt(value: Felt, radix: Radix = 'hex'): string {
  return radix === 'hex' ? `0x${value.toString(16)}` : value.toString(10);
}

/** `0x` followed by exactly 64 hex digits. */
export function formatFeltPadded(value: Felt): string {
  return `0x${value.toString(16).padStart(64, '0')}`;
}

export function feltToBytes(value: Felt, width = 32): Uint8Array {
  return bigintToBytes(value, width);
}

export function bigintToBytes(value: bigint, width: number): Uint8Array {
  if (value < 0n) throw new EncodingError('OutOfRange', `Negative value ${value} has no byte encoding`);
  if (value >= 1n << BigInt(width * 8)) {
    throw new EncodingError('Overflow', `Value ${value} does not fit in ${width} bytes`);
  }
  const out = new Uint8Array(width);
  let v = value;
  for (let i = width - 1; i >= 0; i--) {
    out[i] = Number(v & 0xffn);
    v >>= 8n;
  }
  return out;
}

export function bytesToBigint(bytes: Uint8Array): bigint {
  let v = 0n;
  for (const b of bytes) v = (v << 8n) | BigInt(b);
  return v;
}

export function feltFromBytes(bytes: Uint8Array): Felt {
  if (bytes.length > 32) {
    throw new EncodingError('Overflow', `${bytes.length} bytes do not fit in a felt`);
  }
  return toFelt(bytesToBigint(bytes));
}

export function feltFromHexOrDec(value: string | bigint | number): Felt {
  return typeof value === 'string' ? parseFelt(value) : toFelt(value);
}

/** zod schema for felt text as nodes and config files write it. */
export const FeltSchema = z.string().transform((s, ctx) => {
  try {
    return parseFelt(s);
  } catch {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `not a felt: ${s}` });
    return z.NEVER;
  }
});
