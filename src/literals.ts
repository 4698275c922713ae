import { uint256 } from 'starknet';
import { EncodingError } from './errors.js';
import { FELT_MAX, type Felt, parseFelt, toFelt } from './felt.js';
import { encodeShortString, selectorFromName } from './hashing.js';
import { resolveAddress } from './address-book.js';

const U128_MASK = (1n << 128n) - 1n;

const CONSTANTS: Record<string, readonly bigint[]> = {
  felt_max: [FELT_MAX],
  u8_max: [(1n << 8n) - 1n],
  u16_max: [(1n << 16n) - 1n],
  u32_max: [(1n << 32n) - 1n],
  u64_max: [(1n << 64n) - 1n],
  u128_max: [U128_MASK],
  u256_max: [U128_MASK, U128_MASK],
};

export function splitU256(value: bigint): [low: Felt, high: Felt] {
  if (value < 0n || value >= 1n << 256n) {
    throw new EncodingError('OutOfRange', `${value} is not a u256`);
  }
  const { low, high } = uint256.bnToUint256(value);
  return [toFelt(BigInt(low)), toFelt(BigInt(high))];
}

/** What literals may depend on besides their own text. */
export interface LiteralContext {
  chainId?: Felt;
}

/** Parses a non-negative or negative integer in decimal or 0x-hex. */
export function parseInteger(text: string): bigint {
  const s = text.trim();
  const m = /^(-)?(0[xX][0-9a-fA-F]+|[0-9]+)$/.exec(s);
  if (!m) throw new EncodingError('Malformed', `Not an integer: '${text}'`);
  const magnitude = BigInt(m[2]);
  return m[1] ? -magnitude : magnitude;
}

/**
 * Decodes one raw argument into felts:
 *
 * - `123`, `0x7b`: a felt
 * - `str:hello`: a Cairo short string
 * - `selector:transfer`: the entry point selector of a name
 * - `u256:<n>`: two felts, low then high
 * - `const:u256_max` etc.
 * - `addr:eth`: a well-known contract of the chain in `ctx`
 */
export function decodeLiteral(text: string, ctx: LiteralContext = {}): Felt[] {
  const idx = text.indexOf(':');
  if (idx === -1) return [parseFelt(text)];

  const prefix = text.slice(0, idx);
  const rest = text.slice(idx + 1);
  switch (prefix) {
    case 'str':
      return [encodeShortString(rest)];
    case 'selector':
      return [selectorFromName(rest)];
    case 'u256':
      return splitU256(parseInteger(rest));
    case 'addr':
      return [resolveAddress(rest, ctx.chainId)];
    case 'const': {
      const values = Object.hasOwn(CONSTANTS, rest) ? CONSTANTS[rest] : undefined;
      if (!values) {
        throw new EncodingError('Malformed', `Unknown constant '${rest}'. Known: ${Object.keys(CONSTANTS).join(', ')}`);
      }
      return values.map((v) => toFelt(v));
    }
    default:
      throw new EncodingError('Malformed', `Unknown literal prefix '${prefix}:' in '${text}'`);
  }
}

/** Decodes a literal that must produce exactly one felt. */
export function decodeSingleFelt(text: string, ctx: LiteralContext = {}): Felt {
  const felts = decodeLiteral(text, ctx);
  if (felts.length !== 1) {
    throw new EncodingError('Malformed', `'${text}' encodes ${felts.length} felts where one is expected`);
  }
  return felts[0];
}

export function decodeLiterals(texts: readonly string[], ctx: LiteralContext = {}): Felt[] {
  return texts.flatMap((t) => decodeLiteral(t, ctx));
}
