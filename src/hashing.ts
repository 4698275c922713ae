import { ec, hash, shortString } from 'starknet';
import { EncodingError } from './errors.js';
import { type Felt, toFelt } from './felt.js';

export type HashFamily = 'pedersen' | 'poseidon';

export function pedersen(a: Felt, b: Felt): Felt {
  return toFelt(BigInt(ec.starkCurve.pedersen(a, b)));
}

export function poseidon(a: Felt, b: Felt): Felt {
  return toFelt(ec.starkCurve.poseidonHash(a, b));
}

/**
 * Pedersen chain over the elements followed by their count:
 * `h(h(h(h(0, x1), x2), ...), n)`.
 */
export function pedersenArray(values: readonly Felt[]): Felt {
  let acc = toFelt(0n);
  for (const v of values) acc = pedersen(acc, v);
  return pedersen(acc, toFelt(BigInt(values.length)));
}

export function poseidonArray(values: readonly Felt[]): Felt {
  return toFelt(ec.starkCurve.poseidonHashMany([...values]));
}

export function arrayHash(family: HashFamily, values: readonly Felt[]): Felt {
  return family === 'pedersen' ? pedersenArray(values) : poseidonArray(values);
}

export function pairHash(family: HashFamily, a: Felt, b: Felt): Felt {
  return family === 'pedersen' ? pedersen(a, b) : poseidon(a, b);
}

/** Keccak-256 of the UTF-8 text, truncated to its low 250 bits. */
export function starknetKeccak(text: string): Felt {
  return toFelt(hash.starknetKeccak(text));
}

export function selectorFromName(name: string): Felt {
  return toFelt(BigInt(hash.getSelectorFromName(name)));
}

// Control characters are excluded: the library writes each character as unpadded hex.
const SHORT_STRING_CHARS = /^[\x20-\x7e]*$/;

export function encodeShortString(text: string): Felt {
  if (!shortString.isShortString(text)) {
    throw new EncodingError('Overflow', `Short string '${text}' is longer than 31 characters`);
  }
  if (!SHORT_STRING_CHARS.test(text)) {
    throw new EncodingError('Malformed', `Short string '${text}' is not printable ASCII`);
  }
  if (text === '') return toFelt(0n);
  return toFelt(BigInt(shortString.encodeShortString(text)));
}

export function decodeShortString(value: Felt): string {
  let hex = value.toString(16);
  if (hex.length % 2) hex = `0${hex}`;
  if (hex.length > 62) {
    throw new EncodingError('Overflow', `Felt ${value} is longer than 31 bytes`);
  }
  const text = value === 0n ? '' : shortString.decodeShortString(`0x${hex}`);
  if (!shortString.isASCII(text)) {
    throw new EncodingError('Malformed', `Felt ${value} is not an ASCII short string`);
  }
  return text;
}
