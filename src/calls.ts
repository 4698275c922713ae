import { EncodingError } from './errors.js';
import { type Felt, FIELD_PRIME, parseFelt, toFelt } from './felt.js';
import { encodeShortString, pedersen, pedersenArray, selectorFromName } from './hashing.js';

export interface Call {
  to: Felt;
  selector: Felt;
  calldata: Felt[];
}

/** Account multicall layout: Cairo 0 accounts take offsets into a shared data tail. */
export type CairoVersion = 0 | 1;

export function callOf(to: Felt, entrypoint: string, calldata: readonly Felt[] = []): Call {
  return { to, selector: selectorFromName(entrypoint), calldata: [...calldata] };
}

function count(n: number): Felt {
  return toFelt(BigInt(n));
}

export function encodeExecuteCalldata(calls: readonly Call[], cairoVersion: CairoVersion = 1): Felt[] {
  if (cairoVersion === 1) {
    return [count(calls.length), ...calls.flatMap((c) => [c.to, c.selector, count(c.calldata.length), ...c.calldata])];
  }

  const headers: Felt[] = [];
  const data: Felt[] = [];
  for (const c of calls) {
    headers.push(c.to, c.selector, count(data.length), count(c.calldata.length));
    data.push(...c.calldata);
  }
  return [count(calls.length), ...headers, count(data.length), ...data];
}

class Reader {
  pos = 0;

  constructor(readonly felts: readonly Felt[]) {}

  next(what: string): Felt {
    const v = this.felts[this.pos];
    if (v === undefined) throw new EncodingError('Malformed', `Execute calldata ended while reading ${what}`);
    this.pos++;
    return v;
  }

  length(what: string): number {
    const v = this.next(what);
    if (v > BigInt(this.felts.length - this.pos)) {
      throw new EncodingError('Malformed', `${what} ${v} exceeds the remaining calldata`);
    }
    return Number(v);
  }

  take(n: number): Felt[] {
    const out = this.felts.slice(this.pos, this.pos + n);
    this.pos += n;
    return out;
  }
}

/**
 * Splits `__execute__` calldata back into calls. Anything that does not
 * partition exactly (gaps, overlaps, trailing felts) is rejected.
 */
export function decodeExecuteCalldata(felts: readonly Felt[], cairoVersion: CairoVersion = 1): Call[] {
  const r = new Reader(felts);
  const n = r.length('call count');
  const calls: Call[] = [];

  if (cairoVersion === 1) {
    for (let i = 0; i < n; i++) {
      const to = r.next('call target');
      const selector = r.next('call selector');
      const len = r.length('call data length');
      calls.push({ to, selector, calldata: r.take(len) });
    }
  } else {
    const headers: { to: Felt; selector: Felt; offset: bigint; len: bigint }[] = [];
    for (let i = 0; i < n; i++) {
      headers.push({ to: r.next('call target'), selector: r.next('call selector'), offset: r.next('data offset'), len: r.next('data length') });
    }
    const total = r.length('total data length');
    const data = r.take(total);
    let expected = 0n;
    for (const h of headers) {
      if (h.offset !== expected) {
        throw new EncodingError('Malformed', `Call data offset ${h.offset} does not follow the previous call (expected ${expected})`);
      }
      expected += h.len;
      if (expected > BigInt(total)) {
        throw new EncodingError('Malformed', `Call data runs past the declared total of ${total}`);
      }
      calls.push({ to: h.to, selector: h.selector, calldata: data.slice(Number(h.offset), Number(expected)) });
    }
    if (expected !== BigInt(total)) {
      throw new EncodingError('Malformed', `Calls cover ${expected} of ${total} data felts`);
    }
  }

  if (r.pos !== felts.length) {
    throw new EncodingError('Malformed', `${felts.length - r.pos} trailing felt(s) after execute calldata`);
  }
  return calls;
}

// ---------------------------------------------------------------------------
// Universal Deployer Contract
// ---------------------------------------------------------------------------

export const DEFAULT_UDC_ADDRESS = parseFelt('0x041a78e741e5af2fec34b695679bc6891742439f7afb8484ecd7766661ad02bf');

// 2^251 - 256
export const ADDRESS_BOUND = 2n ** 251n - 256n;

const CONTRACT_ADDRESS_PREFIX = encodeShortString('STARKNET_CONTRACT_ADDRESS');

export interface UdcDeployment {
  classHash: Felt;
  salt: Felt;
  /** Unique deployments mix the deployer's address into the salt. */
  unique: boolean;
  constructorCalldata: Felt[];
}

export function udcDeployCall(d: UdcDeployment, udc: Felt = DEFAULT_UDC_ADDRESS): Call {
  return callOf(udc, 'deployContract', [
    d.classHash,
    d.salt,
    toFelt(d.unique ? 1n : 0n),
    count(d.constructorCalldata.length),
    ...d.constructorCalldata,
  ]);
}

export function computeContractAddress(
  salt: Felt,
  classHash: Felt,
  constructorCalldata: readonly Felt[],
  deployer: Felt,
): Felt {
  const hash = pedersenArray([CONTRACT_ADDRESS_PREFIX, deployer, salt, classHash, pedersenArray(constructorCalldata)]);
  return toFelt(hash % ADDRESS_BOUND);
}

export function computeUdcDeployedAddress(d: UdcDeployment, sender: Felt, udc: Felt = DEFAULT_UDC_ADDRESS): Felt {
  if (d.unique) {
    return computeContractAddress(pedersen(sender, d.salt), d.classHash, d.constructorCalldata, udc);
  }
  return computeContractAddress(d.salt, d.classHash, d.constructorCalldata, toFelt(0n));
}

export interface SaltSearch {
  salt: Felt;
  address: Felt;
  attempts: number;
}

/**
 * Tries salts upward from `start` until the zero-padded 64-digit address
 * begins with `prefix` (hex digits, no `0x`). Gives up after `maxAttempts`.
 */
export function findSaltForPrefix(
  d: Omit<UdcDeployment, 'salt'>,
  sender: Felt,
  prefix: string,
  options: { start?: bigint; maxAttempts?: number; udc?: Felt } = {},
): SaltSearch {
  const want = prefix.toLowerCase().replace(/^0x/, '');
  if (!/^[0-9a-f]{1,64}$/.test(want)) {
    throw new EncodingError('Malformed', `Address prefix must be 1 to 64 hex digits, got '${prefix}'`);
  }
  const maxAttempts = options.maxAttempts ?? 1_000_000;
  let salt = options.start ?? 0n;
  for (let attempts = 1; attempts <= maxAttempts; attempts++, salt++) {
    const felt = toFelt(salt % FIELD_PRIME);
    const address = computeUdcDeployedAddress({ ...d, salt: felt }, sender, options.udc);
    if (address.toString(16).padStart(64, '0').startsWith(want)) {
      return { salt: felt, address, attempts };
    }
  }
  throw new EncodingError('Overflow', `No salt within ${maxAttempts} attempts gives an address starting with ${want}`);
}
