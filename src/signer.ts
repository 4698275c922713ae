import { ec } from 'starknet';
import { CryptoError } from './errors.js';
import { type Felt, bytesToBigint, feltToBytes, formatFeltPadded, parseFelt, toFelt } from './felt.js';
import { readKeystore, releaseSecret, withUnlockedSecret } from './keystore.js';
import type { PasswordProvider } from './password.js';

/** Order of the STARK curve's generator. */
export const CURVE_ORDER = 0x0800000000000010ffffffffffffffffb781126dcae7b2321e66a241adc64d2fn;

export type Signature = readonly [r: Felt, s: Felt];

export interface TransactionSigner {
  getPublicKey(): Promise<Felt>;
  signHash(hash: Felt): Promise<Signature>;
}

export type SignerSource =
  | { kind: 'keystore'; path: string; password: PasswordProvider }
  | { kind: 'private-key'; key: string };

function isValidScalar(k: bigint): boolean {
  return k > 0n && k < CURVE_ORDER;
}

function signWith(secret: Uint8Array, hash: Felt): Signature {
  const { r, s } = ec.starkCurve.sign(formatFeltPadded(hash), secret);
  return [toFelt(r), toFelt(s)];
}

export function publicKeyOf(secret: Uint8Array): Felt {
  return parseFelt(ec.starkCurve.getStarkKey(secret));
}

/**
 * Checks `signature` against a STARK public key. The key is the x-coordinate
 * only, so both points sharing it are tried.
 */
export function verifySignature(publicKey: Felt, hash: Felt, signature: Signature): boolean {
  const [r, s] = signature;
  const sig = new ec.starkCurve.Signature(r, s);
  const x = publicKey.toString(16).padStart(64, '0');
  return ['02', '03'].some((parity) => {
    try {
      return ec.starkCurve.verify(sig, formatFeltPadded(hash), parity + x);
    } catch {
      return false;
    }
  });
}

export function generatePrivateKey(): Uint8Array {
  for (;;) {
    const candidate = new Uint8Array(ec.starkCurve.utils.randomPrivateKey());
    if (isValidScalar(bytesToBigint(candidate))) return candidate;
    releaseSecret(candidate);
  }
}

/** Validates a private key and returns its 32 big-endian bytes. */
export function privateKeyBytes(key: string | Uint8Array): Uint8Array {
  let value: bigint;
  try {
    value = typeof key === 'string' ? parseFelt(key) : bytesToBigint(key);
  } catch (e) {
    throw new CryptoError('InvalidPrivateKey', 'Private key is not a number', { cause: e });
  }
  if (!isValidScalar(value)) {
    throw new CryptoError('InvalidPrivateKey', 'Private key must be in [1, n) for the STARK curve order n');
  }
  return feltToBytes(toFelt(value));
}

/**
 * Signs with a scalar handed over directly, e.g. from `STARKNET_PRIVATE_KEY`.
 */
export class PrivateKeySigner implements TransactionSigner {
  readonly #secret: Uint8Array;

  constructor(key: string | Uint8Array) {
    this.#secret = privateKeyBytes(key);
  }

  async getPublicKey(): Promise<Felt> {
    return publicKeyOf(this.#secret);
  }

  async signHash(hash: Felt): Promise<Signature> {
    return signWith(this.#secret, hash);
  }
}

/**
 * Decrypts the keystore for every operation and wipes the plaintext right
 * after; only the path and a password provider are retained.
 */
export class KeystoreSigner implements TransactionSigner {
  constructor(
    readonly path: string,
    private readonly password: PasswordProvider,
  ) {}

  async getPublicKey(): Promise<Felt> {
    return this.withSecret((secret) => publicKeyOf(secret));
  }

  async signHash(hash: Felt): Promise<Signature> {
    return this.withSecret((secret) => signWith(secret, hash));
  }

  private async withSecret<T>(fn: (secret: Uint8Array) => T): Promise<T> {
    const record = readKeystore(this.path);
    const password = await this.password();
    return withUnlockedSecret(record, password, (secret) => {
      if (!isValidScalar(bytesToBigint(secret))) {
        throw new CryptoError('DecryptedSecretOutOfRange', 'Decrypted keystore secret is not a valid STARK private key');
      }
      return fn(secret);
    });
  }
}

export function createSigner(source: SignerSource): TransactionSigner {
  switch (source.kind) {
    case 'keystore':
      return new KeystoreSigner(source.path, source.password);
    case 'private-key':
      return new PrivateKeySigner(source.key);
  }
}
