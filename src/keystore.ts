import fs from 'node:fs';
import path from 'node:path';
import { createCipheriv, createDecipheriv, randomBytes, randomUUID, timingSafeEqual } from 'node:crypto';
import { concat, getBytes, hexlify, keccak256, pbkdf2, scrypt, toUtf8Bytes } from 'ethers';
import { z } from 'zod';
import { CryptoError, StorageError, UnsupportedFormatError } from './errors.js';

/*
 * Web3 Secret Storage (v3) records. The 32-byte private scalar is AES-128-CTR encrypted under the first half of
 * a password-derived key; the MAC is keccak256(derivedKey[16..32] ++ ciphertext).
 */

export const KEYSTORE_VERSION = 3;
export const CIPHER = 'aes-128-ctr';
export const SECRET_LENGTH = 32;
const DKLEN = 32;

export interface ScryptParams {
  n: number;
  r: number;
  p: number;
  dklen: number;
  salt: string;
}

export interface Pbkdf2Params {
  c: number;
  dklen: number;
  prf: 'hmac-sha256';
  salt: string;
}

export type KeystoreKdf = { kdf: 'scrypt'; kdfparams: ScryptParams } | { kdf: 'pbkdf2'; kdfparams: Pbkdf2Params };

export type KeystoreCrypto = {
  cipher: typeof CIPHER;
  cipherparams: { iv: string };
  ciphertext: string;
  mac: string;
} & KeystoreKdf;

export interface KeystoreRecord {
  version: typeof KEYSTORE_VERSION;
  id: string;
  crypto: KeystoreCrypto;
}

/** Cost parameters for a new keystore; salts are always generated. */
export type KdfOptions = { kdf: 'scrypt'; n: number; r: number; p: number } | { kdf: 'pbkdf2'; c: number };

// 2^17 rounds of scrypt take on the order of a second in-process.
export const DEFAULT_KDF: KdfOptions = { kdf: 'scrypt', n: 131072, r: 8, p: 1 };

const Hex = z
  .string()
  .regex(/^(0x)?([0-9a-fA-F]{2})*$/, 'expected hex bytes')
  .transform((s) => (s.startsWith('0x') ? s.slice(2) : s).toLowerCase());

const RecordEnvelope = z.object({
  version: z.number(),
  id: z.string().default(''),
  crypto: z.object({
    cipher: z.string(),
    cipherparams: z.object({ iv: Hex }),
    ciphertext: Hex,
    kdf: z.string(),
    kdfparams: z.record(z.unknown()),
    mac: Hex,
  }),
});

const ScryptParamsSchema = z.object({
  n: z.number().int().refine(isPowerOfTwo, 'n must be a power of two greater than 1'),
  r: z.number().int().positive(),
  p: z.number().int().positive(),
  dklen: z.literal(DKLEN),
  salt: Hex,
});

const Pbkdf2ParamsSchema = z.object({
  c: z.number().int().positive(),
  dklen: z.literal(DKLEN),
  prf: z.string(),
  salt: Hex,
});

export function isPowerOfTwo(n: number): boolean {
  if (!Number.isSafeInteger(n) || n <= 1) return false;
  const v = BigInt(n);
  return (v & (v - 1n)) === 0n;
}

/**
 * Validates an already-parsed keystore JSON document. Every cryptographic
 * parameter is version-tagged in the record, so unknown values are rejected
 * rather than guessed.
 */
export function parseKeystore(raw: unknown): KeystoreRecord {
  const env = RecordEnvelope.safeParse(raw);
  if (!env.success) {
    throw new UnsupportedFormatError('MalformedKeystore', `Invalid keystore: ${env.error.message}`);
  }
  const { version, id, crypto } = env.data;

  if (version !== KEYSTORE_VERSION) {
    throw new UnsupportedFormatError('UnsupportedKeystoreVersion', `Unsupported keystore version ${version}`);
  }
  if (crypto.cipher !== CIPHER) {
    throw new UnsupportedFormatError('UnsupportedCipher', `Unsupported keystore cipher '${crypto.cipher}'`);
  }

  const common = {
    cipher: CIPHER,
    cipherparams: crypto.cipherparams,
    ciphertext: crypto.ciphertext,
    mac: crypto.mac,
  } as const;

  switch (crypto.kdf) {
    case 'scrypt': {
      const kdfparams = ScryptParamsSchema.safeParse(crypto.kdfparams);
      if (!kdfparams.success) {
        throw new UnsupportedFormatError('MalformedKeystore', `Invalid scrypt parameters: ${kdfparams.error.message}`);
      }
      return { version: KEYSTORE_VERSION, id, crypto: { ...common, kdf: 'scrypt', kdfparams: kdfparams.data } };
    }
    case 'pbkdf2': {
      const kdfparams = Pbkdf2ParamsSchema.safeParse(crypto.kdfparams);
      if (!kdfparams.success) {
        throw new UnsupportedFormatError('MalformedKeystore', `Invalid pbkdf2 parameters: ${kdfparams.error.message}`);
      }
      const { prf, ...rest } = kdfparams.data;
      if (prf !== 'hmac-sha256') {
        throw new UnsupportedFormatError('UnsupportedKdf', `Unsupported pbkdf2 prf '${prf}'`);
      }
      return { version: KEYSTORE_VERSION, id, crypto: { ...common, kdf: 'pbkdf2', kdfparams: { ...rest, prf } } };
    }
    default:
      throw new UnsupportedFormatError('UnsupportedKdf', `Unsupported keystore kdf '${crypto.kdf}'`);
  }
}

async function deriveKey(password: string, kdf: KeystoreKdf): Promise<Uint8Array> {
  const pw = toUtf8Bytes(password);
  if (kdf.kdf === 'scrypt') {
    const { n, r, p, dklen, salt } = kdf.kdfparams;
    return getBytes(await scrypt(pw, getBytes(`0x${salt}`), n, r, p, dklen));
  }
  const { c, dklen, salt } = kdf.kdfparams;
  return getBytes(pbkdf2(pw, getBytes(`0x${salt}`), c, dklen, 'sha256'));
}

function computeMac(derived: Uint8Array, ciphertext: Uint8Array): Uint8Array {
  return getBytes(keccak256(concat([derived.subarray(16, 32), ciphertext])));
}

function aes128Ctr(mode: 'encrypt' | 'decrypt', key: Uint8Array, iv: Uint8Array, data: Uint8Array): Uint8Array {
  let parts: Buffer[];
  if (mode === 'encrypt') {
    const c = createCipheriv(CIPHER, key, iv);
    parts = [c.update(data), c.final()];
  } else {
    const d = createDecipheriv(CIPHER, key, iv);
    parts = [d.update(data), d.final()];
  }
  const joined = Buffer.concat(parts);
  const out = new Uint8Array(joined);
  // intermediate copies may hold plaintext
  for (const b of [...parts, joined]) b.fill(0);
  return out;
}

export function releaseSecret(secret: Uint8Array): void {
  secret.fill(0);
}

export async function encryptKeystore(
  secret: Uint8Array,
  password: string,
  options: KdfOptions = DEFAULT_KDF,
): Promise<KeystoreRecord> {
  if (secret.length !== SECRET_LENGTH) {
    throw new CryptoError('InvalidPrivateKey', `Keystore secrets are ${SECRET_LENGTH} bytes, got ${secret.length}`);
  }

  const salt = hexlify(randomBytes(32)).slice(2);
  const kdf: KeystoreKdf =
    options.kdf === 'scrypt'
      ? { kdf: 'scrypt', kdfparams: { n: options.n, r: options.r, p: options.p, dklen: DKLEN, salt } }
      : { kdf: 'pbkdf2', kdfparams: { c: options.c, dklen: DKLEN, prf: 'hmac-sha256', salt } };
  if (kdf.kdf === 'scrypt' && !isPowerOfTwo(kdf.kdfparams.n)) {
    throw new UnsupportedFormatError('UnsupportedKdf', `scrypt n must be a power of two, got ${kdf.kdfparams.n}`);
  }

  const iv = new Uint8Array(randomBytes(16));
  const derived = await deriveKey(password, kdf);
  try {
    const ciphertext = aes128Ctr('encrypt', derived.subarray(0, 16), iv, secret);
    const mac = computeMac(derived, ciphertext);
    return {
      version: KEYSTORE_VERSION,
      id: randomUUID(),
      crypto: {
        cipher: CIPHER,
        cipherparams: { iv: hexlify(iv).slice(2) },
        ciphertext: hexlify(ciphertext).slice(2),
        mac: hexlify(mac).slice(2),
        ...kdf,
      },
    };
  } finally {
    derived.fill(0);
  }
}

/**
 * Recovers the secret scalar. The MAC is checked before anything is
 * decrypted; a mismatch is reported as a wrong password. The caller owns the
 * returned buffer and should {@link releaseSecret} it.
 */
export async function unlockKeystore(record: KeystoreRecord, password: string): Promise<Uint8Array> {
  const ciphertext = getBytes(`0x${record.crypto.ciphertext}`);
  if (ciphertext.length !== SECRET_LENGTH) {
    throw new CryptoError('CorruptCiphertext', `Keystore ciphertext is ${ciphertext.length} bytes, expected ${SECRET_LENGTH}`);
  }
  const iv = getBytes(`0x${record.crypto.cipherparams.iv}`);
  if (iv.length !== 16) {
    throw new CryptoError('CorruptCiphertext', `Keystore IV is ${iv.length} bytes, expected 16`);
  }

  const derived = await deriveKey(password, record.crypto);
  try {
    const expected = Buffer.from(getBytes(`0x${record.crypto.mac}`));
    const actual = Buffer.from(computeMac(derived, ciphertext));
    if (expected.length !== actual.length || !timingSafeEqual(expected, actual)) {
      throw new CryptoError('InvalidPassword', 'Invalid keystore password');
    }
    return aes128Ctr('decrypt', derived.subarray(0, 16), iv, ciphertext);
  } finally {
    derived.fill(0);
  }
}

/** Runs `fn` with the decrypted secret and zeroes it on every exit path. */
export async function withUnlockedSecret<T>(
  record: KeystoreRecord,
  password: string,
  fn: (secret: Uint8Array) => T | Promise<T>,
): Promise<T> {
  const secret = await unlockKeystore(record, password);
  try {
    return await fn(secret);
  } finally {
    releaseSecret(secret);
  }
}

export function readKeystore(file: string): KeystoreRecord {
  const p = path.resolve(file);
  if (!fs.existsSync(p)) throw new StorageError('NotFound', `Keystore file not found: ${p}`);
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(p, 'utf8'));
  } catch (e) {
    throw new UnsupportedFormatError('MalformedKeystore', `Keystore ${p} is not valid JSON`, { cause: e });
  }
  return parseKeystore(raw);
}

export function writeKeystore(file: string, record: KeystoreRecord, overwrite = false): string {
  const p = path.resolve(file);
  if (fs.existsSync(p) && !overwrite) {
    throw new StorageError('PathExists', `Keystore file already exists: ${p}`);
  }
  fs.mkdirSync(path.dirname(p), { recursive: true });
  fs.writeFileSync(p, JSON.stringify(record, null, 2), { encoding: 'utf8', mode: 0o600 });
  return p;
}

export async function createKeystore(
  file: string,
  secret: Uint8Array,
  password: string,
  options: { kdf?: KdfOptions; overwrite?: boolean } = {},
): Promise<KeystoreRecord> {
  const p = path.resolve(file);
  // fail before paying for key derivation
  if (fs.existsSync(p) && !options.overwrite) {
    throw new StorageError('PathExists', `Keystore file already exists: ${p}`);
  }
  const record = await encryptKeystore(secret, password, options.kdf ?? DEFAULT_KDF);
  writeKeystore(p, record, options.overwrite ?? false);
  return record;
}
