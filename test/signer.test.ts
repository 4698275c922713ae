import path from 'node:path';
import { describe, expect, it, vi } from 'vitest';
import { ec } from 'starknet';
import { CryptoError } from '../src/errors.js';
import { formatFeltPadded, toFelt } from '../src/felt.js';
import { createKeystore } from '../src/keystore.js';
import { staticPassword } from '../src/password.js';
import {
  CURVE_ORDER,
  KeystoreSigner,
  PrivateKeySigner,
  createSigner,
  generatePrivateKey,
  privateKeyBytes,
  publicKeyOf,
  verifySignature,
} from '../src/signer.js';
import { rejection, tempDir, thrown } from './helpers.js';

const KEY = toFelt(0x1234abcdn);
const HASH = toFelt(0x2f1c3bn);

describe('private keys', () => {
  it('rejects zero and scalars outside the curve order', () => {
    for (const key of ['0x0', `0x${CURVE_ORDER.toString(16)}`, 'not-a-key']) {
      const err = thrown(() => privateKeyBytes(key));
      expect(err).toBeInstanceOf(CryptoError);
      expect(err).toMatchObject({ code: 'InvalidPrivateKey' });
    }
  });

  it('generates valid keys', () => {
    const key = generatePrivateKey();
    expect(key).toHaveLength(32);
    expect(privateKeyBytes(key)).toEqual(key);
  });
});

describe('PrivateKeySigner', () => {
  const signer = new PrivateKeySigner(formatFeltPadded(KEY));

  it('derives the STARK public key', async () => {
    expect(await signer.getPublicKey()).toBe(BigInt(ec.starkCurve.getStarkKey(formatFeltPadded(KEY))));
  });

  it('produces deterministic signatures over the hash', async () => {
    const expected = ec.starkCurve.sign(formatFeltPadded(HASH), formatFeltPadded(KEY));
    expect(await signer.signHash(HASH)).toEqual([expected.r, expected.s]);
    expect(await signer.signHash(HASH)).toEqual(await signer.signHash(HASH));
  });

  it('signatures verify against the public key and nothing else', async () => {
    const publicKey = await signer.getPublicKey();
    const signature = await signer.signHash(HASH);
    expect(verifySignature(publicKey, HASH, signature)).toBe(true);
    expect(verifySignature(publicKey, toFelt(HASH + 1n), signature)).toBe(false);
  });
});

describe('KeystoreSigner', () => {
  async function keystoreFile(): Promise<string> {
    const file = path.join(tempDir(), 'key.json');
    await createKeystore(file, privateKeyBytes(KEY), 'test-secret', { kdf: { kdf: 'scrypt', n: 1024, r: 8, p: 1 } });
    return file;
  }

  it('asks for the password on every operation', async () => {
    const password = vi.fn(async () => 'test-secret');
    const signer = new KeystoreSigner(await keystoreFile(), password);
    expect(await signer.getPublicKey()).toBe(publicKeyOf(privateKeyBytes(KEY)));
    expect(await signer.signHash(HASH)).toEqual(await new PrivateKeySigner(privateKeyBytes(KEY)).signHash(HASH));
    expect(password).toHaveBeenCalledTimes(2);
  });

  it('fails on a wrong password', async () => {
    const signer = createSigner({ kind: 'keystore', path: await keystoreFile(), password: staticPassword('wrong') });
    expect(await rejection(signer.signHash(HASH))).toMatchObject({ code: 'InvalidPassword' });
  });

  it('reports a missing keystore', async () => {
    const signer = createSigner({ kind: 'keystore', path: path.join(tempDir(), 'none.json'), password: staticPassword('x') });
    expect(await rejection(signer.getPublicKey())).toMatchObject({ code: 'NotFound' });
  });
});
