import { describe, expect, it, vi } from 'vitest';
import { loadContractClass } from '../src/artifacts.js';
import { type BuilderOptions, TransactionBuilder } from '../src/builder.js';
import { DEFAULT_UDC_ADDRESS, callOf, computeUdcDeployedAddress, encodeExecuteCalldata, udcDeployCall } from '../src/calls.js';
import { computeSierraClassHash } from '../src/class-hash.js';
import { CryptoError, ProviderError, StateError, UnsupportedFormatError } from '../src/errors.js';
import { type Felt, toFelt } from '../src/felt.js';
import { type FeeEstimate, FeeEstimateSchema, type TransactionFee } from '../src/fees.js';
import { encodeShortString } from '../src/hashing.js';
import type { SignedTransaction, TransactionProvider } from '../src/provider.js';
import { PrivateKeySigner, type TransactionSigner, verifySignature } from '../src/signer.js';
import { type UnsignedTransaction, ZERO_BOUNDS, computeTransactionHash } from '../src/tx-hash.js';
import { fixture, rejection, thrown } from './helpers.js';

const f = (v: bigint | number): Felt => toFelt(BigInt(v));
const SEPOLIA = encodeShortString('SN_SEPOLIA');
const ACCOUNT = { address: f(0xacc), cairoVersion: 1 } as const;
const CALL = callOf(f(0xc0de), 'transfer', [f(1), f(2)]);
const signer = new PrivateKeySigner('0x1234abcd');

const ESTIMATE: FeeEstimate = FeeEstimateSchema.parse({
  l1_gas_consumed: '0x0',
  l1_gas_price: '0x64',
  l2_gas_consumed: '0x3e8',
  l2_gas_price: '0xa',
  l1_data_gas_consumed: '0x80',
  l1_data_gas_price: '0x3',
  overall_fee: '0x2904',
  unit: 'FRI',
});

const BOUNDS_FEE: TransactionFee = {
  kind: 'resource-bounds',
  bounds: {
    l1Gas: { maxAmount: 1n, maxPricePerUnit: 2n },
    l2Gas: { maxAmount: 3n, maxPricePerUnit: 4n },
    l1DataGas: { maxAmount: 5n, maxPricePerUnit: 6n },
  },
};

function fakeProvider() {
  const getNonce = vi.fn(async (_address: Felt): Promise<Felt> => f(7));
  const estimateFee = vi.fn(async (_tx: UnsignedTransaction): Promise<FeeEstimate> => ESTIMATE);
  const submit = vi.fn(async (_tx: SignedTransaction) => ({ transactionHash: f(0x99) }));
  const provider: TransactionProvider = {
    getChainId: async () => SEPOLIA,
    getNonce,
    estimateFee,
    submit,
    call: async (): Promise<Felt[]> => [],
    getClassAt: async () => ({}),
    waitForTransaction: async (hash) => ({ transactionHash: hash, executionStatus: 'SUCCEEDED', finalityStatus: 'ACCEPTED_ON_L2' }),
  };
  return { provider, getNonce, estimateFee, submit };
}

function options(provider: TransactionProvider, extra: Partial<BuilderOptions> = {}): BuilderOptions {
  return { account: ACCOUNT, chainId: SEPOLIA, provider, signer, fee: { kind: 'estimate', multiplier: 1.5 }, ...extra };
}

function sierraClass() {
  const cls = loadContractClass(fixture('sierra.json'));
  if (cls.format !== 'sierra') throw new Error('fixture is not a Sierra class');
  return cls;
}

describe('TransactionBuilder', () => {
  it('builds a signed v3 invoke step by step', async () => {
    const { provider, estimateFee, submit } = fakeProvider();
    const builder = new TransactionBuilder({ kind: 'invoke', call: CALL }, options(provider));
    expect(builder.stage).toBe('draft');

    expect(await builder.resolveNonce()).toBe(7n);
    expect(builder.stage).toBe('resolved-nonce');

    const fee = await builder.estimateFee();
    expect(fee).toEqual({
      fee: {
        kind: 'resource-bounds',
        bounds: {
          l1Gas: { maxAmount: 0n, maxPricePerUnit: 150n },
          l2Gas: { maxAmount: 1500n, maxPricePerUnit: 15n },
          l1DataGas: { maxAmount: 192n, maxPricePerUnit: 5n },
        },
      },
      estimate: ESTIMATE,
      usedFallback: false,
    });
    expect(estimateFee.mock.calls[0]).toMatchObject([{ type: 'INVOKE', version: 3, nonce: 7n, resourceBounds: ZERO_BOUNDS }]);

    const hash = await builder.computeHash();
    const tx = await builder.sign();
    expect(builder.stage).toBe('signed');
    expect(tx).toMatchObject({ type: 'INVOKE', version: 3, calldata: encodeExecuteCalldata([CALL], 1) });

    expect(computeTransactionHash(tx, SEPOLIA)).toBe(hash);
    expect(builder.hash).toBe(hash);
    expect(verifySignature(await signer.getPublicKey(), hash, tx.signature)).toBe(true);

    expect(await builder.submit()).toEqual({ transactionHash: 0x99n });
    expect(submit).toHaveBeenCalledWith(tx);
  });

  it('signs and submits exactly the transaction that was hashed', async () => {
    const { provider, submit } = fakeProvider();
    const calls = [CALL];
    const builder = new TransactionBuilder({ kind: 'multicall', calls }, options(provider));
    await builder.resolveNonce();
    await builder.estimateFee();
    const hash = await builder.computeHash();

    calls.push(callOf(f(0xbad), 'drain', [f(99)]));
    builder.calls().push(callOf(f(0xbad), 'drain', [f(99)]));
    const tx = await builder.sign();
    expect(tx.type === 'INVOKE' && tx.calldata).toEqual(encodeExecuteCalldata([CALL], 1));
    expect(computeTransactionHash(tx, SEPOLIA)).toBe(hash);

    await builder.submit();
    const sent = submit.mock.calls[0][0];
    expect(computeTransactionHash(sent, SEPOLIA)).toBe(hash);
  });

  it('builds v1 invokes with a padded max fee and the Cairo 0 layout', async () => {
    const { provider } = fakeProvider();
    const calls = [CALL, callOf(f(0xbeef), 'approve')];
    const builder = new TransactionBuilder(
      { kind: 'multicall', calls },
      options(provider, { version: 1, account: { address: f(0xacc), cairoVersion: 0 } }),
    );
    const tx = await builder.build();
    expect(tx).toMatchObject({ type: 'INVOKE', version: 1, maxFee: 15750n, calldata: encodeExecuteCalldata(calls, 0) });
  });

  it('refuses steps out of order without changing state', async () => {
    const { provider } = fakeProvider();
    const builder = new TransactionBuilder({ kind: 'invoke', call: CALL }, options(provider));
    const err = await rejection(builder.computeHash());
    expect(err).toBeInstanceOf(StateError);
    expect(err).toMatchObject({ code: 'IllegalTransition' });
    expect(await rejection(builder.sign())).toMatchObject({ code: 'IllegalTransition' });
    expect(await rejection(builder.submit())).toMatchObject({ code: 'IllegalTransition' });
    expect(builder.stage).toBe('draft');
    expect(await builder.resolveNonce()).toBe(7n);
  });

  it('fails permanently when a step fails', async () => {
    const { provider, getNonce } = fakeProvider();
    const cause = new Error('node down');
    getNonce.mockRejectedValueOnce(cause);
    const builder = new TransactionBuilder({ kind: 'invoke', call: CALL }, options(provider));

    expect(await rejection(builder.resolveNonce())).toBe(cause);
    expect(builder.stage).toBe('failed');
    const err = await rejection(builder.build());
    expect(err).toMatchObject({ code: 'BuilderFailed', cause });
    expect(await rejection(builder.resolveNonce())).toMatchObject({ code: 'BuilderFailed' });
  });

  it('refuses a step while another is running', async () => {
    const { provider, getNonce } = fakeProvider();
    let release: (nonce: Felt) => void = () => undefined;
    getNonce.mockImplementationOnce(
      () =>
        new Promise<Felt>((resolve) => {
          release = resolve;
        }),
    );
    const builder = new TransactionBuilder({ kind: 'invoke', call: CALL }, options(provider));

    const first = builder.resolveNonce();
    expect(await rejection(builder.resolveNonce())).toMatchObject({ code: 'IllegalTransition' });
    release(f(3));
    expect(await first).toBe(3n);
    expect(builder.stage).toBe('resolved-nonce');
  });

  it('skips the nonce query when a nonce is given', async () => {
    const { provider, getNonce } = fakeProvider();
    const builder = new TransactionBuilder({ kind: 'invoke', call: CALL }, options(provider, { nonce: f(42) }));
    await builder.build();
    expect(builder.nonce).toBe(42n);
    expect(getNonce).not.toHaveBeenCalled();
  });

  it('uses a manual fee without estimating', async () => {
    const { provider, estimateFee } = fakeProvider();
    const builder = new TransactionBuilder(
      { kind: 'invoke', call: CALL },
      options(provider, { fee: { kind: 'manual', fee: BOUNDS_FEE } }),
    );
    await builder.build();
    expect(builder.fee).toEqual({ fee: BOUNDS_FEE, usedFallback: false });
    expect(estimateFee).not.toHaveBeenCalled();
  });

  it('falls back to the configured fee when estimation fails', async () => {
    const { provider, estimateFee } = fakeProvider();
    estimateFee.mockRejectedValueOnce(new ProviderError('Rejected', 'simulation failed'));
    const builder = new TransactionBuilder(
      { kind: 'invoke', call: CALL },
      options(provider, { fee: { kind: 'estimate', multiplier: 1.5, fallback: BOUNDS_FEE } }),
    );
    await builder.build();
    expect(builder.fee).toEqual({ fee: BOUNDS_FEE, usedFallback: true });
  });

  it('reports estimation failures without a fallback', async () => {
    const { provider, estimateFee } = fakeProvider();
    estimateFee.mockRejectedValueOnce(new ProviderError('Rejected', 'simulation failed'));
    const builder = new TransactionBuilder({ kind: 'invoke', call: CALL }, options(provider));
    await builder.resolveNonce();
    const err = await rejection(builder.estimateFee());
    expect(err).toBeInstanceOf(ProviderError);
    expect(err).toMatchObject({ code: 'FeeEstimationFailed' });
    expect(builder.stage).toBe('failed');
  });

  it('moves to failed when signing fails', async () => {
    const { provider } = fakeProvider();
    const failing: TransactionSigner = {
      getPublicKey: async () => f(1),
      signHash: async () => {
        throw new CryptoError('InvalidPassword', 'Invalid keystore password');
      },
    };
    const builder = new TransactionBuilder({ kind: 'invoke', call: CALL }, options(provider, { signer: failing }));
    expect(await rejection(builder.build())).toMatchObject({ code: 'InvalidPassword' });
    expect(builder.stage).toBe('failed');
  });

  it('rejects fees that do not match the version', () => {
    const { provider } = fakeProvider();
    const err = thrown(
      () =>
        new TransactionBuilder(
          { kind: 'invoke', call: CALL },
          options(provider, { version: 1, fee: { kind: 'manual', fee: BOUNDS_FEE } }),
        ),
    );
    expect(err).toMatchObject({ code: 'FeeVersionMismatch' });
    expect(
      thrown(
        () =>
          new TransactionBuilder(
            { kind: 'invoke', call: CALL },
            options(provider, { fee: { kind: 'estimate', multiplier: 1, fallback: { kind: 'max-fee', maxFee: 1n } } }),
          ),
      ),
    ).toMatchObject({ code: 'FeeVersionMismatch' });
  });

  it('rejects unsupported versions', () => {
    const { provider } = fakeProvider();
    expect(thrown(() => new TransactionBuilder({ kind: 'invoke', call: CALL }, options(provider, { version: 2 })))).toMatchObject({
      code: 'UnsupportedTransaction',
    });
  });
});

describe('declare and deploy intents', () => {
  it('declares Sierra classes under their class hash', async () => {
    const { provider } = fakeProvider();
    const cls = sierraClass();
    const builder = new TransactionBuilder({ kind: 'declare', contractClass: cls, compiledClassHash: f(0x22) }, options(provider));
    expect(builder.declaredClassHash).toBe(computeSierraClassHash(cls.contractClass));
    expect(builder.calls()).toEqual([]);
    const tx = await builder.build();
    expect(tx).toMatchObject({ type: 'DECLARE', version: 3, classHash: builder.declaredClassHash, compiledClassHash: 0x22n });
  });

  it('refuses legacy classes and v1 declarations', () => {
    const { provider } = fakeProvider();
    const legacy = loadContractClass(fixture('legacy.json'));
    const err = thrown(
      () => new TransactionBuilder({ kind: 'declare', contractClass: legacy, compiledClassHash: f(0) }, options(provider)),
    );
    expect(err).toBeInstanceOf(UnsupportedFormatError);
    expect(err).toMatchObject({ code: 'UnsupportedClassVersion' });
    expect(
      thrown(
        () =>
          new TransactionBuilder(
            { kind: 'declare', contractClass: sierraClass(), compiledClassHash: f(0) },
            options(provider, { version: 1 }),
          ),
      ),
    ).toMatchObject({ code: 'UnsupportedTransaction' });
  });

  it('predicts the address of a deployment', () => {
    const { provider } = fakeProvider();
    const deployment = { classHash: f(0x1234), salt: f(5), unique: true, constructorCalldata: [f(9)] };
    const builder = new TransactionBuilder({ kind: 'deploy', deployment }, options(provider));
    expect(builder.predictedAddress).toBe(computeUdcDeployedAddress(deployment, ACCOUNT.address, DEFAULT_UDC_ADDRESS));
    expect(builder.calls()).toEqual([udcDeployCall(deployment)]);
  });
});
