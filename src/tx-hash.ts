import { EncodingError } from './errors.js';
import { type Felt, toFelt } from './felt.js';
import { encodeShortString, pedersenArray, poseidonArray } from './hashing.js';
import type { SierraClass } from './artifacts.js';

/** Added to the version of transactions that are only ever simulated or estimated. */
export const QUERY_VERSION_BASE = 1n << 128n;

export type DataAvailabilityMode = 'L1' | 'L2';

export interface ResourceBound {
  maxAmount: bigint;
  maxPricePerUnit: bigint;
}

export interface ResourceBounds {
  l1Gas: ResourceBound;
  l2Gas: ResourceBound;
  l1DataGas: ResourceBound;
}

export interface V3Fields {
  resourceBounds: ResourceBounds;
  tip: bigint;
  paymasterData: Felt[];
  accountDeploymentData: Felt[];
  nonceDataAvailabilityMode: DataAvailabilityMode;
  feeDataAvailabilityMode: DataAvailabilityMode;
}

interface Common {
  senderAddress: Felt;
  nonce: Felt;
}

export type InvokeV1 = Common & { type: 'INVOKE'; version: 1; calldata: Felt[]; maxFee: bigint };
export type InvokeV3 = Common & V3Fields & { type: 'INVOKE'; version: 3; calldata: Felt[] };
export type DeclareV2 = Common & {
  type: 'DECLARE';
  version: 2;
  contractClass: SierraClass;
  classHash: Felt;
  compiledClassHash: Felt;
  maxFee: bigint;
};
export type DeclareV3 = Common &
  V3Fields & {
    type: 'DECLARE';
    version: 3;
    contractClass: SierraClass;
    classHash: Felt;
    compiledClassHash: Felt;
  };

export type UnsignedTransaction = InvokeV1 | InvokeV3 | DeclareV2 | DeclareV3;

export const ZERO_BOUNDS: ResourceBounds = {
  l1Gas: { maxAmount: 0n, maxPricePerUnit: 0n },
  l2Gas: { maxAmount: 0n, maxPricePerUnit: 0n },
  l1DataGas: { maxAmount: 0n, maxPricePerUnit: 0n },
};

export function defaultV3Fields(resourceBounds: ResourceBounds = ZERO_BOUNDS): V3Fields {
  return {
    resourceBounds,
    tip: 0n,
    paymasterData: [],
    accountDeploymentData: [],
    nonceDataAvailabilityMode: 'L1',
    feeDataAvailabilityMode: 'L1',
  };
}

const INVOKE = encodeShortString('invoke');
const DECLARE = encodeShortString('declare');
const L1_GAS = encodeShortString('L1_GAS');
const L2_GAS = encodeShortString('L2_GAS');
const L1_DATA = encodeShortString('L1_DATA');
const ZERO = toFelt(0n);

const MAX_AMOUNT = (1n << 64n) - 1n;
const MAX_PRICE = (1n << 128n) - 1n;

export function transactionVersion(version: number, query: boolean): Felt {
  return toFelt(BigInt(version) + (query ? QUERY_VERSION_BASE : 0n));
}

/** `resource_name (60 bits) | max_amount (64 bits) | max_price_per_unit (128 bits)` */
export function packResourceBound(name: Felt, bound: ResourceBound): Felt {
  const { maxAmount, maxPricePerUnit } = bound;
  if (maxAmount < 0n || maxAmount > MAX_AMOUNT) {
    throw new EncodingError('Overflow', `Resource max amount ${maxAmount} does not fit in 64 bits`);
  }
  if (maxPricePerUnit < 0n || maxPricePerUnit > MAX_PRICE) {
    throw new EncodingError('Overflow', `Resource max price ${maxPricePerUnit} does not fit in 128 bits`);
  }
  return toFelt((name << 192n) | (maxAmount << 128n) | maxPricePerUnit);
}

export function hashFeeFields(tip: bigint, bounds: ResourceBounds): Felt {
  return poseidonArray([
    toFelt(tip),
    packResourceBound(L1_GAS, bounds.l1Gas),
    packResourceBound(L2_GAS, bounds.l2Gas),
    packResourceBound(L1_DATA, bounds.l1DataGas),
  ]);
}

function daMode(mode: DataAvailabilityMode): bigint {
  return mode === 'L1' ? 0n : 1n;
}

function v3Prefix(prefix: Felt, tx: Common & V3Fields, chainId: Felt, query: boolean): Felt[] {
  return [
    prefix,
    transactionVersion(3, query),
    tx.senderAddress,
    hashFeeFields(tx.tip, tx.resourceBounds),
    poseidonArray(tx.paymasterData),
    chainId,
    tx.nonce,
    toFelt((daMode(tx.nonceDataAvailabilityMode) << 32n) + daMode(tx.feeDataAvailabilityMode)),
  ];
}

/** The hash an account signs for `tx` on `chainId`. */
export function computeTransactionHash(tx: UnsignedTransaction, chainId: Felt, query = false): Felt {
  switch (tx.type) {
    case 'INVOKE':
      if (tx.version === 1) {
        return pedersenArray([
          INVOKE,
          transactionVersion(1, query),
          tx.senderAddress,
          ZERO,
          pedersenArray(tx.calldata),
          toFelt(tx.maxFee),
          chainId,
          tx.nonce,
        ]);
      }
      return poseidonArray([
        ...v3Prefix(INVOKE, tx, chainId, query),
        poseidonArray(tx.accountDeploymentData),
        poseidonArray(tx.calldata),
      ]);
    case 'DECLARE':
      if (tx.version === 2) {
        return pedersenArray([
          DECLARE,
          transactionVersion(2, query),
          tx.senderAddress,
          ZERO,
          pedersenArray([tx.classHash]),
          toFelt(tx.maxFee),
          chainId,
          tx.nonce,
          tx.compiledClassHash,
        ]);
      }
      return poseidonArray([
        ...v3Prefix(DECLARE, tx, chainId, query),
        poseidonArray(tx.accountDeploymentData),
        tx.classHash,
        tx.compiledClassHash,
      ]);
  }
}
