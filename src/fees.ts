import { formatUnits } from 'ethers';
import { z } from 'zod';
import type { ResourceBounds } from './tx-hash.js';

/** What an account is willing to pay: a v1/v2 `max_fee` or v3 resource bounds. */
export type TransactionFee = { kind: 'max-fee'; maxFee: bigint } | { kind: 'resource-bounds'; bounds: ResourceBounds };

export type FeeSetting =
  | { kind: 'manual'; fee: TransactionFee }
  | { kind: 'estimate'; multiplier: number; fallback?: TransactionFee };

export const DEFAULT_FEE_MULTIPLIER = 1.5;
/** Smallest multiplier that survives rounding to three decimals. */
export const MIN_FEE_MULTIPLIER = 0.001;

const Quantity = z
  .union([z.string().regex(/^(0x[0-9a-fA-F]+|[0-9]+)$/), z.number().int().nonnegative()])
  .transform((v) => BigInt(v));

export const FeeEstimateSchema = z.object({
  l1_gas_consumed: Quantity,
  l1_gas_price: Quantity,
  l2_gas_consumed: Quantity,
  l2_gas_price: Quantity,
  l1_data_gas_consumed: Quantity,
  l1_data_gas_price: Quantity,
  overall_fee: Quantity,
  unit: z.enum(['WEI', 'FRI']),
});

export type FeeEstimate = z.infer<typeof FeeEstimateSchema>;

const SCALE = 1000n;

/** `ceil(value * multiplier)`, with the multiplier taken to three decimals. */
export function applyMultiplier(value: bigint, multiplier: number): bigint {
  if (!Number.isFinite(multiplier) || multiplier < MIN_FEE_MULTIPLIER) {
    throw new RangeError(`Fee multiplier must be at least ${MIN_FEE_MULTIPLIER}, got ${multiplier}`);
  }
  const m = BigInt(Math.round(multiplier * Number(SCALE)));
  return (value * m + SCALE - 1n) / SCALE;
}

/**
 * Turns an estimate into a fee the sequencer will accept. v1/v2 pad the
 * overall fee; v3 pads every resource amount and price.
 */
export function feeFromEstimate(estimate: FeeEstimate, version: number, multiplier = DEFAULT_FEE_MULTIPLIER): TransactionFee {
  if (version < 3) {
    return { kind: 'max-fee', maxFee: applyMultiplier(estimate.overall_fee, multiplier) };
  }
  const pad = (amount: bigint, price: bigint) => ({
    maxAmount: applyMultiplier(amount, multiplier),
    maxPricePerUnit: applyMultiplier(price, multiplier),
  });
  return {
    kind: 'resource-bounds',
    bounds: {
      l1Gas: pad(estimate.l1_gas_consumed, estimate.l1_gas_price),
      l2Gas: pad(estimate.l2_gas_consumed, estimate.l2_gas_price),
      l1DataGas: pad(estimate.l1_data_gas_consumed, estimate.l1_data_gas_price),
    },
  };
}

export function feeToken(unit: FeeEstimate['unit']): 'ETH' | 'STRK' {
  return unit === 'WEI' ? 'ETH' : 'STRK';
}

export function formatFeeAmount(amount: bigint, unit: FeeEstimate['unit']): string {
  return `${formatUnits(amount, 18)} ${feeToken(unit)}`;
}

/** Upper bound in the fee token's base unit that a fee allows the sequencer to charge. */
export function maxCharge(fee: TransactionFee): bigint {
  if (fee.kind === 'max-fee') return fee.maxFee;
  const { l1Gas, l2Gas, l1DataGas } = fee.bounds;
  return (
    l1Gas.maxAmount * l1Gas.maxPricePerUnit +
    l2Gas.maxAmount * l2Gas.maxPricePerUnit +
    l1DataGas.maxAmount * l1DataGas.maxPricePerUnit
  );
}
