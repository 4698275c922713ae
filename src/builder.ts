import { ProviderError, StateError, UnsupportedFormatError, errorMessage } from './errors.js';
import { type Felt, formatFelt } from './felt.js';
import type { ContractClass, SierraClass } from './artifacts.js';
import {
  type CairoVersion,
  type Call,
  type UdcDeployment,
  DEFAULT_UDC_ADDRESS,
  computeUdcDeployedAddress,
  encodeExecuteCalldata,
  udcDeployCall,
} from './calls.js';
import { computeSierraClassHash } from './class-hash.js';
import { type FeeEstimate, type FeeSetting, type TransactionFee, feeFromEstimate } from './fees.js';
import { type Logger, silentLogger } from './logger.js';
import type { SignedTransaction, SubmittedTransaction, TransactionProvider } from './provider.js';
import type { Signature, TransactionSigner } from './signer.js';
import { type UnsignedTransaction, ZERO_BOUNDS, computeTransactionHash, defaultV3Fields } from './tx-hash.js';

export type TransactionIntent =
  | { kind: 'invoke'; call: Call }
  | { kind: 'multicall'; calls: Call[] }
  | { kind: 'deploy'; deployment: UdcDeployment; udc?: Felt }
  | { kind: 'declare'; contractClass: ContractClass; compiledClassHash: Felt };

export type BuilderStage = 'draft' | 'resolved-nonce' | 'estimated-fee' | 'hashed' | 'signed' | 'failed';

export interface SenderAccount {
  address: Felt;
  cairoVersion: CairoVersion;
}

export interface BuilderOptions {
  account: SenderAccount;
  chainId: Felt;
  provider: TransactionProvider;
  signer: TransactionSigner;
  fee: FeeSetting;
  /** Defaults to 3 for both invoke and declare. */
  version?: 1 | 2 | 3;
  /** Skips the nonce query when set. */
  nonce?: Felt;
  logger?: Logger;
}

export interface FeeResolution {
  fee: TransactionFee;
  estimate?: FeeEstimate;
  /** True when estimation failed and the configured fallback was used. */
  usedFallback: boolean;
}

const NEXT_STAGE = {
  draft: 'resolved-nonce',
  'resolved-nonce': 'estimated-fee',
  'estimated-fee': 'hashed',
  hashed: 'signed',
} as const;

type ActiveStage = keyof typeof NEXT_STAGE;

function feeMatchesVersion(fee: TransactionFee, version: number): boolean {
  return version === 3 ? fee.kind === 'resource-bounds' : fee.kind === 'max-fee';
}

/**
 * Assembles one transaction step by step:
 * draft → resolved-nonce → estimated-fee → hashed → signed.
 *
 * A step called out of order throws {@link StateError} and changes nothing.
 * A step that fails moves the builder to `failed`, after which every call
 * throws a `StateError` whose `cause` is the original failure.
 */
export class TransactionBuilder {
  readonly intent: TransactionIntent;
  readonly version: 1 | 2 | 3;

  private readonly opts: BuilderOptions;
  private readonly logger: Logger;
  private readonly sierraClass?: SierraClass;
  private readonly classHash?: Felt;

  #stage: BuilderStage = 'draft';
  #busy = false;
  #failure?: unknown;
  #nonce?: Felt;
  #fee?: FeeResolution;
  #hash?: Felt;
  #hashed?: UnsignedTransaction;
  #signature?: Signature;

  constructor(intent: TransactionIntent, options: BuilderOptions) {
    this.intent = structuredClone(intent);
    this.opts = options;
    this.logger = options.logger ?? silentLogger;
    this.version = options.version ?? 3;

    if (intent.kind === 'declare') {
      if (intent.contractClass.format !== 'sierra') {
        throw new UnsupportedFormatError(
          'UnsupportedClassVersion',
          `Only Sierra classes can be declared, got a ${intent.contractClass.format} class`,
        );
      }
      if (this.version === 1) {
        throw new UnsupportedFormatError('UnsupportedTransaction', 'Declare transactions must be version 2 or 3');
      }
      this.sierraClass = intent.contractClass.contractClass;
      this.classHash = computeSierraClassHash(this.sierraClass);
    } else if (this.version === 2) {
      throw new UnsupportedFormatError('UnsupportedTransaction', 'Invoke transactions must be version 1 or 3');
    }

    const { fee } = options;
    const declared = fee.kind === 'manual' ? fee.fee : fee.fallback;
    if (declared && !feeMatchesVersion(declared, this.version)) {
      throw new StateError(
        'FeeVersionMismatch',
        this.version === 3
          ? 'Version 3 transactions take resource bounds, not a max fee'
          : `Version ${this.version} transactions take a max fee, not resource bounds`,
      );
    }
  }

  get stage(): BuilderStage {
    return this.#stage;
  }

  get nonce(): Felt | undefined {
    return this.#nonce;
  }

  get fee(): FeeResolution | undefined {
    return this.#fee;
  }

  get hash(): Felt | undefined {
    return this.#hash;
  }

  /** Class hash a declare intent commits to. */
  get declaredClassHash(): Felt | undefined {
    return this.classHash;
  }

  /** Address the contract of a deploy intent will land at. */
  get predictedAddress(): Felt | undefined {
    if (this.intent.kind !== 'deploy') return undefined;
    return computeUdcDeployedAddress(this.intent.deployment, this.opts.account.address, this.intent.udc ?? DEFAULT_UDC_ADDRESS);
  }

  calls(): Call[] {
    switch (this.intent.kind) {
      case 'invoke':
        return [structuredClone(this.intent.call)];
      case 'multicall':
        return structuredClone(this.intent.calls);
      case 'deploy':
        return [udcDeployCall(this.intent.deployment, this.intent.udc)];
      case 'declare':
        return [];
    }
  }

  async resolveNonce(): Promise<Felt> {
    return this.transition('draft', 'resolveNonce', async () => {
      const nonce = this.opts.nonce ?? (await this.opts.provider.getNonce(this.opts.account.address));
      this.#nonce = nonce;
      return nonce;
    });
  }

  async estimateFee(): Promise<FeeResolution> {
    return this.transition('resolved-nonce', 'estimateFee', async () => {
      const resolution = await this.resolveFee(this.requireNonce());
      this.#fee = resolution;
      return resolution;
    });
  }

  async computeHash(): Promise<Felt> {
    return this.transition('estimated-fee', 'computeHash', async () => {
      const tx = this.unsigned();
      const hash = computeTransactionHash(tx, this.opts.chainId);
      this.#hashed = tx;
      this.#hash = hash;
      return hash;
    });
  }

  async sign(): Promise<SignedTransaction> {
    return this.transition('hashed', 'sign', async () => {
      const hash = this.#hash;
      if (hash === undefined) throw new StateError('IllegalTransition', 'No transaction hash to sign');
      this.#signature = await this.opts.signer.signHash(hash);
      return this.signed();
    });
  }

  /** Runs whatever steps remain and returns the signed transaction. */
  async build(): Promise<SignedTransaction> {
    for (;;) {
      switch (this.#stage) {
        case 'draft':
          await this.resolveNonce();
          break;
        case 'resolved-nonce':
          await this.estimateFee();
          break;
        case 'estimated-fee':
          await this.computeHash();
          break;
        case 'hashed':
          return this.sign();
        case 'signed':
          return this.signed();
        case 'failed':
          throw this.failedError('build');
      }
    }
  }

  /** Broadcasts the signed transaction. */
  async submit(): Promise<SubmittedTransaction> {
    if (this.#stage === 'failed') throw this.failedError('submit');
    if (this.#stage !== 'signed') {
      throw new StateError('IllegalTransition', `Cannot submit a transaction in stage '${this.#stage}'`);
    }
    const submitted = await this.opts.provider.submit(this.signed());
    this.logger.info({ hash: formatFelt(submitted.transactionHash) }, 'transaction submitted');
    return submitted;
  }

  private async transition<T>(from: ActiveStage, step: string, work: () => Promise<T>): Promise<T> {
    if (this.#stage === 'failed') throw this.failedError(step);
    if (this.#busy) throw new StateError('IllegalTransition', `Cannot ${step} while another step is running`);
    if (this.#stage !== from) {
      throw new StateError('IllegalTransition', `Cannot ${step} in stage '${this.#stage}' (requires '${from}')`);
    }

    this.#busy = true;
    try {
      const result = await work();
      this.#stage = NEXT_STAGE[from];
      this.logger.debug({ step, stage: this.#stage }, 'builder transition');
      return result;
    } catch (e) {
      this.#stage = 'failed';
      this.#failure = e;
      this.logger.debug({ step, err: errorMessage(e) }, 'builder failed');
      throw e;
    } finally {
      this.#busy = false;
    }
  }

  private failedError(step: string): StateError {
    return new StateError('BuilderFailed', `Cannot ${step}: builder failed earlier: ${errorMessage(this.#failure)}`, {
      cause: this.#failure,
    });
  }

  private async resolveFee(nonce: Felt): Promise<FeeResolution> {
    const setting = this.opts.fee;
    if (setting.kind === 'manual') return { fee: setting.fee, usedFallback: false };

    let estimate: FeeEstimate;
    try {
      estimate = await this.opts.provider.estimateFee(this.unsignedWith(nonce, undefined));
    } catch (e) {
      if (setting.fallback) {
        this.logger.warn({ err: errorMessage(e) }, 'fee estimation failed, using fallback fee');
        return { fee: setting.fallback, usedFallback: true };
      }
      throw new ProviderError('FeeEstimationFailed', `Fee estimation failed: ${errorMessage(e)}`, { cause: e });
    }
    return { fee: feeFromEstimate(estimate, this.version, setting.multiplier), estimate, usedFallback: false };
  }

  private requireNonce(): Felt {
    if (this.#nonce === undefined) throw new StateError('IllegalTransition', 'Nonce has not been resolved');
    return this.#nonce;
  }

  private unsigned(): UnsignedTransaction {
    const fee = this.#fee;
    if (!fee) throw new StateError('IllegalTransition', 'Fee has not been resolved');
    return this.unsignedWith(this.requireNonce(), fee.fee);
  }

  /** The transaction body; without a fee every fee field is zero, as estimation expects. */
  private unsignedWith(nonce: Felt, fee: TransactionFee | undefined): UnsignedTransaction {
    const senderAddress = this.opts.account.address;
    const maxFee = fee?.kind === 'max-fee' ? fee.maxFee : 0n;
    const v3 = defaultV3Fields(fee?.kind === 'resource-bounds' ? fee.bounds : ZERO_BOUNDS);

    if (this.sierraClass && this.classHash !== undefined && this.intent.kind === 'declare') {
      const declare = {
        type: 'DECLARE',
        senderAddress,
        nonce,
        contractClass: this.sierraClass,
        classHash: this.classHash,
        compiledClassHash: this.intent.compiledClassHash,
      } as const;
      return this.version === 2 ? { ...declare, version: 2, maxFee } : { ...declare, ...v3, version: 3 };
    }

    const calldata = encodeExecuteCalldata(this.calls(), this.opts.account.cairoVersion);
    return this.version === 1
      ? { type: 'INVOKE', version: 1, senderAddress, nonce, calldata, maxFee }
      : { type: 'INVOKE', version: 3, senderAddress, nonce, calldata, ...v3 };
  }

  /** A copy of exactly what was hashed, so later edits to the intent cannot reach the payload. */
  private signed(): SignedTransaction {
    const signature = this.#signature;
    const tx = this.#hashed;
    if (!signature || !tx) throw new StateError('IllegalTransition', 'Transaction has not been signed');
    return { ...structuredClone(tx), signature };
  }
}
