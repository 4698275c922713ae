import { RpcProvider } from 'starknet';
import { z } from 'zod';
import { ProviderError, errorMessage } from './errors.js';
import { type Felt, FeltSchema, formatFelt } from './felt.js';
import { type FeeEstimate, FeeEstimateSchema } from './fees.js';
import { type Logger, silentLogger } from './logger.js';
import type { Call } from './calls.js';
import type { Signature } from './signer.js';
import { sierraAbiString } from './class-hash.js';
import { type ResourceBounds, type UnsignedTransaction, type V3Fields, transactionVersion } from './tx-hash.js';

export const DEFAULT_RPC_TIMEOUT_MS = 30_000;

export type BlockTag = 'latest' | 'pending';

export type SignedTransaction = UnsignedTransaction & { signature: Signature };

export interface SubmittedTransaction {
  transactionHash: Felt;
  classHash?: Felt;
}

export interface TransactionReceipt {
  transactionHash: Felt;
  executionStatus: 'SUCCEEDED' | 'REVERTED';
  finalityStatus: string;
  revertReason?: string;
}

/** Everything the transaction pipeline needs from a node. */
export interface TransactionProvider {
  getChainId(): Promise<Felt>;
  getNonce(address: Felt): Promise<Felt>;
  estimateFee(tx: UnsignedTransaction): Promise<FeeEstimate>;
  submit(tx: SignedTransaction): Promise<SubmittedTransaction>;
  call(call: Call): Promise<Felt[]>;
  getClassAt(address: Felt): Promise<unknown>;
  waitForTransaction(hash: Felt, timeoutMs?: number): Promise<TransactionReceipt>;
}

/** The subset of starknet.js `RpcProvider` used here. */
export interface RpcTransport {
  fetch(method: string, params?: object, id?: string | number): Promise<Response>;
  waitForTransaction(txHash: string, options?: { retryInterval?: number }): Promise<unknown>;
}

export type FetchFn = (input: string | URL | Request, init?: RequestInit) => Promise<Response>;

export interface RpcProviderOptions {
  timeoutMs?: number;
  nonceBlock?: BlockTag;
  pollIntervalMs?: number;
  logger?: Logger;
}

const RpcEnvelope = z.object({
  jsonrpc: z.string().optional(),
  id: z.union([z.string(), z.number(), z.null()]).optional(),
  result: z.unknown().optional(),
  error: z
    .object({
      code: z.number(),
      message: z.string(),
      data: z.unknown().optional(),
    })
    .optional(),
});

const ReceiptSchema = z.object({
  transaction_hash: FeltSchema,
  execution_status: z.enum(['SUCCEEDED', 'REVERTED']),
  finality_status: z.string(),
  revert_reason: z.string().optional(),
});

const hex = (v: bigint): string => `0x${v.toString(16)}`;

export function withTimeout<T>(promise: Promise<T>, ms: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, rej) => {
    timer = setTimeout(
      () => rej(new ProviderError('ProviderUnavailable', `Timeout after ${ms}ms waiting for ${label}`)),
      ms,
    );
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

/** A fetch whose requests are aborted after `timeoutMs`, so a timed-out call does not keep the process alive. */
export function abortingFetch(timeoutMs: number, base: FetchFn = fetch): FetchFn {
  return (input, init) => base(input, { ...init, signal: AbortSignal.timeout(timeoutMs) });
}

function resourceBoundsWire(bounds: ResourceBounds) {
  const one = (b: ResourceBounds['l1Gas']) => ({ max_amount: hex(b.maxAmount), max_price_per_unit: hex(b.maxPricePerUnit) });
  return { l1_gas: one(bounds.l1Gas), l2_gas: one(bounds.l2Gas), l1_data_gas: one(bounds.l1DataGas) };
}

function v3Wire(tx: V3Fields) {
  return {
    resource_bounds: resourceBoundsWire(tx.resourceBounds),
    tip: hex(tx.tip),
    paymaster_data: tx.paymasterData.map(hex),
    account_deployment_data: tx.accountDeploymentData.map(hex),
    nonce_data_availability_mode: tx.nonceDataAvailabilityMode,
    fee_data_availability_mode: tx.feeDataAvailabilityMode,
  };
}

/** JSON-RPC body of a transaction; `query` marks it as estimate-only. */
export function transactionToWire(tx: UnsignedTransaction, signature: readonly Felt[], query = false): Record<string, unknown> {
  const common = {
    type: tx.type,
    version: hex(transactionVersion(tx.version, query)),
    sender_address: hex(tx.senderAddress),
    nonce: hex(tx.nonce),
    signature: signature.map(hex),
  };
  if (tx.type === 'INVOKE') {
    const calldata = tx.calldata.map(hex);
    return tx.version === 1
      ? { ...common, calldata, max_fee: hex(tx.maxFee) }
      : { ...common, calldata, ...v3Wire(tx) };
  }

  const cls = tx.contractClass;
  const contract_class = {
    sierra_program: cls.sierra_program,
    contract_class_version: cls.contract_class_version,
    entry_points_by_type: cls.entry_points_by_type,
    abi: sierraAbiString(cls),
  };
  const declare = { ...common, compiled_class_hash: hex(tx.compiledClassHash), contract_class };
  return tx.version === 2 ? { ...declare, max_fee: hex(tx.maxFee) } : { ...declare, ...v3Wire(tx) };
}

/**
 * {@link TransactionProvider} over JSON-RPC 0.8. Every request is bounded by
 * `timeoutMs`; transport failures and timeouts surface as
 * `ProviderUnavailable`, node-side errors as `Rejected`.
 */
export class RpcTransactionProvider implements TransactionProvider {
  private readonly timeoutMs: number;
  private readonly nonceBlock: BlockTag;
  private readonly pollIntervalMs: number;
  private readonly logger: Logger;
  private nextId = 1;

  constructor(
    private readonly transport: RpcTransport,
    options: RpcProviderOptions = {},
  ) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_RPC_TIMEOUT_MS;
    this.nonceBlock = options.nonceBlock ?? 'latest';
    this.pollIntervalMs = options.pollIntervalMs ?? 2_000;
    this.logger = options.logger ?? silentLogger;
  }

  static fromUrl(nodeUrl: string, options: RpcProviderOptions = {}): RpcTransactionProvider {
    const baseFetch = abortingFetch(options.timeoutMs ?? DEFAULT_RPC_TIMEOUT_MS);
    return new RpcTransactionProvider(new RpcProvider({ nodeUrl, baseFetch }), options);
  }

  async request(method: string, params: object = {}): Promise<unknown> {
    const id = this.nextId++;
    this.logger.debug({ method, id }, 'rpc request');
    const exchange = async () => {
      const res = await this.transport.fetch(method, params, id);
      if (!res.ok) {
        throw new ProviderError('ProviderUnavailable', `${method}: HTTP ${res.status} ${res.statusText}`);
      }
      return res.text();
    };

    let text: string;
    try {
      text = await withTimeout(exchange(), this.timeoutMs, method);
    } catch (e) {
      if (e instanceof ProviderError) throw e;
      throw new ProviderError('ProviderUnavailable', `${method}: ${errorMessage(e)}`, { cause: e });
    }

    let body: unknown;
    try {
      body = JSON.parse(text);
    } catch (e) {
      throw new ProviderError('InvalidResponse', `${method}: response is not JSON`, { cause: e });
    }
    const envelope = RpcEnvelope.safeParse(body);
    if (!envelope.success) {
      throw new ProviderError('InvalidResponse', `${method}: not a JSON-RPC response`);
    }
    const { error, result } = envelope.data;
    if (error) {
      this.logger.debug({ method, id, code: error.code }, 'rpc error');
      throw new RpcRejection(method, error.code, error.message, error.data);
    }
    return result;
  }

  private async parse<T extends z.ZodTypeAny>(method: string, params: object, schema: T): Promise<z.infer<T>> {
    const result = await this.request(method, params);
    const parsed = schema.safeParse(result);
    if (!parsed.success) {
      throw new ProviderError('InvalidResponse', `${method}: unexpected result: ${parsed.error.message}`);
    }
    return parsed.data;
  }

  getChainId(): Promise<Felt> {
    return this.parse('starknet_chainId', {}, FeltSchema);
  }

  getNonce(address: Felt): Promise<Felt> {
    return this.parse(
      'starknet_getNonce',
      { block_id: this.nonceBlock, contract_address: hex(address) },
      FeltSchema,
    );
  }

  async estimateFee(tx: UnsignedTransaction): Promise<FeeEstimate> {
    const [estimate] = await this.parse(
      'starknet_estimateFee',
      {
        request: [transactionToWire(tx, [], true)],
        simulation_flags: ['SKIP_VALIDATE'],
        block_id: this.nonceBlock,
      },
      z.array(FeeEstimateSchema).length(1),
    );
    return estimate;
  }

  async submit(tx: SignedTransaction): Promise<SubmittedTransaction> {
    const wire = transactionToWire(tx, tx.signature);
    if (tx.type === 'INVOKE') {
      const { transaction_hash } = await this.parse(
        'starknet_addInvokeTransaction',
        { invoke_transaction: wire },
        z.object({ transaction_hash: FeltSchema }),
      );
      return { transactionHash: transaction_hash };
    }
    const { transaction_hash, class_hash } = await this.parse(
      'starknet_addDeclareTransaction',
      { declare_transaction: wire },
      z.object({ transaction_hash: FeltSchema, class_hash: FeltSchema }),
    );
    return { transactionHash: transaction_hash, classHash: class_hash };
  }

  call(call: Call): Promise<Felt[]> {
    return this.parse(
      'starknet_call',
      {
        request: {
          contract_address: hex(call.to),
          entry_point_selector: hex(call.selector),
          calldata: call.calldata.map(hex),
        },
        block_id: 'latest',
      },
      z.array(FeltSchema),
    );
  }

  getClassAt(address: Felt): Promise<unknown> {
    return this.request('starknet_getClassAt', { block_id: 'latest', contract_address: hex(address) });
  }

  async waitForTransaction(hash: Felt, timeoutMs = 5 * 60_000): Promise<TransactionReceipt> {
    const label = `tx ${formatFelt(hash)}`;
    let raw: unknown;
    try {
      const waiting = this.transport.waitForTransaction(hex(hash), { retryInterval: this.pollIntervalMs });
      raw = await withTimeout(waiting, timeoutMs, label);
    } catch (e) {
      if (e instanceof ProviderError) throw e;
      throw new ProviderError('Rejected', `${label}: ${errorMessage(e)}`, { cause: e });
    }

    const parsed = ReceiptSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ProviderError('InvalidResponse', `${label}: unexpected receipt: ${parsed.error.message}`);
    }
    const r = parsed.data;
    if (r.execution_status === 'REVERTED') {
      throw new ProviderError('Rejected', `Transaction ${formatFelt(hash)} reverted: ${r.revert_reason ?? 'unknown reason'}`);
    }
    return {
      transactionHash: r.transaction_hash,
      executionStatus: r.execution_status,
      finalityStatus: r.finality_status,
      revertReason: r.revert_reason,
    };
  }
}

/** A JSON-RPC error object returned by the node. */
export class RpcRejection extends ProviderError {
  constructor(
    method: string,
    readonly rpcCode: number,
    message: string,
    readonly data?: unknown,
  ) {
    super('Rejected', `${method}: ${message}${data === undefined ? '' : ` (${JSON.stringify(data)})`}`);
  }
}
