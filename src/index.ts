#!/usr/bin/env node

import { Command, Option } from 'commander';
import { randomBytes } from 'node:crypto';
import fs from 'node:fs';
import { z } from 'zod';
import { CONFIG_DIR, ENV_TEMPLATE, GLOBAL_ENV_FILE, type Env, getEnv } from './env.js';
import { AbiMismatchError, EncodingError, UnsupportedFormatError, errorMessage } from './errors.js';
import { type Felt, feltFromBytes, formatFelt, formatFeltPadded, parseFelt } from './felt.js';
import { decodeShortString, encodeShortString, selectorFromName } from './hashing.js';
import { type LiteralContext, decodeLiterals } from './literals.js';
import { ContractAbi, abiValueToJson, decodeFunctionOutput, encodeFunctionCall } from './abi.js';
import { loadContractClass, readJsonFile } from './artifacts.js';
import { computeClassHash, computeCompiledClassHash } from './class-hash.js';
import { type Call, callOf, findSaltForPrefix } from './calls.js';
import { resolveAccount } from './account.js';
import { type FeeOptions, feeSettingFromOptions, parseChainId, parseTxVersion, splitCallGroups } from './args.js';
import { TransactionBuilder, type TransactionIntent } from './builder.js';
import { formatFeeAmount, maxCharge } from './fees.js';
import { LOG_LEVELS, makeLogger } from './logger.js';
import { promptNewPassword, promptPassword, promptSecret, staticPassword } from './password.js';
import { RpcTransactionProvider } from './provider.js';
import { type TransactionSigner, createSigner, generatePrivateKey, privateKeyBytes, publicKeyOf } from './signer.js';
import { type KdfOptions, createKeystore, readKeystore, releaseSecret, withUnlockedSecret } from './keystore.js';

const jsonBigint = (_k: string, v: unknown) => (typeof v === 'bigint' ? v.toString() : v);

function print(value: unknown) {
  console.log(JSON.stringify(value, jsonBigint, 2));
}

interface GlobalOptions {
  env?: string;
  rpc?: string;
  logLevel?: string;
}

interface SignerOptions {
  account?: string;
  keystore?: string;
  privateKey?: string;
}

interface TxOptions extends SignerOptions, FeeOptions {
  nonce?: string;
  txVersion?: string;
  watch?: boolean;
}

const program = new Command();
program
  .name('cairn')
  .description('Starknet account, signing and transaction CLI')
  .version('0.1.0')
  // Used by env loader (src/env.ts) before commander parses options.
  .option('--env <path>', 'Path to env file (default: ./.env or ~/.cairn/.env)')
  .option('--rpc <url>', 'JSON-RPC endpoint (overrides STARKNET_RPC_URL)')
  .addOption(new Option('--log-level <level>', 'Diagnostics level on stderr').choices(LOG_LEVELS));

function context() {
  const env = getEnv();
  const globals = program.opts<GlobalOptions>();
  const logger = makeLogger(z.enum(LOG_LEVELS).parse(globals.logLevel ?? env.CAIRN_LOG_LEVEL));
  const provider = RpcTransactionProvider.fromUrl(globals.rpc ?? env.STARKNET_RPC_URL, {
    timeoutMs: env.CAIRN_RPC_TIMEOUT_MS,
    logger,
  });
  let chainId: Promise<Felt> | undefined;
  const getChainId = () =>
    (chainId ??= env.STARKNET_CHAIN_ID ? Promise.resolve(parseChainId(env.STARKNET_CHAIN_ID)) : provider.getChainId());
  return { env, logger, provider, getChainId };
}

type Context = ReturnType<typeof context>;

function makeSigner(env: Env, opts: SignerOptions): TransactionSigner {
  const keystore = opts.keystore ?? env.STARKNET_KEYSTORE;
  if (keystore) {
    const password =
      env.STARKNET_KEYSTORE_PASSWORD !== undefined ? staticPassword(env.STARKNET_KEYSTORE_PASSWORD) : promptPassword();
    return createSigner({ kind: 'keystore', path: keystore, password });
  }
  const key = opts.privateKey ?? env.STARKNET_PRIVATE_KEY;
  if (key) return createSigner({ kind: 'private-key', key });
  throw new Error('No signer configured: pass --keystore or set STARKNET_KEYSTORE (or STARKNET_PRIVATE_KEY)');
}

function makeAccount(env: Env, opts: SignerOptions) {
  const ref = opts.account ?? env.STARKNET_ACCOUNT;
  if (!ref) throw new Error('No account configured: pass --account or set STARKNET_ACCOUNT');
  return resolveAccount(ref);
}

/** The chain is only looked up when an `addr:` literal needs it. */
async function literalContext(ctx: Context, tokens: readonly string[]): Promise<LiteralContext> {
  return tokens.some((t) => t.startsWith('addr:')) ? { chainId: await ctx.getChainId() } : {};
}

async function fetchAbi(ctx: Context, address: Felt): Promise<ContractAbi> {
  const cls = await ctx.provider.getClassAt(address);
  if (typeof cls !== 'object' || cls === null || !('sierra_program' in cls)) {
    throw new UnsupportedFormatError('UnsupportedClassVersion', `Contract ${formatFelt(address)} is not a Cairo 1 class`);
  }
  return ContractAbi.parse(cls);
}

function loadAbi(file: string): ContractAbi {
  return ContractAbi.parse(readJsonFile(file));
}

function withSignerOptions(cmd: Command): Command {
  return cmd
    .option('--account <path|address>', 'Account config file or deployed account address (default: STARKNET_ACCOUNT)')
    .option('--keystore <path>', 'Encrypted keystore file (default: STARKNET_KEYSTORE)')
    .option('--private-key <hex>', 'Raw private key; prefer a keystore');
}

function withTxOptions(cmd: Command): Command {
  return withSignerOptions(cmd)
    .option('--max-fee <eth>', 'Maximum fee in ETH (v1/v2)')
    .option('--max-fee-raw <wei>', 'Maximum fee in Wei (v1/v2)')
    .option('--l1-gas <amount>', 'Max L1 gas (v3)')
    .option('--l1-gas-price <fri>', 'Max L1 gas price (v3)')
    .option('--l2-gas <amount>', 'Max L2 gas (v3)')
    .option('--l2-gas-price <fri>', 'Max L2 gas price (v3)')
    .option('--l1-data-gas <amount>', 'Max L1 data gas (v3)')
    .option('--l1-data-gas-price <fri>', 'Max L1 data gas price (v3)')
    .option('--fee-multiplier <x>', 'Multiplier applied to estimated fees (default: CAIRN_FEE_MULTIPLIER)')
    .option('--estimate-only', 'Only estimate the fee and exit', false)
    .option('--nonce <n>', 'Use this nonce instead of querying it')
    .option('--tx-version <v>', 'Transaction version: 1 or 3 for invoke, 2 or 3 for declare (default 3)')
    .option('--watch', 'Wait for the transaction to be accepted', false);
}

/**
 * Runs an intent through the builder. In estimate-only mode the fee is
 * printed and nothing is signed.
 */
async function runTransaction(
  ctx: Context,
  intent: TransactionIntent,
  opts: TxOptions,
  describe?: (builder: TransactionBuilder) => void,
) {
  const version = parseTxVersion(opts.txVersion) ?? 3;
  const account = makeAccount(ctx.env, opts);
  const builder = new TransactionBuilder(intent, {
    account,
    chainId: await ctx.getChainId(),
    provider: ctx.provider,
    signer: opts.estimateOnly ? new NoSigner() : makeSigner(ctx.env, opts),
    fee: feeSettingFromOptions(opts, version, ctx.env.CAIRN_FEE_MULTIPLIER),
    version,
    nonce: opts.nonce !== undefined ? parseFelt(opts.nonce) : undefined,
    logger: ctx.logger,
  });
  describe?.(builder);

  if (opts.estimateOnly) {
    await builder.resolveNonce();
    const { estimate, fee } = await builder.estimateFee();
    if (!estimate) throw new Error('Fee estimate unavailable');
    console.error(`Estimated fee: ${formatFeeAmount(estimate.overall_fee, estimate.unit)}`);
    print({
      overallFee: estimate.overall_fee,
      unit: estimate.unit,
      maxCharge: maxCharge(fee),
      estimate,
    });
    return undefined;
  }

  const signed = await builder.build();
  const submitted = await builder.submit();
  console.error(`Transaction hash: ${formatFeltPadded(submitted.transactionHash)}`);
  if (opts.watch) {
    const receipt = await ctx.provider.waitForTransaction(submitted.transactionHash);
    console.error(`Transaction ${formatFeltPadded(receipt.transactionHash)} ${receipt.finalityStatus}`);
  }
  return { builder, signed, submitted };
}

/** Placeholder for estimate-only runs, which never reach signing. */
class NoSigner implements TransactionSigner {
  async getPublicKey(): Promise<Felt> {
    throw new Error('No signer in estimate-only mode');
  }

  async signHash(): Promise<never> {
    throw new Error('No signer in estimate-only mode');
  }
}

program
  .command('init')
  .description(`Create a default config env file at ${GLOBAL_ENV_FILE}`)
  .option('--force', 'Overwrite if the file already exists', false)
  .action((opts: { force: boolean }) => {
    if (fs.existsSync(GLOBAL_ENV_FILE) && !opts.force) {
      console.log(`Already exists: ${GLOBAL_ENV_FILE}`);
      console.log('Use --force to overwrite.');
      return;
    }
    fs.mkdirSync(CONFIG_DIR, { recursive: true });
    fs.writeFileSync(GLOBAL_ENV_FILE, ENV_TEMPLATE, { encoding: 'utf8', mode: 0o600 });
    console.log(`Wrote: ${GLOBAL_ENV_FILE}`);
  });

program
  .command('selector')
  .description('Entry point selector of a function name')
  .argument('<name>', 'Function name')
  .action((name: string) => {
    console.log(formatFeltPadded(selectorFromName(name)));
  });

program
  .command('to-cairo-string')
  .description('Encode text (max 31 ASCII chars) as a Cairo short string')
  .argument('<text>')
  .option('--dec', 'Print in decimal', false)
  .action((text: string, opts: { dec: boolean }) => {
    console.log(formatFelt(encodeShortString(text), opts.dec ? 'dec' : 'hex'));
  });

program
  .command('parse-cairo-string')
  .description('Decode a Cairo short string felt')
  .argument('<felt>')
  .action((felt: string) => {
    console.log(decodeShortString(parseFelt(felt)));
  });

program
  .command('class-hash')
  .description('Class hash of a Sierra or legacy class file, or the compiled class hash of a CASM file')
  .argument('<file>')
  .action((file: string) => {
    console.log(formatFeltPadded(computeClassHash(readJsonFile(file))));
  });

program
  .command('calldata')
  .description('Encode arguments into felts, raw or against an ABI function')
  .argument('[args...]', "Arguments; wrap arrays in '[' ... ']'")
  .option('--abi <file>', 'ABI JSON or Sierra class file')
  .option('--function <name>', 'Function whose inputs to encode (requires --abi)')
  .option('--chain-id <id>', 'Chain for addr: literals: SN_MAIN, SN_SEPOLIA or a felt')
  .action((args: string[], opts: { abi?: string; function?: string; chainId?: string }) => {
    if (opts.abi && !opts.function) throw new EncodingError('Malformed', '--abi needs --function');
    const literals: LiteralContext = { chainId: opts.chainId !== undefined ? parseChainId(opts.chainId) : undefined };
    const felts =
      opts.abi && opts.function
        ? encodeFunctionCall(loadAbi(opts.abi), opts.function, args, literals)
        : decodeLiterals(args, literals);
    for (const f of felts) console.log(formatFeltPadded(f));
  });

program
  .command('chain-id')
  .description('Chain ID of the configured network')
  .action(async () => {
    const ctx = context();
    const id = await ctx.provider.getChainId();
    print({ chainId: formatFelt(id), name: decodeShortString(id) });
  });

program
  .command('nonce')
  .description('Current nonce of a contract')
  .argument('<address>')
  .action(async (address: string) => {
    const ctx = context();
    console.log(formatFelt(await ctx.provider.getNonce(parseFelt(address)), 'dec'));
  });

program
  .command('call')
  .description('Call a view function')
  .argument('<address>', 'Contract address')
  .argument('<function>', 'Function name')
  .argument('[args...]', "Arguments; wrap arrays in '[' ... ']'")
  .option('--abi <file>', 'ABI JSON or Sierra class file used to encode inputs and decode outputs')
  .option('--fetch-abi', 'Fetch the ABI of the contract from the node', false)
  .action(async (address: string, fn: string, args: string[], opts: { abi?: string; fetchAbi: boolean }) => {
    const ctx = context();
    const to = parseFelt(address);
    const abi = opts.abi ? loadAbi(opts.abi) : opts.fetchAbi ? await fetchAbi(ctx, to) : undefined;
    const calldata = encodeFunctionCall(abi, fn, args, await literalContext(ctx, args));
    const result = await ctx.provider.call(callOf(to, fn, calldata));
    if (abi) print(decodeFunctionOutput(abi, fn, result).map(abiValueToJson));
    else print(result.map((f) => formatFeltPadded(f)));
  });

withTxOptions(
  program
    .command('invoke')
    .description("Send one or more calls in a single transaction: <address> <function> [args...] [/ <address> <function> [args...]]")
    .argument('<calls...>')
    .option('--fetch-abi', 'Encode arguments against each target contract ABI fetched from the node', false),
).action(async (tokens: string[], opts: TxOptions & { fetchAbi: boolean }) => {
  const ctx = context();
  const calls: Call[] = [];
  for (const group of splitCallGroups(tokens)) {
    const to = parseFelt(group.to);
    const abi = opts.fetchAbi ? await fetchAbi(ctx, to) : undefined;
    const literals = await literalContext(ctx, group.args);
    calls.push(callOf(to, group.entrypoint, encodeFunctionCall(abi, group.entrypoint, group.args, literals)));
  }
  const intent: TransactionIntent = calls.length === 1 ? { kind: 'invoke', call: calls[0] } : { kind: 'multicall', calls };
  const out = await runTransaction(ctx, intent, opts);
  if (out) print({ transactionHash: formatFeltPadded(out.submitted.transactionHash) });
});

withTxOptions(
  program
    .command('declare')
    .description('Declare a Sierra contract class')
    .argument('<file>', 'Sierra class file')
    .option('--casm-file <file>', 'Compiled CASM file, to compute the compiled class hash')
    .option('--compiled-class-hash <hash>', 'Compiled class hash, when no CASM file is at hand'),
).action(async (file: string, opts: TxOptions & { casmFile?: string; compiledClassHash?: string }) => {
  const ctx = context();
  let compiledClassHash: Felt;
  if (opts.casmFile) {
    const casm = loadContractClass(opts.casmFile);
    if (casm.format !== 'casm') throw new UnsupportedFormatError('UnsupportedClassVersion', `${opts.casmFile} is not a CASM file`);
    compiledClassHash = computeCompiledClassHash(casm.contractClass);
  } else if (opts.compiledClassHash) {
    compiledClassHash = parseFelt(opts.compiledClassHash);
  } else {
    throw new EncodingError('Malformed', 'Pass --casm-file or --compiled-class-hash');
  }

  const out = await runTransaction(
    ctx,
    { kind: 'declare', contractClass: loadContractClass(file), compiledClassHash },
    opts,
    (builder) => {
      if (builder.declaredClassHash !== undefined) {
        console.error(`Declaring Cairo 1 class: ${formatFeltPadded(builder.declaredClassHash)}`);
      }
      console.error(`Compiled class hash: ${formatFeltPadded(compiledClassHash)}`);
    },
  );
  if (out?.builder.declaredClassHash !== undefined) console.log(formatFeltPadded(out.builder.declaredClassHash));
});

withTxOptions(
  program
    .command('deploy')
    .description('Deploy a declared class through the Universal Deployer Contract')
    .argument('<class-hash>')
    .argument('[ctor-args...]', "Constructor arguments; wrap arrays in '[' ... ']'")
    .option('--salt <felt>', 'Salt for the contract address (default: random)')
    .option('--not-unique', 'Do not mix the deployer address into the salt', false)
    .option('--address-prefix <hex>', 'Search salts from 0 upward for an address starting with these hex digits')
    .option('--abi <file>', 'ABI JSON or Sierra class file used to encode constructor arguments'),
).action(
  async (
    classHashText: string,
    ctorArgs: string[],
    opts: TxOptions & { salt?: string; notUnique: boolean; addressPrefix?: string; abi?: string },
  ) => {
    const ctx = context();
    const classHash = parseFelt(classHashText);
    const constructorCalldata = encodeFunctionCall(
      opts.abi ? loadAbi(opts.abi) : undefined,
      'constructor',
      ctorArgs,
      await literalContext(ctx, ctorArgs),
    );
    const unique = !opts.notUnique;

    let salt: Felt;
    if (opts.salt !== undefined) {
      salt = parseFelt(opts.salt);
    } else if (opts.addressPrefix !== undefined) {
      const sender = makeAccount(ctx.env, opts).address;
      const found = findSaltForPrefix({ classHash, unique, constructorCalldata }, sender, opts.addressPrefix);
      console.error(`Found salt ${formatFelt(found.salt, 'dec')} after ${found.attempts} attempt(s)`);
      salt = found.salt;
    } else {
      salt = feltFromBytes(randomBytes(31));
    }

    const out = await runTransaction(
      ctx,
      { kind: 'deploy', deployment: { classHash, salt, unique, constructorCalldata } },
      opts,
      (builder) => {
        console.error(`Deploying class ${formatFeltPadded(classHash)} with salt ${formatFeltPadded(salt)}...`);
        if (builder.predictedAddress !== undefined) {
          console.error(`The contract will be deployed at address ${formatFeltPadded(builder.predictedAddress)}`);
        }
      },
    );
    if (out?.builder.predictedAddress !== undefined) console.log(formatFeltPadded(out.builder.predictedAddress));
  },
);

function kdfFromEnv(env: Env, scryptN?: string): KdfOptions {
  const n = scryptN !== undefined ? Number(scryptN) : env.CAIRN_KEYSTORE_SCRYPT_N;
  return { kdf: 'scrypt', n, r: 8, p: 1 };
}

async function newKeystorePassword(env: Env): Promise<string> {
  return env.STARKNET_KEYSTORE_PASSWORD ?? promptNewPassword('Enter password');
}

program
  .command('signer')
  .description('Signing keys and encrypted keystores')
  .addCommand(
    new Command('gen-keypair').description('Generate a random key pair and print it (unencrypted)').action(() => {
      const secret = generatePrivateKey();
      try {
        print({
          privateKey: formatFeltPadded(feltFromBytes(secret)),
          publicKey: formatFeltPadded(publicKeyOf(secret)),
        });
      } finally {
        releaseSecret(secret);
      }
    }),
  )
  .addCommand(
    new Command('keystore')
      .description('Create and inspect encrypted keystores')
      .addCommand(
        new Command('new')
          .description('Generate a key and store it in a new encrypted keystore')
          .argument('<file>')
          .option('--force', 'Overwrite an existing file', false)
          .option('--scrypt-n <n>', 'scrypt cost (power of two; default CAIRN_KEYSTORE_SCRYPT_N)')
          .action(async (file: string, opts: { force: boolean; scryptN?: string }) => {
            const env = getEnv();
            const password = await newKeystorePassword(env);
            const secret = generatePrivateKey();
            try {
              await createKeystore(file, secret, password, { kdf: kdfFromEnv(env, opts.scryptN), overwrite: opts.force });
              console.error(`Created new encrypted keystore file: ${file}`);
              print({ path: file, publicKey: formatFeltPadded(publicKeyOf(secret)) });
            } finally {
              releaseSecret(secret);
            }
          }),
      )
      .addCommand(
        new Command('from-key')
          .description('Encrypt an existing private key (entered at a hidden prompt) into a keystore')
          .argument('<file>')
          .option('--force', 'Overwrite an existing file', false)
          .option('--scrypt-n <n>', 'scrypt cost (power of two; default CAIRN_KEYSTORE_SCRYPT_N)')
          .action(async (file: string, opts: { force: boolean; scryptN?: string }) => {
            const env = getEnv();
            const secret = privateKeyBytes((await promptSecret('Enter private key')).trim());
            try {
              const publicKey = publicKeyOf(secret);
              const password = await newKeystorePassword(env);
              await createKeystore(file, secret, password, { kdf: kdfFromEnv(env, opts.scryptN), overwrite: opts.force });
              console.error(`Created new encrypted keystore file: ${file}`);
              print({ path: file, publicKey: formatFeltPadded(publicKey) });
            } finally {
              releaseSecret(secret);
            }
          }),
      )
      .addCommand(
        new Command('inspect')
          .description('Decrypt a keystore and print its public key')
          .argument('<file>')
          .option('--raw', 'Print only the public key', false)
          .action(async (file: string, opts: { raw: boolean }) => {
            const env = getEnv();
            const record = readKeystore(file);
            const password = env.STARKNET_KEYSTORE_PASSWORD ?? (await promptPassword()());
            const publicKey = await withUnlockedSecret(record, password, (secret) => publicKeyOf(secret));
            if (opts.raw) console.log(formatFeltPadded(publicKey));
            else print({ path: file, id: record.id, kdf: record.crypto.kdf, publicKey: formatFeltPadded(publicKey) });
          }),
      ),
  );

function exitCodeFor(e: unknown): number {
  return e instanceof EncodingError || e instanceof AbiMismatchError || e instanceof UnsupportedFormatError ? 2 : 1;
}

program.parseAsync(process.argv).catch((e: unknown) => {
  console.error(`error: ${errorMessage(e)}`);
  if (e instanceof Error && e.cause !== undefined) console.error(`  caused by: ${errorMessage(e.cause)}`);
  process.exitCode = exitCodeFor(e);
});
