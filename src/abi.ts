import { byteArray, uint256 } from 'starknet';
import { z } from 'zod';
import { AbiMismatchError, EncodingError } from './errors.js';
import {
  FIELD_PRIME,
  type Felt,
  bigintToBytes,
  feltFromBytes,
  feltFromModulo,
  toFelt,
} from './felt.js';
import { type LiteralContext, decodeLiterals, decodeSingleFelt, parseInteger, splitU256 } from './literals.js';

export const ARRAY_START = '[';
export const ARRAY_END = ']';

export type AbiType =
  | { kind: 'felt'; name: string }
  | { kind: 'uint'; bits: number }
  | { kind: 'int'; bits: number }
  | { kind: 'bool' }
  | { kind: 'u256' }
  | { kind: 'bytearray' }
  | { kind: 'unit' }
  | { kind: 'array'; element: AbiType }
  | { kind: 'tuple'; members: AbiType[] }
  | { kind: 'struct'; name: string; members: AbiMember[] }
  | { kind: 'enum'; name: string; variants: AbiMember[] };

export interface AbiMember {
  name: string;
  type: AbiType;
}

/**
 * Structured value of a Cairo type. Felts and integers are bigints, tuples
 * and arrays are JS arrays, structs are plain objects keyed by member name.
 */
export type AbiValue = bigint | boolean | string | AbiValue[] | AbiEnumValue | AbiStructValue;
export type AbiEnumValue = { readonly variant: string; readonly value: AbiValue };
export type AbiStructValue = { readonly [member: string]: AbiValue };

export interface AbiFunction {
  name: string;
  inputs: AbiMember[];
  outputs: AbiType[];
  stateMutability?: string;
}

// ---------------------------------------------------------------------------
// ABI documents
// ---------------------------------------------------------------------------

const ParamSchema = z.object({ name: z.string(), type: z.string() });
const FunctionSchema = z.object({
  type: z.enum(['function', 'l1_handler', 'constructor']),
  name: z.string(),
  inputs: z.array(ParamSchema).default([]),
  outputs: z.array(z.object({ type: z.string() })).default([]),
  state_mutability: z.string().optional(),
});
const StructSchema = z.object({ type: z.literal('struct'), name: z.string(), members: z.array(ParamSchema) });
const EnumSchema = z.object({ type: z.literal('enum'), name: z.string(), variants: z.array(ParamSchema) });
const InterfaceSchema = z.object({ type: z.literal('interface'), name: z.string(), items: z.array(z.unknown()) });
const EntrySchema = z.object({ type: z.string() }).passthrough();

type FunctionEntry = z.infer<typeof FunctionSchema>;
type TypeDefinition = z.infer<typeof StructSchema> | z.infer<typeof EnumSchema>;

function parseEntry<T extends z.ZodTypeAny>(schema: T, raw: unknown): z.infer<T> {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) throw new AbiMismatchError('InvalidAbi', `Invalid ABI entry: ${parsed.error.message}`);
  return parsed.data;
}

const FELT_TYPES = new Set([
  'felt',
  'felt252',
  'core::felt252',
  'bytes31',
  'core::bytes_31::bytes31',
  'ContractAddress',
  'ClassHash',
  'core::starknet::contract_address::ContractAddress',
  'core::starknet::class_hash::ClassHash',
  'core::starknet::storage_access::StorageAddress',
]);
const ARRAY_BASES = new Set(['Array', 'Span', 'core::array::Array', 'core::array::Span']);
const OPTION_BASES = new Set(['Option', 'core::option::Option']);
const NON_ZERO_BASES = new Set(['NonZero', 'core::zeroable::NonZero']);

/** A Cairo 1 contract ABI, indexed for type resolution and function lookup. */
export class ContractAbi {
  private readonly functions = new Map<string, FunctionEntry>();
  private readonly definitions = new Map<string, TypeDefinition>();

  private constructor(entries: readonly unknown[]) {
    for (const raw of entries) {
      const { type } = parseEntry(EntrySchema, raw);
      switch (type) {
        case 'function':
        case 'l1_handler':
        case 'constructor': {
          const fn = parseEntry(FunctionSchema, raw);
          this.functions.set(fn.type === 'constructor' ? 'constructor' : fn.name, fn);
          break;
        }
        case 'interface':
          for (const item of parseEntry(InterfaceSchema, raw).items) {
            const fn = parseEntry(FunctionSchema, item);
            this.functions.set(fn.name, fn);
          }
          break;
        case 'struct': {
          const def = parseEntry(StructSchema, raw);
          this.definitions.set(def.name, def);
          break;
        }
        case 'enum': {
          const def = parseEntry(EnumSchema, raw);
          this.definitions.set(def.name, def);
          break;
        }
        default:
          // impl and event entries carry nothing the codec needs
          break;
      }
    }
  }

  /** Accepts an ABI array, its JSON text, or a Sierra class carrying one. */
  static parse(raw: unknown): ContractAbi {
    let value = raw;
    if (typeof value === 'string') {
      try {
        value = JSON.parse(value);
      } catch (e) {
        throw new AbiMismatchError('InvalidAbi', 'ABI text is not valid JSON', { cause: e });
      }
    }
    if (typeof value === 'object' && value !== null && !Array.isArray(value) && 'abi' in value) {
      return ContractAbi.parse(value.abi);
    }
    if (!Array.isArray(value)) throw new AbiMismatchError('InvalidAbi', 'ABI must be a JSON array');
    return new ContractAbi(value);
  }

  functionNames(): string[] {
    return [...this.functions.keys()];
  }

  getFunction(name: string): AbiFunction {
    const fn = this.functions.get(name);
    if (!fn) {
      throw new AbiMismatchError('UnknownFunction', `Function '${name}' not found in ABI`);
    }
    return {
      name: fn.name,
      inputs: fn.inputs.map((p) => ({ name: p.name, type: this.resolveType(p.type) })),
      outputs: fn.outputs.map((o) => this.resolveType(o.type)),
      stateMutability: fn.state_mutability,
    };
  }

  resolveType(typeName: string): AbiType {
    return this.resolve(typeName, []);
  }

  private resolve(raw: string, stack: readonly string[]): AbiType {
    const name = raw.trim().replace(/^@/, '');

    if (name.startsWith('(') && name.endsWith(')')) {
      const inner = name.slice(1, -1).trim();
      if (inner === '') return { kind: 'unit' };
      return { kind: 'tuple', members: splitTopLevel(inner).map((t) => this.resolve(t, stack)) };
    }

    const builtin = resolveBuiltin(name);
    if (builtin) return builtin;

    const generic = splitGeneric(name);
    if (generic && ARRAY_BASES.has(generic.base)) {
      return { kind: 'array', element: this.resolve(generic.arg, stack) };
    }
    if (generic && NON_ZERO_BASES.has(generic.base)) {
      return this.resolve(generic.arg, stack);
    }

    const def = this.definitions.get(name);
    if (def) {
      if (stack.includes(name)) {
        throw new AbiMismatchError('UnknownType', `Recursive type '${name}' cannot be encoded`);
      }
      const next = [...stack, name];
      const members = (def.type === 'struct' ? def.members : def.variants).map((m) => ({
        name: m.name,
        type: this.resolve(m.type, next),
      }));
      return def.type === 'struct' ? { kind: 'struct', name, members } : { kind: 'enum', name, variants: members };
    }

    if (generic && OPTION_BASES.has(generic.base)) {
      return optionOf(this.resolve(generic.arg, stack), name);
    }

    throw new AbiMismatchError('UnknownType', `Unknown ABI type '${raw}'`);
  }
}

export function parseAbi(raw: unknown): ContractAbi {
  return ContractAbi.parse(raw);
}

export function resolveType(abi: ContractAbi, typeName: string): AbiType {
  return abi.resolveType(typeName);
}

function resolveBuiltin(name: string): AbiType | undefined {
  if (FELT_TYPES.has(name)) return { kind: 'felt', name };
  const short = name.replace(/^core::integer::/, '');
  const uint = /^u(8|16|32|64|128)$/.exec(short);
  if (uint) return { kind: 'uint', bits: Number(uint[1]) };
  if (short === 'usize') return { kind: 'uint', bits: 32 };
  const int = /^i(8|16|32|64|128)$/.exec(short);
  if (int) return { kind: 'int', bits: Number(int[1]) };
  if (short === 'u256') return { kind: 'u256' };
  if (name === 'bool' || name === 'core::bool') return { kind: 'bool' };
  if (name === 'ByteArray' || name === 'core::byte_array::ByteArray') return { kind: 'bytearray' };
  return undefined;
}

/** `Option<T>` as Cairo lays it out: `Some` is variant 0, `None` variant 1. */
export function optionOf(inner: AbiType, name = 'core::option::Option'): AbiType {
  return {
    kind: 'enum',
    name,
    variants: [
      { name: 'Some', type: inner },
      { name: 'None', type: { kind: 'unit' } },
    ],
  };
}

function splitGeneric(name: string): { base: string; arg: string } | undefined {
  const idx = name.indexOf('<');
  if (idx === -1 || !name.endsWith('>')) return undefined;
  const base = name.slice(0, idx).replace(/::$/, '');
  return { base, arg: name.slice(idx + 1, -1) };
}

function splitTopLevel(s: string): string[] {
  const parts: string[] = [];
  let depth = 0;
  let start = 0;
  for (let i = 0; i < s.length; i++) {
    const c = s[i];
    if (c === '(' || c === '<') depth++;
    else if (c === ')' || c === '>') depth--;
    else if (c === ',' && depth === 0) {
      parts.push(s.slice(start, i));
      start = i + 1;
    }
  }
  const last = s.slice(start);
  if (last.trim() !== '') parts.push(last);
  return parts;
}

// ---------------------------------------------------------------------------
// Literal arguments -> values
// ---------------------------------------------------------------------------

class TokenCursor {
  private pos = 0;

  constructor(
    private readonly tokens: readonly string[],
    readonly context: LiteralContext,
  ) {}

  peek(): string | undefined {
    return this.tokens[this.pos];
  }

  next(expected: string): string {
    const token = this.tokens[this.pos];
    if (token === undefined) {
      throw new AbiMismatchError('ArityMismatch', `Not enough arguments: missing ${expected}`);
    }
    this.pos++;
    return token;
  }

  /** A token standing for one scalar value; array markers are not. */
  scalar(expected: string): string {
    const token = this.next(expected);
    if (token === ARRAY_START || token === ARRAY_END) {
      throw new AbiMismatchError('ArityMismatch', `Unexpected '${token}' where ${expected} was expected`);
    }
    return token;
  }

  get remaining(): number {
    return this.tokens.length - this.pos;
  }
}

export function describeType(type: AbiType): string {
  switch (type.kind) {
    case 'felt':
      return 'felt252';
    case 'uint':
      return `u${type.bits}`;
    case 'int':
      return `i${type.bits}`;
    case 'bool':
    case 'u256':
      return type.kind;
    case 'bytearray':
      return 'ByteArray';
    case 'unit':
      return '()';
    case 'array':
      return `Array<${describeType(type.element)}>`;
    case 'tuple':
      return `(${type.members.map(describeType).join(', ')})`;
    case 'struct':
    case 'enum':
      return type.name;
  }
}

function checkRange(value: bigint, min: bigint, max: bigint, type: AbiType): bigint {
  if (value < min || value > max) {
    throw new AbiMismatchError('ArgumentOutOfRange', `${value} is out of range for ${describeType(type)}`);
  }
  return value;
}

function uintMax(bits: number): bigint {
  return (1n << BigInt(bits)) - 1n;
}

function intBounds(bits: number): [bigint, bigint] {
  const half = 1n << BigInt(bits - 1);
  return [-half, half - 1n];
}

function parseValue(type: AbiType, cursor: TokenCursor): AbiValue {
  const expected = describeType(type);
  switch (type.kind) {
    case 'felt':
      return decodeSingleFelt(cursor.scalar(expected), cursor.context);
    case 'uint':
      return checkRange(parseInteger(cursor.scalar(expected)), 0n, uintMax(type.bits), type);
    case 'int': {
      const [min, max] = intBounds(type.bits);
      return checkRange(parseInteger(cursor.scalar(expected)), min, max, type);
    }
    case 'bool': {
      const token = cursor.scalar(expected).toLowerCase();
      if (token === 'true' || token === '1') return true;
      if (token === 'false' || token === '0') return false;
      throw new EncodingError('Malformed', `Not a bool: '${token}'`);
    }
    case 'u256':
      return checkRange(parseInteger(cursor.scalar(expected)), 0n, uintMax(256), type);
    case 'bytearray':
      return cursor.scalar(expected);
    case 'unit':
      return [];
    case 'array': {
      const open = cursor.next(`'${ARRAY_START}' opening ${expected}`);
      if (open !== ARRAY_START) {
        throw new AbiMismatchError('ArityMismatch', `Expected '${ARRAY_START}' to open ${expected}, got '${open}'`);
      }
      const items: AbiValue[] = [];
      while (cursor.peek() !== ARRAY_END) {
        if (cursor.peek() === undefined) {
          throw new AbiMismatchError('ArityMismatch', `Missing '${ARRAY_END}' closing ${expected}`);
        }
        const before = cursor.remaining;
        items.push(parseValue(type.element, cursor));
        if (cursor.remaining === before) {
          throw new AbiMismatchError('ArityMismatch', `${expected} elements take no arguments, so '${cursor.peek()}' cannot be one`);
        }
      }
      cursor.next(ARRAY_END);
      return items;
    }
    case 'tuple':
      return type.members.map((m) => parseValue(m, cursor));
    case 'struct': {
      const out: Record<string, AbiValue> = {};
      for (const m of type.members) out[m.name] = parseValue(m.type, cursor);
      return out;
    }
    case 'enum': {
      const token = cursor.scalar(`variant of ${expected}`);
      const variant = findVariant(type, token);
      return { variant: variant.name, value: parseValue(variant.type, cursor) };
    }
  }
}

function findVariant(type: Extract<AbiType, { kind: 'enum' }>, token: string): AbiMember {
  const byName = type.variants.find((v) => v.name === token);
  if (byName) return byName;
  if (/^[0-9]+$/.test(token)) {
    const byIndex = type.variants[Number(token)];
    if (byIndex) return byIndex;
  }
  throw new AbiMismatchError(
    'ArgumentOutOfRange',
    `'${token}' is not a variant of ${type.name} (${type.variants.map((v) => v.name).join(', ')})`,
  );
}

/**
 * Reads one value per type from the literal tokens. Arrays are written as a
 * `[` ... `]` group; every token must be consumed.
 */
export function parseArguments(
  types: readonly AbiType[],
  tokens: readonly string[],
  ctx: LiteralContext = {},
): AbiValue[] {
  const cursor = new TokenCursor(tokens, ctx);
  const values = types.map((t) => parseValue(t, cursor));
  if (cursor.remaining > 0) {
    throw new AbiMismatchError(
      'ArityMismatch',
      `Too many arguments: expected ${types.length} value(s), ${cursor.remaining} token(s) left over`,
    );
  }
  return values;
}

// ---------------------------------------------------------------------------
// Values -> felts
// ---------------------------------------------------------------------------

function invalid(type: AbiType, value: AbiValue): AbiMismatchError {
  const shown = typeof value === 'bigint' ? value.toString() : JSON.stringify(value, (_k, v) => (typeof v === 'bigint' ? v.toString() : v));
  return new AbiMismatchError('ArgumentOutOfRange', `Value ${shown} does not fit ${describeType(type)}`);
}

function isStructValue(value: AbiValue): value is AbiStructValue {
  return typeof value === 'object' && !Array.isArray(value);
}

function expectBigint(type: AbiType, value: AbiValue): bigint {
  if (typeof value !== 'bigint') throw invalid(type, value);
  return value;
}

export function encodeValue(type: AbiType, value: AbiValue): Felt[] {
  switch (type.kind) {
    case 'felt': {
      const v = expectBigint(type, value);
      checkRange(v, 0n, FIELD_PRIME - 1n, type);
      return [toFelt(v)];
    }
    case 'uint':
      return [toFelt(checkRange(expectBigint(type, value), 0n, uintMax(type.bits), type))];
    case 'int': {
      const [min, max] = intBounds(type.bits);
      return [feltFromModulo(checkRange(expectBigint(type, value), min, max, type))];
    }
    case 'bool':
      if (typeof value !== 'boolean') throw invalid(type, value);
      return [toFelt(value ? 1n : 0n)];
    case 'u256':
      return splitU256(checkRange(expectBigint(type, value), 0n, uintMax(256), type));
    case 'bytearray':
      if (typeof value !== 'string') throw invalid(type, value);
      return encodeByteArray(value);
    case 'unit':
      if (!Array.isArray(value) || value.length !== 0) throw invalid(type, value);
      return [];
    case 'array':
      if (!Array.isArray(value)) throw invalid(type, value);
      return [toFelt(BigInt(value.length)), ...value.flatMap((v) => encodeValue(type.element, v))];
    case 'tuple': {
      if (!Array.isArray(value) || value.length !== type.members.length) throw invalid(type, value);
      const items: AbiValue[] = value;
      return type.members.flatMap((m, i) => encodeValue(m, items[i]));
    }
    case 'struct': {
      if (!isStructValue(value)) throw invalid(type, value);
      const record: AbiStructValue = value;
      return type.members.flatMap((m) => {
        const field = record[m.name];
        if (field === undefined) {
          throw new AbiMismatchError('ArityMismatch', `Missing member '${m.name}' of ${type.name}`);
        }
        return encodeValue(m.type, field);
      });
    }
    case 'enum': {
      if (!isStructValue(value) || typeof value.variant !== 'string' || value.value === undefined) {
        throw invalid(type, value);
      }
      const { variant, value: payload } = value;
      const index = type.variants.findIndex((v) => v.name === variant);
      if (index === -1) throw invalid(type, value);
      return [toFelt(BigInt(index)), ...encodeValue(type.variants[index].type, payload)];
    }
  }
}

export function encodeValues(types: readonly AbiType[], values: readonly AbiValue[]): Felt[] {
  if (types.length !== values.length) {
    throw new AbiMismatchError('ArityMismatch', `Expected ${types.length} value(s), got ${values.length}`);
  }
  return types.flatMap((t, i) => encodeValue(t, values[i]));
}

export function encodeArguments(types: readonly AbiType[], tokens: readonly string[], ctx: LiteralContext = {}): Felt[] {
  return encodeValues(types, parseArguments(types, tokens, ctx));
}

const BYTES_PER_WORD = 31;
const PRINTABLE_ASCII = /^[\x20-\x7e]*$/;

/** `[full_words_len, ...full_words, pending_word, pending_word_len]`, 31 bytes per word. */
export function encodeByteArray(text: string): Felt[] {
  if (PRINTABLE_ASCII.test(text)) {
    const { data, pending_word, pending_word_len } = byteArray.byteArrayFromString(text);
    const words = data.map((w) => toFelt(BigInt(w)));
    return [toFelt(BigInt(words.length)), ...words, toFelt(BigInt(pending_word)), toFelt(BigInt(pending_word_len))];
  }
  // multi-byte and control characters are packed from their UTF-8 bytes
  const bytes = new TextEncoder().encode(text);
  const words: Felt[] = [];
  let i = 0;
  for (; i + BYTES_PER_WORD <= bytes.length; i += BYTES_PER_WORD) {
    words.push(feltFromBytes(bytes.subarray(i, i + BYTES_PER_WORD)));
  }
  const pending = bytes.subarray(i);
  return [toFelt(BigInt(words.length)), ...words, feltFromBytes(pending), toFelt(BigInt(pending.length))];
}

// ---------------------------------------------------------------------------
// Felts -> values
// ---------------------------------------------------------------------------

class FeltReader {
  private pos = 0;

  constructor(private readonly felts: readonly Felt[]) {}

  next(what: string): Felt {
    const v = this.felts[this.pos];
    if (v === undefined) {
      throw new AbiMismatchError('TruncatedOutput', `Output ended while reading ${what} at position ${this.pos}`);
    }
    this.pos++;
    return v;
  }

  get remaining(): number {
    return this.felts.length - this.pos;
  }
}

function decodeValue(type: AbiType, reader: FeltReader): AbiValue {
  const what = describeType(type);
  switch (type.kind) {
    case 'felt':
      return reader.next(what);
    case 'uint':
      return checkRange(reader.next(what), 0n, uintMax(type.bits), type);
    case 'int': {
      const raw = reader.next(what);
      const [min, max] = intBounds(type.bits);
      return checkRange(raw > FIELD_PRIME / 2n ? raw - FIELD_PRIME : raw, min, max, type);
    }
    case 'bool': {
      const raw = reader.next(what);
      if (raw > 1n) throw new AbiMismatchError('ArgumentOutOfRange', `${raw} is not a bool`);
      return raw === 1n;
    }
    case 'u256': {
      const low = checkRange(reader.next('u256 low'), 0n, uintMax(128), type);
      const high = checkRange(reader.next('u256 high'), 0n, uintMax(128), type);
      return uint256.uint256ToBN({ low, high });
    }
    case 'bytearray':
      return decodeByteArray(reader);
    case 'unit':
      return [];
    case 'array': {
      const len = reader.next(`${what} length`);
      if (len > BigInt(reader.remaining)) {
        throw new AbiMismatchError('TruncatedOutput', `${what} claims ${len} elements but only ${reader.remaining} felts remain`);
      }
      const items: AbiValue[] = [];
      for (let i = 0n; i < len; i++) items.push(decodeValue(type.element, reader));
      return items;
    }
    case 'tuple':
      return type.members.map((m) => decodeValue(m, reader));
    case 'struct': {
      const out: Record<string, AbiValue> = {};
      for (const m of type.members) out[m.name] = decodeValue(m.type, reader);
      return out;
    }
    case 'enum': {
      const index = reader.next(`${what} variant`);
      const variant = index < BigInt(type.variants.length) ? type.variants[Number(index)] : undefined;
      if (!variant) {
        throw new AbiMismatchError('ArgumentOutOfRange', `${index} is not a variant index of ${type.name}`);
      }
      return { variant: variant.name, value: decodeValue(variant.type, reader) };
    }
  }
}

const UTF8 = new TextDecoder('utf-8', { fatal: true });

function decodeByteArray(reader: FeltReader): string {
  const count = reader.next('ByteArray word count');
  if (count > BigInt(reader.remaining)) {
    throw new AbiMismatchError('TruncatedOutput', `ByteArray claims ${count} words but only ${reader.remaining} felts remain`);
  }
  const chunks: Uint8Array[] = [];
  for (let i = 0n; i < count; i++) chunks.push(wordBytes(reader.next('ByteArray word'), BYTES_PER_WORD));
  const pending = reader.next('ByteArray pending word');
  const pendingLen = reader.next('ByteArray pending length');
  if (pendingLen >= BigInt(BYTES_PER_WORD)) {
    throw new AbiMismatchError('ArgumentOutOfRange', `ByteArray pending length ${pendingLen} exceeds 30`);
  }
  chunks.push(wordBytes(pending, Number(pendingLen)));

  const bytes = new Uint8Array(chunks.reduce((n, c) => n + c.length, 0));
  let offset = 0;
  for (const c of chunks) {
    bytes.set(c, offset);
    offset += c.length;
  }
  try {
    return UTF8.decode(bytes);
  } catch (e) {
    throw new AbiMismatchError('ArgumentOutOfRange', 'ByteArray output is not valid UTF-8', { cause: e });
  }
}

function wordBytes(word: Felt, len: number): Uint8Array {
  try {
    return bigintToBytes(word, len);
  } catch (e) {
    throw new AbiMismatchError('ArgumentOutOfRange', `ByteArray word ${word} does not fit ${len} bytes`, { cause: e });
  }
}

/** Decodes one value per type; the input must be consumed exactly. */
export function decodeValues(types: readonly AbiType[], felts: readonly Felt[]): AbiValue[] {
  const reader = new FeltReader(felts);
  const values = types.map((t) => decodeValue(t, reader));
  if (reader.remaining > 0) {
    throw new AbiMismatchError('TruncatedOutput', `${reader.remaining} felt(s) left over after decoding`);
  }
  return values;
}

// ---------------------------------------------------------------------------
// Function-level helpers
// ---------------------------------------------------------------------------

/**
 * Calldata for `functionName`. Without an ABI every token is taken as a raw
 * felt literal with no structure.
 */
export function encodeFunctionCall(
  abi: ContractAbi | undefined,
  functionName: string,
  tokens: readonly string[],
  ctx: LiteralContext = {},
): Felt[] {
  if (!abi) return decodeLiterals(tokens, ctx);
  const fn = abi.getFunction(functionName);
  return encodeArguments(
    fn.inputs.map((i) => i.type),
    tokens,
    ctx,
  );
}

export function decodeFunctionOutput(abi: ContractAbi, functionName: string, felts: readonly Felt[]): AbiValue[] {
  return decodeValues(abi.getFunction(functionName).outputs, felts);
}

/** Decoded values as JSON-friendly data: bigints become decimal strings. */
export function abiValueToJson(value: AbiValue): unknown {
  if (typeof value === 'bigint') return value.toString();
  if (Array.isArray(value)) return value.map(abiValueToJson);
  if (typeof value === 'object') {
    return Object.fromEntries(Object.entries(value).map(([k, v]) => [k, abiValueToJson(v)]));
  }
  return value;
}

