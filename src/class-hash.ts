import { UnsupportedFormatError } from './errors.js';
import { type Felt, feltFromHexOrDec, feltFromModulo, toFelt } from './felt.js';
import { encodeShortString, pedersenArray, poseidonArray, starknetKeccak } from './hashing.js';
import { pythonJsonDumps } from './python-json.js';
import {
  type CasmClass,
  type ContractClass,
  type LegacyClass,
  type NestedLengths,
  type SierraClass,
  parseContractClass,
} from './artifacts.js';

export const SIERRA_CLASS_VERSION = '0.1.0';

const LEGACY_API_VERSION = toFelt(0n);
const CONTRACT_CLASS_V0_1_0 = encodeShortString('CONTRACT_CLASS_V0.1.0');
const COMPILED_CLASS_V1 = encodeShortString('COMPILED_CLASS_V1');

/** Entry-point kinds in the order every class layout hashes them. */
const ENTRY_POINT_KINDS = ['EXTERNAL', 'L1_HANDLER', 'CONSTRUCTOR'] as const;

export function computeClassHash(input: unknown): Felt {
  const cls = isContractClass(input) ? input : parseContractClass(input);
  switch (cls.format) {
    case 'legacy':
      return computeLegacyClassHash(cls.contractClass);
    case 'sierra':
      return computeSierraClassHash(cls.contractClass);
    case 'casm':
      return computeCompiledClassHash(cls.contractClass);
  }
}

function isContractClass(v: unknown): v is ContractClass {
  return (
    typeof v === 'object' &&
    v !== null &&
    'format' in v &&
    'contractClass' in v &&
    (v.format === 'legacy' || v.format === 'sierra' || v.format === 'casm')
  );
}

// ---------------------------------------------------------------------------
// Legacy (Cairo 0) classes: Pedersen
// ---------------------------------------------------------------------------

export function computeLegacyClassHash(cls: LegacyClass): Felt {
  const entryPointHashes = ENTRY_POINT_KINDS.map((kind) =>
    pedersenArray(
      cls.entry_points_by_type[kind].flatMap((ep) => [feltFromHexOrDec(ep.selector), feltFromHexOrDec(ep.offset)]),
    ),
  );
  const builtinsHash = pedersenArray(cls.program.builtins.map(encodeShortString));
  const dataHash = pedersenArray(cls.program.data.map((d) => feltFromHexOrDec(d)));

  return pedersenArray([LEGACY_API_VERSION, ...entryPointHashes, builtinsHash, computeHintedClassHash(cls), dataHash]);
}

/**
 * Keccak over the sorted-key JSON of `{ abi, program }`, with debug info
 * stripped and the attribute fields that older compilers never emitted
 * removed so that old class hashes stay stable.
 */
export function computeHintedClassHash(cls: LegacyClass): Felt {
  const { attributes, ...rest } = cls.program;
  const program: Record<string, unknown> = { ...rest, debug_info: null };

  if (Array.isArray(attributes) && attributes.length > 0) {
    program.attributes = attributes.map((attr: unknown) => {
      if (typeof attr !== 'object' || attr === null) return attr;
      const out: Record<string, unknown> = { ...attr };
      if (Array.isArray(out.accessible_scopes) && out.accessible_scopes.length === 0) delete out.accessible_scopes;
      if (out.flow_tracking_data === null) delete out.flow_tracking_data;
      return out;
    });
  }

  const serialized = pythonJsonDumps({ abi: cls.abi ?? null, program }, true);
  return starknetKeccak(serialized);
}

// ---------------------------------------------------------------------------
// Sierra (Cairo 1) classes: Poseidon
// ---------------------------------------------------------------------------

export function computeSierraClassHash(cls: SierraClass): Felt {
  if (cls.contract_class_version !== SIERRA_CLASS_VERSION) {
    throw new UnsupportedFormatError(
      'UnsupportedClassVersion',
      `Unsupported Sierra contract_class_version '${cls.contract_class_version}' (expected ${SIERRA_CLASS_VERSION})`,
    );
  }

  const entryPointHashes = ENTRY_POINT_KINDS.map((kind) =>
    poseidonArray(
      cls.entry_points_by_type[kind].flatMap((ep) => [feltFromHexOrDec(ep.selector), toFelt(ep.function_idx)]),
    ),
  );
  const programHash = poseidonArray(cls.sierra_program.map((x) => feltFromHexOrDec(x)));

  return poseidonArray([CONTRACT_CLASS_V0_1_0, ...entryPointHashes, computeAbiHash(cls), programHash]);
}

export function sierraAbiString(cls: SierraClass): string {
  return typeof cls.abi === 'string' ? cls.abi : pythonJsonDumps(cls.abi, false);
}

export function computeAbiHash(cls: SierraClass): Felt {
  return starknetKeccak(sierraAbiString(cls));
}

// ---------------------------------------------------------------------------
// CASM: the compiled class hash a Sierra declaration commits to
// ---------------------------------------------------------------------------

export function computeCompiledClassHash(cls: CasmClass): Felt {
  const entryPointHashes = ENTRY_POINT_KINDS.map((kind) =>
    poseidonArray(
      cls.entry_points_by_type[kind].flatMap((ep) => [
        feltFromHexOrDec(ep.selector),
        toFelt(ep.offset),
        poseidonArray(ep.builtins.map(encodeShortString)),
      ]),
    ),
  );
  const bytecode = cls.bytecode.map((x) => feltFromHexOrDec(x));
  const bytecodeHash =
    cls.bytecode_segment_lengths === undefined
      ? poseidonArray(bytecode)
      : hashBytecodeSegments(bytecode, cls.bytecode_segment_lengths);

  return poseidonArray([COMPILED_CLASS_V1, ...entryPointHashes, bytecodeHash]);
}

/**
 * Merkle-like hash over the segment tree: leaves hash their slice of the
 * bytecode, inner nodes hash `(length, hash)` pairs of their children plus one.
 */
export function hashBytecodeSegments(bytecode: readonly Felt[], lengths: NestedLengths): Felt {
  const cursor = { offset: 0 };
  const { hash, length } = hashSegmentNode(bytecode, lengths, cursor);
  if (cursor.offset !== bytecode.length || length !== bytecode.length) {
    throw new UnsupportedFormatError(
      'UnsupportedClassVersion',
      `bytecode_segment_lengths cover ${cursor.offset} of ${bytecode.length} bytecode words`,
    );
  }
  return hash;
}

function hashSegmentNode(
  bytecode: readonly Felt[],
  node: NestedLengths,
  cursor: { offset: number },
): { hash: Felt; length: number } {
  if (typeof node === 'number') {
    const segment = bytecode.slice(cursor.offset, cursor.offset + node);
    if (segment.length !== node) {
      throw new UnsupportedFormatError('UnsupportedClassVersion', 'bytecode_segment_lengths exceed the bytecode');
    }
    cursor.offset += node;
    return { hash: poseidonArray(segment), length: node };
  }

  const children = node.map((child) => hashSegmentNode(bytecode, child, cursor));
  const leaves = children.flatMap((c) => [toFelt(c.length), c.hash]);
  const length = children.reduce((acc, c) => acc + c.length, 0);
  return { hash: feltFromModulo(poseidonArray(leaves) + 1n), length };
}
