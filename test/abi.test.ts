import fs from 'node:fs';
import fc from 'fast-check';
import { byteArray } from 'starknet';
import { describe, expect, it } from 'vitest';
import {
  type AbiType,
  ContractAbi,
  abiValueToJson,
  decodeFunctionOutput,
  decodeValues,
  describeType,
  encodeArguments,
  encodeByteArray,
  encodeFunctionCall,
  encodeValues,
  parseAbi,
  parseArguments,
  resolveType,
} from '../src/abi.js';
import { DEFAULT_UDC_ADDRESS } from '../src/calls.js';
import { AbiMismatchError } from '../src/errors.js';
import { encodeShortString } from '../src/hashing.js';
import { FIELD_PRIME, toFelt } from '../src/felt.js';
import { fixture, thrown } from './helpers.js';

const FELT: AbiType = { kind: 'felt', name: 'core::felt252' };

const DEMO_ABI = [
  {
    type: 'struct',
    name: 'demo::Point',
    members: [
      { name: 'x', type: 'core::felt252' },
      { name: 'y', type: 'core::integer::u8' },
    ],
  },
  {
    type: 'enum',
    name: 'demo::Mode',
    variants: [
      { name: 'Off', type: '()' },
      { name: 'Level', type: 'core::integer::u8' },
    ],
  },
  { type: 'struct', name: 'demo::Node', members: [{ name: 'next', type: 'demo::Node' }] },
  {
    type: 'function',
    name: 'move_to',
    inputs: [
      { name: 'point', type: 'demo::Point' },
      { name: 'mode', type: 'demo::Mode' },
      { name: 'tag', type: 'core::option::Option::<core::felt252>' },
    ],
    outputs: [{ type: '(core::integer::u8, core::array::Array::<core::felt252>)' }],
    state_mutability: 'external',
  },
  { type: 'event', name: 'demo::Moved', kind: 'struct', members: [] },
];

describe('ContractAbi', () => {
  const abi = parseAbi(DEMO_ABI);

  it('indexes functions from interfaces and the constructor', () => {
    const sierra = ContractAbi.parse(JSON.parse(fs.readFileSync(fixture('sierra.json'), 'utf8')));
    expect(sierra.functionNames().sort()).toEqual(['constructor', 'transfer']);
    const transfer = sierra.getFunction('transfer');
    expect(transfer.inputs.map((i) => describeType(i.type))).toEqual(['felt252', 'u256']);
    expect(transfer.outputs).toEqual([{ kind: 'bool' }]);
  });

  it('accepts the ABI as JSON text', () => {
    expect(ContractAbi.parse(JSON.stringify(DEMO_ABI)).functionNames()).toEqual(['move_to']);
    expect(thrown(() => ContractAbi.parse('{'))).toMatchObject({ code: 'InvalidAbi' });
    expect(thrown(() => ContractAbi.parse(42))).toMatchObject({ code: 'InvalidAbi' });
  });

  it('resolves builtin, generic and defined types', () => {
    expect(resolveType(abi, 'core::integer::u64')).toEqual({ kind: 'uint', bits: 64 });
    expect(resolveType(abi, '@core::array::Span::<core::integer::i16>')).toEqual({
      kind: 'array',
      element: { kind: 'int', bits: 16 },
    });
    expect(resolveType(abi, 'core::zeroable::NonZero::<core::felt252>')).toEqual(FELT);
    expect(describeType(resolveType(abi, '(core::bool, demo::Point)'))).toBe('(bool, demo::Point)');
    expect(resolveType(abi, '()')).toEqual({ kind: 'unit' });
    expect(resolveType(abi, 'core::bytes_31::bytes31')).toEqual({ kind: 'felt', name: 'core::bytes_31::bytes31' });
  });

  it('reports unknown functions and types', () => {
    const err = thrown(() => abi.getFunction('nope'));
    expect(err).toBeInstanceOf(AbiMismatchError);
    expect(err).toMatchObject({ code: 'UnknownFunction' });
    expect(thrown(() => abi.resolveType('demo::Missing'))).toMatchObject({ code: 'UnknownType' });
    expect(thrown(() => abi.resolveType('demo::Node'))).toMatchObject({ code: 'UnknownType' });
  });
});

describe('argument encoding', () => {
  it('groups array elements between brackets', () => {
    const types: AbiType[] = [FELT, FELT, { kind: 'array', element: FELT }];
    expect(encodeArguments(types, ['1', '2', '[', '3', '4', ']'])).toEqual([1n, 2n, 2n, 3n, 4n]);
    expect(encodeArguments([{ kind: 'array', element: FELT }], ['[', ']'])).toEqual([0n]);
  });

  it('splits u256 and maps bool and signed values', () => {
    expect(encodeArguments([{ kind: 'u256' }], [`${(3n << 128n) + 5n}`])).toEqual([5n, 3n]);
    expect(encodeArguments([{ kind: 'bool' }, { kind: 'bool' }], ['true', '0'])).toEqual([1n, 0n]);
    expect(encodeArguments([{ kind: 'int', bits: 8 }], ['-1'])).toEqual([FIELD_PRIME - 1n]);
  });

  it('enforces integer ranges', () => {
    expect(thrown(() => encodeArguments([{ kind: 'uint', bits: 8 }], ['256']))).toMatchObject({
      code: 'ArgumentOutOfRange',
    });
    expect(thrown(() => encodeArguments([{ kind: 'int', bits: 8 }], ['-129']))).toMatchObject({
      code: 'ArgumentOutOfRange',
    });
  });

  it('checks arity', () => {
    expect(thrown(() => encodeArguments([FELT, FELT], ['1']))).toMatchObject({ code: 'ArityMismatch' });
    expect(thrown(() => encodeArguments([FELT], ['1', '2']))).toMatchObject({ code: 'ArityMismatch' });
    expect(thrown(() => encodeArguments([FELT], ['[']))).toMatchObject({ code: 'ArityMismatch' });
    expect(thrown(() => encodeArguments([{ kind: 'array', element: FELT }], ['[', '1']))).toMatchObject({
      code: 'ArityMismatch',
    });
  });

  it('rejects array items of a type that takes no arguments', () => {
    expect(encodeArguments([{ kind: 'array', element: { kind: 'unit' } }], ['[', ']'])).toEqual([0n]);
    expect(thrown(() => encodeArguments([{ kind: 'array', element: { kind: 'unit' } }], ['[', '1', ']']))).toMatchObject({
      code: 'ArityMismatch',
    });
    const abi = parseAbi([
      { type: 'struct', name: 'demo::Empty', members: [] },
      {
        type: 'function',
        name: 'f',
        inputs: [{ name: 'items', type: 'core::array::Array::<demo::Empty>' }],
        outputs: [],
        state_mutability: 'external',
      },
    ]);
    expect(thrown(() => encodeFunctionCall(abi, 'f', ['[', '1', ']']))).toMatchObject({ code: 'ArityMismatch' });
  });

  it('encodes structs, enums and options through a function signature', () => {
    const abi = parseAbi(DEMO_ABI);
    expect(encodeFunctionCall(abi, 'move_to', ['str:a', '7', 'Level', '3', 'Some', '9'])).toEqual([
      0x61n,
      7n,
      1n,
      3n,
      0n,
      9n,
    ]);
    expect(encodeFunctionCall(abi, 'move_to', ['1', '2', '0', 'None'])).toEqual([1n, 2n, 0n, 1n]);
    expect(thrown(() => encodeFunctionCall(abi, 'move_to', ['1', '2', 'Max', 'None']))).toMatchObject({
      code: 'ArgumentOutOfRange',
    });
  });

  it('passes the chain to felt literals', () => {
    const types: AbiType[] = [FELT, { kind: 'array', element: FELT }];
    const chainId = encodeShortString('SN_SEPOLIA');
    expect(encodeArguments(types, ['addr:udc', '[', 'addr:udc', ']'], { chainId })).toEqual([
      DEFAULT_UDC_ADDRESS,
      1n,
      DEFAULT_UDC_ADDRESS,
    ]);
    expect(encodeFunctionCall(undefined, 'anything', ['addr:udc'], { chainId })).toEqual([DEFAULT_UDC_ADDRESS]);
  });

  it('takes raw literals when there is no ABI', () => {
    expect(encodeFunctionCall(undefined, 'anything', ['1', 'u256:2'])).toEqual([1n, 2n, 0n]);
    expect(thrown(() => encodeFunctionCall(undefined, 'anything', ['[']))).toMatchObject({ code: 'Malformed' });
  });
});

describe('ByteArray', () => {
  it('packs short text into the pending word', () => {
    expect(encodeByteArray('hello')).toEqual([0n, 0x68656c6c6fn, 5n]);
    expect(encodeByteArray('')).toEqual([0n, 0n, 0n]);
  });

  it('fills 31-byte words before the pending word', () => {
    const word = BigInt(`0x${'61'.repeat(31)}`);
    expect(encodeByteArray(`${'a'.repeat(31)}b`)).toEqual([1n, word, 0x62n, 1n]);
  });

  it('matches the library encoding of ASCII text', () => {
    const text = 'cairn '.repeat(12);
    const { data, pending_word, pending_word_len } = byteArray.byteArrayFromString(text);
    expect(encodeByteArray(text)).toEqual([
      BigInt(data.length),
      ...data.map((w) => BigInt(w)),
      BigInt(pending_word),
      BigInt(pending_word_len),
    ]);
  });

  it('rejects output that is not valid UTF-8', () => {
    const err = thrown(() => decodeValues([{ kind: 'bytearray' }], [0n, 0xffn, 1n].map((v) => toFelt(v))));
    expect(err).toBeInstanceOf(AbiMismatchError);
    expect(err).toMatchObject({ code: 'ArgumentOutOfRange' });
  });

  it('decodes what it encodes', () => {
    const type: AbiType = { kind: 'bytearray' };
    const text = 'cairn ✓ '.repeat(9);
    expect(decodeValues([type], encodeByteArray(text))).toEqual([text]);
  });
});

describe('output decoding', () => {
  it('decodes function outputs by their declared types', () => {
    const abi = parseAbi(DEMO_ABI);
    const felts = [7n, 2n, 10n, 11n].map((v) => toFelt(v));
    const values = decodeFunctionOutput(abi, 'move_to', felts);
    expect(values).toEqual([[7n, [10n, 11n]]]);
    expect(abiValueToJson(values[0])).toEqual(['7', ['10', '11']]);
  });

  it('reports truncated and oversized output', () => {
    const types: AbiType[] = [{ kind: 'u256' }];
    expect(thrown(() => decodeValues(types, [toFelt(1n)]))).toMatchObject({ code: 'TruncatedOutput' });
    expect(thrown(() => decodeValues(types, [1n, 2n, 3n].map((v) => toFelt(v))))).toMatchObject({
      code: 'TruncatedOutput',
    });
    expect(thrown(() => decodeValues([{ kind: 'array', element: FELT }], [toFelt(5n)]))).toMatchObject({
      code: 'TruncatedOutput',
    });
  });

  it('maps signed integers back from the field', () => {
    expect(decodeValues([{ kind: 'int', bits: 32 }], [toFelt(FIELD_PRIME - 5n)])).toEqual([-5n]);
  });

  it('round-trips parsed arguments', () => {
    const types: AbiType[] = [{ kind: 'u256' }, { kind: 'array', element: { kind: 'int', bits: 64 } }, { kind: 'bool' }];
    fc.assert(
      fc.property(
        fc.bigInt({ min: 0n, max: (1n << 256n) - 1n }),
        fc.array(fc.bigInt({ min: -(1n << 63n), max: (1n << 63n) - 1n }), { maxLength: 8 }),
        fc.boolean(),
        (u, ints, flag) => {
          const tokens = [u.toString(), '[', ...ints.map(String), ']', String(flag)];
          const values = parseArguments(types, tokens);
          expect(decodeValues(types, encodeValues(types, values))).toEqual([u, ints, flag]);
        },
      ),
    );
  });
});
