import fs from 'node:fs';
import { describe, expect, it } from 'vitest';
import { hash, json } from 'starknet';
import { UnsupportedFormatError } from '../src/errors.js';
import { toFelt } from '../src/felt.js';
import { encodeShortString, poseidonArray } from '../src/hashing.js';
import { loadContractClass, parseContractClass, readJsonFile } from '../src/artifacts.js';
import {
  computeClassHash,
  computeCompiledClassHash,
  computeHintedClassHash,
  computeLegacyClassHash,
  computeSierraClassHash,
  hashBytecodeSegments,
} from '../src/class-hash.js';
import { pythonJsonDumps } from '../src/python-json.js';
import { fixture, thrown } from './helpers.js';

function libraryView(name: string) {
  return json.parse(fs.readFileSync(fixture(name), 'utf8'));
}

function jsonObject(name: string): Record<string, unknown> {
  const raw = readJsonFile(fixture(name));
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) throw new Error(`${name} is not an object`);
  return { ...raw };
}

describe('python-compatible JSON', () => {
  it('uses Python separators and escapes non-ASCII', () => {
    expect(pythonJsonDumps({ b: 1, a: [true, null, 'é'] }, true)).toBe('{"a": [true, null, "\\u00e9"], "b": 1}');
    expect(pythonJsonDumps({ b: 1, a: 2 }, false)).toBe('{"b": 1, "a": 2}');
    expect(pythonJsonDumps([], false)).toBe('[]');
    expect(pythonJsonDumps({}, true)).toBe('{}');
  });
});

describe('class detection', () => {
  it('recognises each class format by its marker fields', () => {
    expect(loadContractClass(fixture('sierra.json')).format).toBe('sierra');
    expect(loadContractClass(fixture('casm.json')).format).toBe('casm');
    expect(loadContractClass(fixture('legacy.json')).format).toBe('legacy');
  });

  it('rejects unrecognised documents', () => {
    const err = thrown(() => parseContractClass({ hello: 'world' }));
    expect(err).toBeInstanceOf(UnsupportedFormatError);
    expect(err).toMatchObject({ code: 'UnsupportedClassVersion' });
    expect(thrown(() => parseContractClass([1, 2]))).toMatchObject({ code: 'UnsupportedClassVersion' });
  });

  it('reports missing files', () => {
    expect(thrown(() => readJsonFile(fixture('missing.json')))).toMatchObject({ code: 'NotFound' });
  });
});

describe('Sierra class hash', () => {
  it('matches the library implementation', () => {
    const ours = computeClassHash(readJsonFile(fixture('sierra.json')));
    expect(ours).toBe(BigInt(hash.computeSierraContractClassHash(libraryView('sierra.json'))));
  });

  it('is unchanged when the ABI is given as its JSON text', () => {
    const cls = loadContractClass(fixture('sierra.json'));
    if (cls.format !== 'sierra') throw new Error('fixture is not a Sierra class');
    const withText = { ...cls.contractClass, abi: pythonJsonDumps(cls.contractClass.abi, false) };
    expect(computeSierraClassHash(withText)).toBe(computeSierraClassHash(cls.contractClass));
  });

  it('rejects unknown class versions', () => {
    const raw = { ...jsonObject('sierra.json'), contract_class_version: '0.2.0' };
    expect(thrown(() => computeClassHash(raw))).toMatchObject({ code: 'UnsupportedClassVersion' });
  });
});

describe('legacy class hash', () => {
  it('matches the library implementation', () => {
    const cls = loadContractClass(fixture('legacy.json'));
    if (cls.format !== 'legacy') throw new Error('fixture is not a legacy class');
    expect(computeHintedClassHash(cls.contractClass)).toBe(BigInt(hash.computeHintedClassHash(libraryView('legacy.json'))));
    expect(computeLegacyClassHash(cls.contractClass)).toBe(
      BigInt(hash.computeLegacyContractClassHash(libraryView('legacy.json'))),
    );
  });
});

describe('compiled class hash', () => {
  const entryPoints = () =>
    [
      poseidonArray([
        toFelt(0x83afd3f4caedc6eebf44246fe54e38c95e3179a5ec9ea81740eca5b482d12en),
        toFelt(0n),
        poseidonArray([encodeShortString('range_check')]),
      ]),
      poseidonArray([]),
      poseidonArray([
        toFelt(0x28ffe4ff0f226a9107253e17a904099aa4f63a02a5621de0576e5aa71bc5194n),
        toFelt(3n),
        poseidonArray([]),
      ]),
    ] as const;
  const bytecode = [0xa0680017fff8000n, 0x7n, 0x482680017ffa8000n, 0x100000000000000000000000000000000n, 0x400280007ff97fffn].map(
    (v) => toFelt(v),
  );

  it('hashes flat bytecode', () => {
    const expected = poseidonArray([encodeShortString('COMPILED_CLASS_V1'), ...entryPoints(), poseidonArray(bytecode)]);
    expect(computeClassHash(readJsonFile(fixture('casm.json')))).toBe(expected);
  });

  it('hashes segmented bytecode', () => {
    const raw = { ...jsonObject('casm.json'), bytecode_segment_lengths: [2, 3] };
    const segments = poseidonArray([
      toFelt(2n),
      poseidonArray(bytecode.slice(0, 2)),
      toFelt(3n),
      poseidonArray(bytecode.slice(2)),
    ]);
    const expected = poseidonArray([
      encodeShortString('COMPILED_CLASS_V1'),
      ...entryPoints(),
      toFelt(segments + 1n),
    ]);
    const cls = parseContractClass(raw);
    if (cls.format !== 'casm') throw new Error('fixture is not a CASM class');
    expect(computeCompiledClassHash(cls.contractClass)).toBe(expected);
  });

  it('agrees with the library for flat and segmented bytecode', () => {
    const casm = libraryView('casm.json');
    for (const lengths of [undefined, [2, 3], [1, 1, 3]]) {
      const raw = lengths === undefined ? jsonObject('casm.json') : { ...jsonObject('casm.json'), bytecode_segment_lengths: lengths };
      const view = lengths === undefined ? casm : { ...casm, bytecode_segment_lengths: lengths };
      expect(computeClassHash(raw)).toBe(BigInt(hash.computeCompiledClassHashPoseidon(view)));
    }
  });

  it('requires segment lengths to cover the bytecode exactly', () => {
    expect(thrown(() => hashBytecodeSegments(bytecode, [2, 2]))).toMatchObject({ code: 'UnsupportedClassVersion' });
    expect(thrown(() => hashBytecodeSegments(bytecode, [2, 4]))).toMatchObject({ code: 'UnsupportedClassVersion' });
  });

  it('is deterministic', () => {
    const raw = readJsonFile(fixture('casm.json'));
    expect(computeClassHash(raw)).toBe(computeClassHash(raw));
  });
});
