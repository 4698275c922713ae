import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { json } from 'starknet';
import { StorageError, UnsupportedFormatError } from './errors.js';

const HexString = z.string().regex(/^0[xX][0-9a-fA-F]*$/, 'expected 0x-prefixed hex');
const FeltText = z.union([HexString, z.string().regex(/^[0-9]+$/)]);

const LegacyEntryPoint = z.object({
  selector: FeltText,
  offset: z.union([FeltText, z.number().int().nonnegative()]),
});

const SierraEntryPoint = z.object({
  selector: FeltText,
  function_idx: z.number().int().nonnegative(),
});

const CasmEntryPoint = z.object({
  selector: FeltText,
  offset: z.number().int().nonnegative(),
  builtins: z.array(z.string()).default([]),
});

function entryPoints<T extends z.ZodTypeAny>(ep: T) {
  return z.object({
    EXTERNAL: z.array(ep).default([]),
    L1_HANDLER: z.array(ep).default([]),
    CONSTRUCTOR: z.array(ep).default([]),
  });
}

export const LegacyClassSchema = z.object({
  abi: z.array(z.unknown()).nullish(),
  entry_points_by_type: entryPoints(LegacyEntryPoint),
  program: z
    .object({
      builtins: z.array(z.string()),
      data: z.array(FeltText),
    })
    .passthrough(),
});

export const SierraClassSchema = z.object({
  sierra_program: z.array(FeltText),
  contract_class_version: z.string(),
  entry_points_by_type: entryPoints(SierraEntryPoint),
  abi: z.union([z.string(), z.array(z.unknown())]),
});

export type NestedLengths = number | NestedLengths[];
const NestedLengthsSchema: z.ZodType<NestedLengths> = z.lazy(() =>
  z.union([z.number().int().nonnegative(), z.array(NestedLengthsSchema)]),
);

export const CasmClassSchema = z.object({
  compiler_version: z.string(),
  bytecode: z.array(FeltText),
  bytecode_segment_lengths: NestedLengthsSchema.optional(),
  entry_points_by_type: entryPoints(CasmEntryPoint),
});

export type LegacyClass = z.infer<typeof LegacyClassSchema>;
export type SierraClass = z.infer<typeof SierraClassSchema>;
export type CasmClass = z.infer<typeof CasmClassSchema>;

export type ContractClass =
  | { format: 'legacy'; contractClass: LegacyClass }
  | { format: 'sierra'; contractClass: SierraClass }
  | { format: 'casm'; contractClass: CasmClass };

export type ClassFormat = ContractClass['format'];

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

/**
 * Detects the class representation by its marker fields and validates it.
 * Sierra classes are recognised by `sierra_program`, CASM by
 * `compiler_version` + `bytecode`, legacy classes by `program`.
 */
export function parseContractClass(raw: unknown): ContractClass {
  if (!isRecord(raw)) {
    throw new UnsupportedFormatError('UnsupportedClassVersion', 'Contract class must be a JSON object');
  }

  if ('sierra_program' in raw) {
    return { format: 'sierra', contractClass: validate(SierraClassSchema, raw, 'Sierra') };
  }
  if ('bytecode' in raw && 'compiler_version' in raw) {
    return { format: 'casm', contractClass: validate(CasmClassSchema, raw, 'CASM') };
  }
  if ('program' in raw) {
    return { format: 'legacy', contractClass: validate(LegacyClassSchema, raw, 'legacy') };
  }

  throw new UnsupportedFormatError(
    'UnsupportedClassVersion',
    'Unrecognised contract class: expected a Sierra, CASM or legacy class artifact',
  );
}

function validate<T extends z.ZodTypeAny>(schema: T, raw: unknown, label: string): z.infer<T> {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new UnsupportedFormatError('UnsupportedClassVersion', `Invalid ${label} class: ${parsed.error.message}`);
  }
  return parsed.data;
}

export function readJsonFile(file: string): unknown {
  const p = path.resolve(file);
  if (!fs.existsSync(p)) throw new StorageError('NotFound', `File not found: ${p}`);
  // large program constants must survive parsing exactly
  const parsed: unknown = json.parse(fs.readFileSync(p, 'utf8'));
  return parsed;
}

export function loadContractClass(file: string): ContractClass {
  return parseContractClass(readJsonFile(file));
}
