// src/type-registry.ts
// Signal payload types: one token per canonical name

import { z } from 'zod';

import { SimulationError } from './errors.js';

/**
 * Runtime identity of a signal payload type. Two signals share a type only
 * when they hold the same token.
 */
export class SignalType<T> {
  constructor(
    readonly name: string,
    private readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ) {}

  /** Check a value against the type's schema. */
  validate(value: unknown): { success: true; value: T } | { success: false; error: string } {
    const result = this.schema.safeParse(value);
    if (result.success) {
      return { success: true, value: result.data };
    }
    return { success: false, error: result.error.issues.map((i) => i.message).join('; ') };
  }

  toString(): string {
    return this.name;
  }
}

export type AnySignalType = SignalType<unknown>;

// ============ Built-in Types ============

export const NumberType = new SignalType<number>('number', z.number());
export const IntegerType = new SignalType<number>('integer', z.number().int());
export const BooleanType = new SignalType<boolean>('boolean', z.boolean());
export const StringType = new SignalType<string>('string', z.string());
export const VectorType = new SignalType<number[]>('vector', z.array(z.number()));

const _registry = new Map<string, AnySignalType>([
  [NumberType.name, NumberType],
  [IntegerType.name, IntegerType],
  [BooleanType.name, BooleanType],
  [StringType.name, StringType],
  [VectorType.name, VectorType],
]);

// ============ Type Aliases ============

export const TYPE_ALIASES: Record<string, string> = {
  float: 'number',
  f64: 'number',
  double: 'number',
  int: 'integer',
  i32: 'integer',
  i64: 'integer',
  bool: 'boolean',
  str: 'string',
};

function canonicalName(name: string): string {
  const trimmed = name.trim();
  return TYPE_ALIASES[trimmed] ?? trimmed;
}

/**
 * Register a new payload type. Names are unique: a second registration under
 * the same name (or alias) throws.
 */
export function registerType<T>(
  name: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): SignalType<T> {
  const canonical = canonicalName(name);
  if (_registry.has(canonical)) {
    throw new SimulationError(`Signal type '${canonical}' is already registered`);
  }
  const type = new SignalType<T>(canonical, schema);
  _registry.set(canonical, type);
  return type;
}

/** Look up a registered type by name or alias. */
export function getType(name: string): AnySignalType | undefined {
  return _registry.get(canonicalName(name));
}

export function isRegisteredType(name: string): boolean {
  return _registry.has(canonicalName(name));
}

/** All currently registered type names. */
export function getRegisteredTypes(): string[] {
  return [..._registry.keys()];
}
