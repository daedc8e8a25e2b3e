/**
 * Shape Declarations
 *
 * Callers declare what a model reply must look like at the top level.
 * Conformance is shallow on purpose: required keys for objects,
 * array-ness for arrays. Nested fields are never inspected.
 */

import { z } from 'zod';
import { InvalidArgumentError } from './errors.js';
import type {
  ArrayShape,
  JsonObject,
  JsonValue,
  ObjectShape,
  Shape
} from '../types.js';

// ============================================================================
// JSON Guards
// ============================================================================

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isJsonArray(value: unknown): value is JsonValue[] {
  return Array.isArray(value);
}

/** Own keys only; inherited members such as `constructor` never count */
export function hasKey(value: Readonly<JsonObject>, key: string): boolean {
  return Object.hasOwn(value, key);
}

/** Assign as an own property, `__proto__` included */
function setKey(target: JsonObject, key: string, value: JsonValue): void {
  Object.defineProperty(target, key, { value, enumerable: true, writable: true, configurable: true });
}

/** Accepts only values that survive a JSON round trip unchanged */
function isJsonValue(value: unknown): value is JsonValue {
  if (value === null) return true;
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return true;
    case 'number':
      return Number.isFinite(value);
    case 'object':
      if (Array.isArray(value)) {
        return value.every(isJsonValue);
      }
      return Object.getPrototypeOf(value) === Object.prototype &&
        Object.values(value).every(isJsonValue);
    default:
      return false;
  }
}

// ============================================================================
// Declaration Schemas
// ============================================================================

export const JsonValueSchema = z.custom<JsonValue>(isJsonValue, {
  message: 'Expected a JSON-serialisable value'
});

const JsonObjectSchema = z.custom<JsonObject>(
  (value) => isJsonObject(value) && isJsonValue(value),
  { message: 'Expected a plain JSON object' }
);

const ObjectShapeDeclarationSchema = z.object({
  requiredKeys: z.array(z.string().min(1)),
  defaultValues: JsonObjectSchema.optional(),
  fallback: JsonObjectSchema.optional()
});

const ArrayShapeDeclarationSchema = z.object({
  fallback: z.array(JsonValueSchema).optional()
});

export type ObjectShapeDeclaration = z.input<typeof ObjectShapeDeclarationSchema>;
export type ArrayShapeDeclaration = z.input<typeof ArrayShapeDeclarationSchema>;

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

// ============================================================================
// Constructors
// ============================================================================

/**
 * Declare an object shape.
 *
 * Without an explicit `fallback`, the fallback is `defaultValues` plus `null`
 * for every required key that has no default. An explicit `fallback` must
 * already carry every required key.
 *
 * @throws InvalidArgumentError on a malformed declaration
 */
export function objectShape(declaration: ObjectShapeDeclaration): ObjectShape {
  const parsed = ObjectShapeDeclarationSchema.safeParse(declaration);
  if (!parsed.success) {
    throw new InvalidArgumentError(`Invalid object shape: ${formatIssues(parsed.error)}`);
  }

  const requiredKeys = [...new Set(parsed.data.requiredKeys)];
  const defaultValues = structuredClone(parsed.data.defaultValues ?? {});

  let fallback: JsonObject;
  if (parsed.data.fallback) {
    fallback = structuredClone(parsed.data.fallback);
    const missing = requiredKeys.filter(key => !hasKey(fallback, key));
    if (missing.length > 0) {
      throw new InvalidArgumentError(
        `Invalid object shape: fallback is missing required keys ${missing.join(', ')}`
      );
    }
  } else {
    fallback = structuredClone(defaultValues);
    for (const key of requiredKeys) {
      if (!hasKey(fallback, key)) {
        setKey(fallback, key, null);
      }
    }
  }

  const shape: ObjectShape = {
    kind: 'object',
    requiredKeys: Object.freeze(requiredKeys),
    defaultValues: Object.freeze(defaultValues),
    fallback: Object.freeze(fallback)
  };
  return Object.freeze(shape);
}

/**
 * Declare an array shape. The fallback defaults to an empty array.
 *
 * @throws InvalidArgumentError on a malformed declaration
 */
export function arrayShape(declaration: ArrayShapeDeclaration = {}): ArrayShape {
  const parsed = ArrayShapeDeclarationSchema.safeParse(declaration);
  if (!parsed.success) {
    throw new InvalidArgumentError(`Invalid array shape: ${formatIssues(parsed.error)}`);
  }

  const shape: ArrayShape = {
    kind: 'array',
    fallback: Object.freeze(structuredClone(parsed.data.fallback ?? []))
  };
  return Object.freeze(shape);
}

/**
 * Build an object shape from a template object: every key is required and
 * its template value is its default.
 */
export function objectShapeFromTemplate(template: JsonObject): ObjectShape {
  return objectShape({
    requiredKeys: Object.keys(template),
    defaultValues: template
  });
}

// ============================================================================
// Conformance
// ============================================================================

/**
 * Fill missing required keys from the shape's defaults.
 * Returns a new object, or null when a required key has no default.
 */
export function completeObject(value: JsonObject, shape: ObjectShape): JsonObject | null {
  const completed: JsonObject = { ...value };

  for (const key of shape.requiredKeys) {
    if (hasKey(completed, key)) continue;

    if (!hasKey(shape.defaultValues, key)) {
      return null;
    }
    setKey(completed, key, structuredClone(shape.defaultValues[key]));
  }

  return completed;
}

/** Shallow conformance check */
export function conformsTo(value: unknown, shape: Shape): boolean {
  if (shape.kind === 'array') {
    return isJsonArray(value);
  }
  return isJsonObject(value) && shape.requiredKeys.every(key => hasKey(value, key));
}
