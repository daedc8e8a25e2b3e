/**
 * Structured Extractor
 *
 * Turns raw model text into a value that conforms to a declared shape:
 * 1. Strict parse of the whole text
 * 2. Recovered parse of the slice from the first opening delimiter
 *    to the last closing one
 * 3. The shape's fallback value
 *
 * Nothing escapes extract(). Known limitation of tier 2: a reply holding two
 * independent JSON blocks is sliced across both and falls through to tier 3.
 */

import { completeObject, isJsonArray, isJsonObject } from './shapes.js';
import type {
  ArrayShape,
  ExtractionResult,
  JsonObject,
  JsonValue,
  ObjectShape,
  Shape
} from '../types.js';

type ShapedValue = JsonObject | JsonValue[];

const DELIMITERS = {
  object: { open: '{', close: '}' },
  array: { open: '[', close: ']' }
} as const;

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Parse text as the shape's kind and apply shallow conformance.
 * Returns null on any failure.
 */
function parseAs(text: string, shape: Shape): ShapedValue | null {
  const parsed = parseJson(text);

  if (shape.kind === 'array') {
    return isJsonArray(parsed) ? parsed : null;
  }

  return isJsonObject(parsed) ? completeObject(parsed, shape) : null;
}

/** First opening delimiter through the last closing one, inclusive */
function sliceDelimited(text: string, shape: Shape): string | null {
  const { open, close } = DELIMITERS[shape.kind];
  const start = text.indexOf(open);
  const end = text.lastIndexOf(close);

  if (start < 0 || end <= start) {
    return null;
  }
  return text.slice(start, end + 1);
}

function fallbackValue(shape: Shape): ShapedValue {
  return shape.kind === 'array'
    ? structuredClone([...shape.fallback])
    : structuredClone({ ...shape.fallback });
}

/**
 * Extract a shaped value from raw model text.
 */
export function extract(rawText: string, shape: ObjectShape): ExtractionResult<JsonObject>;
export function extract(rawText: string, shape: ArrayShape): ExtractionResult<JsonValue[]>;
export function extract(rawText: string, shape: Shape): ExtractionResult<ShapedValue>;
export function extract(rawText: string, shape: Shape): ExtractionResult<ShapedValue> {
  const strict = parseAs(rawText, shape);
  if (strict !== null) {
    return { value: strict, source: 'strict_parse', rawText };
  }

  const slice = sliceDelimited(rawText, shape);
  if (slice !== null) {
    const recovered = parseAs(slice, shape);
    if (recovered !== null) {
      return { value: recovered, source: 'recovered_parse', rawText };
    }
  }

  return { value: fallbackValue(shape), source: 'default_fallback', rawText };
}
