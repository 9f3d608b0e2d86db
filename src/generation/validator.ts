/**
 * Schema validator for generated documents.
 *
 * Model output arrives wrapped in prose and code fences often enough
 * that extraction is part of validation: the first well-formed JSON
 * block is taken, and failing to find one is itself a violation.
 * There is no partial credit; any violation rejects the document.
 */

import type { FieldType, SchemaConstraint } from './constraints.js';

export const UNPARSEABLE = 'unparseable: no well-formed JSON block found';

export type ValidationResult<T> =
  | { ok: true; document: T }
  | { ok: false; violations: string[] };

// ============================================================================
// Extraction
// ============================================================================

const FENCE_PATTERN = /```(?:json|JSON)?\s*([\s\S]*?)```/;

/**
 * Find the end index (inclusive) of the bracketed block opening at
 * `start`, honouring string literals and escapes. -1 when unbalanced.
 */
function findBlockEnd(text: string, start: number): number {
  const stack: string[] = [];
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const ch = text[i];

    if (inString) {
      if (escaped) escaped = false;
      else if (ch === '\\') escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }

    if (ch === '"') inString = true;
    else if (ch === '{') stack.push('}');
    else if (ch === '[') stack.push(']');
    else if (ch === '}' || ch === ']') {
      if (stack.pop() !== ch) return -1;
      if (stack.length === 0) return i;
    }
  }

  return -1;
}

function firstJsonBlock(text: string): unknown {
  for (let start = 0; start < text.length; start++) {
    const ch = text[start];
    if (ch !== '{' && ch !== '[') continue;

    const end = findBlockEnd(text, start);
    if (end === -1) continue;

    try {
      return JSON.parse(text.slice(start, end + 1));
    } catch {
      // not JSON (e.g. "[see below]" or a trailing comma); skip the whole block
      start = end;
    }
  }
  return undefined;
}

/**
 * Pull the first well-formed JSON object or array out of model output.
 * A fenced block is preferred when present. Returns undefined when
 * nothing parses.
 */
export function extractStructuredBlock(text: string): unknown {
  const fenced = FENCE_PATTERN.exec(text);
  if (fenced?.[1] !== undefined) {
    const inner = firstJsonBlock(fenced[1]);
    if (inner !== undefined) return inner;
  }
  return firstJsonBlock(text);
}

// ============================================================================
// Structural checks
// ============================================================================

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function describeType(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

function checkFieldType(value: unknown, type: FieldType): string | null {
  switch (type) {
    case 'string':
      return typeof value === 'string' ? null : `expected string, got ${describeType(value)}`;
    case 'number':
    case 'non-negative-number':
    case 'positive-number': {
      if (typeof value !== 'number' || !Number.isFinite(value)) {
        return `expected number, got ${describeType(value)}`;
      }
      if (type === 'non-negative-number' && value < 0) return `must be >= 0, got ${value}`;
      if (type === 'positive-number' && value <= 0) return `must be > 0, got ${value}`;
      return null;
    }
    case 'string-list':
      return Array.isArray(value) && value.every((v) => typeof v === 'string')
        ? null
        : 'expected list of strings';
    case 'string-map':
      return isRecord(value) && Object.values(value).every((v) => typeof v === 'string')
        ? null
        : 'expected mapping of strings';
  }
}

function checkItem<T>(item: unknown, constraint: SchemaConstraint<T>, label: string): string[] {
  if (!isRecord(item)) {
    return [`${label}: expected object, got ${describeType(item)}`];
  }

  const violations: string[] = [];

  for (const field of constraint.requiredFields) {
    if (!(field in item) || item[field] === undefined) {
      violations.push(`${label}.${field}: required field missing`);
    }
  }

  for (const [field, type] of Object.entries(constraint.fieldTypes)) {
    if (!(field in item) || item[field] === undefined) continue;
    const problem = checkFieldType(item[field], type);
    if (problem) violations.push(`${label}.${field}: ${problem}`);
  }

  for (const [field, allowed] of Object.entries(constraint.allowedValues ?? {})) {
    const value = item[field];
    if (typeof value === 'string' && !allowed.includes(value)) {
      violations.push(`${label}.${field}: "${value}" is not one of [${allowed.join(', ')}]`);
    }
  }

  return violations;
}

function checkUniqueness<T>(items: unknown[], constraint: SchemaConstraint<T>): string[] {
  const violations: string[] = [];
  for (const field of constraint.uniqueFields ?? []) {
    const seen = new Map<unknown, number>();
    items.forEach((item, index) => {
      if (!isRecord(item) || item[field] === undefined) return;
      const first = seen.get(item[field]);
      if (first !== undefined) {
        violations.push(`[${index}].${field}: duplicates [${first}] (${String(item[field])})`);
      } else {
        seen.set(item[field], index);
      }
    });
  }
  return violations;
}

/**
 * `{ "records": [...] }` for a collection stage: take the lone array.
 */
export function unwrapCollection(document: unknown): unknown {
  if (!isRecord(document)) return document;
  const arrays = Object.values(document).filter(Array.isArray);
  return arrays.length === 1 && Object.keys(document).length === 1 ? arrays[0] : document;
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Validate a candidate document against a stage constraint.
 *
 * Strings are treated as raw model output and go through extraction
 * first; anything else is taken as an already-parsed document.
 */
export function validate<T>(document: unknown, constraint: SchemaConstraint<T>): ValidationResult<T> {
  let candidate = document;
  if (typeof candidate === 'string') {
    candidate = extractStructuredBlock(candidate);
    if (candidate === undefined) return { ok: false, violations: [UNPARSEABLE] };
  }

  const violations: string[] = [];

  if (constraint.shape === 'collection') {
    candidate = unwrapCollection(candidate);
    if (!Array.isArray(candidate)) {
      return { ok: false, violations: [`expected a list of items, got ${describeType(candidate)}`] };
    }

    const range = constraint.itemCount;
    if (range && (candidate.length < range.min || candidate.length > range.max)) {
      violations.push(`item count ${candidate.length} outside [${range.min}, ${range.max}]`);
    }

    candidate.forEach((item, index) => {
      violations.push(...checkItem(item, constraint, `[${index}]`));
    });
    violations.push(...checkUniqueness(candidate, constraint));
  } else {
    if (!isRecord(candidate)) {
      return { ok: false, violations: [`expected an object, got ${describeType(candidate)}`] };
    }
    violations.push(...checkItem(candidate, constraint, '$'));
  }

  if (violations.length > 0) return { ok: false, violations };

  const parsed = constraint.schema.safeParse(candidate);
  if (!parsed.success) {
    return {
      ok: false,
      violations: parsed.error.errors.map((e) => `${e.path.length ? e.path.join('.') : '$'}: ${e.message}`),
    };
  }

  return { ok: true, document: parsed.data };
}
