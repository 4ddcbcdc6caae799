/**
 * Tagged-union normalization of collaborator output shapes.
 *
 * Collaborators return the same payload in several shapes (a bare object
 * where a list was asked for, a list wrapped under `items`, a map split into
 * single-key objects). Each shape kind has one table of accepted inputs;
 * everything else is rejected instead of guessed at.
 */

import { isPlainObject } from '@devcrew/crew-contracts';
import type { ShapeKind } from '@devcrew/crew-contracts';

export type ShapeOutcome = { ok: true; value: unknown } | { ok: false; reason: string };

/** Keys under which a list may arrive wrapped */
const LIST_WRAPPER_KEYS = ['items', 'files', 'root', 'steps', 'results'] as const;

function describe(value: unknown): string {
  if (Array.isArray(value)) {
    return `list of ${value.length}`;
  }
  return value === null ? 'null' : typeof value;
}

function unwrapList(value: Record<string, unknown>): unknown[] | undefined {
  const keys = Object.keys(value);
  if (keys.length !== 1) {
    return undefined;
  }
  for (const key of LIST_WRAPPER_KEYS) {
    const inner = value[key];
    if (keys[0] === key && Array.isArray(inner)) {
      return inner;
    }
  }
  return undefined;
}

function normalizeList(value: unknown): ShapeOutcome {
  if (Array.isArray(value)) {
    return { ok: true, value };
  }
  if (isPlainObject(value)) {
    return { ok: true, value: unwrapList(value) ?? [value] };
  }
  return { ok: false, reason: `expected a list, got ${describe(value)}` };
}

function normalizeRecord(value: unknown): ShapeOutcome {
  if (isPlainObject(value)) {
    return { ok: true, value };
  }
  if (Array.isArray(value) && value.length > 0 && value.every(isPlainObject)) {
    return { ok: true, value: Object.assign({}, ...value) };
  }
  return { ok: false, reason: `expected a mapping, got ${describe(value)}` };
}

function normalizeObject(value: unknown): ShapeOutcome {
  if (isPlainObject(value)) {
    return { ok: true, value };
  }
  if (Array.isArray(value) && value.length === 1 && isPlainObject(value[0])) {
    return { ok: true, value: value[0] };
  }
  return { ok: false, reason: `expected an object, got ${describe(value)}` };
}

function toPathString(entry: unknown): unknown {
  if (isPlainObject(entry)) {
    const candidate = entry.path ?? entry.file_path;
    if (typeof candidate === 'string') {
      return candidate;
    }
  }
  return entry;
}

function normalizeStringList(value: unknown): ShapeOutcome {
  if (typeof value === 'string') {
    return { ok: true, value: [value] };
  }
  if (Array.isArray(value)) {
    return { ok: true, value: value.map(toPathString) };
  }
  if (isPlainObject(value)) {
    const inner = unwrapList(value);
    if (inner) {
      return { ok: true, value: inner.map(toPathString) };
    }
  }
  return { ok: false, reason: `expected a list of strings, got ${describe(value)}` };
}

const NORMALIZERS: Record<ShapeKind, (value: unknown) => ShapeOutcome> = {
  list: normalizeList,
  record: normalizeRecord,
  object: normalizeObject,
  string_list: normalizeStringList,
};

export function normalizeShape(kind: ShapeKind, value: unknown): ShapeOutcome {
  return NORMALIZERS[kind](value);
}
