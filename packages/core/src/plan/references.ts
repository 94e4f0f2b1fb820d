/**
 * Step references
 *
 * Compiles planner parameters into ParameterTemplates and resolves them
 * against step results. Two spellings are accepted:
 *
 *   "{{search}}"                        whole result, type preserved
 *   "Top hit: {{search.items.0.title}}" interpolated into the string
 *   { "$ref": "search", "path": ["items", 0] }
 */

import type { ParameterTemplate, PathSegment, StepReference } from './types.js';
import { ReferenceResolutionError } from '../types/errors.js';
import { type Result, ok, err } from '../types/result.js';

const PLACEHOLDER_PATTERN = /\{\{([^{}]*)\}\}/g;
const SEGMENT_PATTERN = /^[A-Za-z0-9_:-]+$/;
const INDEX_PATTERN = /^(0|[1-9][0-9]*)$/;

export interface MalformedReference {
  /** Dot path of the offending parameter, e.g. "message" or "to.0" */
  parameter: string;
  reason: string;
}

// ============================================================================
// Parsing
// ============================================================================

/**
 * Parse the inside of a placeholder: "step.field.0" → { stepId: 'step', path: ['field', 0] }
 */
export function parseReferenceExpression(expression: string): StepReference | null {
  const segments = expression.trim().split('.');
  if (segments.some((s) => !SEGMENT_PATTERN.test(s))) return null;

  const [stepId, ...rest] = segments;
  if (stepId === undefined) return null;
  return {
    stepId,
    path: rest.map((s) => (INDEX_PATTERN.test(s) ? Number(s) : s)),
  };
}

export function formatReference(reference: StepReference): string {
  return [reference.stepId, ...reference.path.map(String)].join('.');
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function parseRefObject(value: Record<string, unknown>): StepReference | string {
  const stepId = value.$ref;
  if (typeof stepId !== 'string' || stepId.length === 0) {
    return '$ref must be a non-empty string';
  }
  const extraKeys = Object.keys(value).filter((k) => k !== '$ref' && k !== 'path');
  if (extraKeys.length > 0) {
    return `unexpected keys next to $ref: ${extraKeys.join(', ')}`;
  }
  const rawPath = value.path ?? [];
  if (!Array.isArray(rawPath)) {
    return 'path must be an array';
  }
  const path: PathSegment[] = [];
  for (const segment of rawPath) {
    if (typeof segment === 'string') {
      path.push(segment);
    } else if (typeof segment === 'number' && Number.isInteger(segment) && segment >= 0) {
      path.push(segment);
    } else {
      return 'path segments must be strings or non-negative integers';
    }
  }
  return { stepId, path };
}

// ============================================================================
// Compilation
// ============================================================================

function compileString(value: string, location: string): Result<ParameterTemplate, MalformedReference> {
  const matches = [...value.matchAll(PLACEHOLDER_PATTERN)];
  if (matches.length === 0) {
    return ok({ kind: 'literal', value });
  }

  const parts: Array<string | StepReference> = [];
  let cursor = 0;
  for (const match of matches) {
    const index = match.index ?? 0;
    const reference = parseReferenceExpression(match[1] ?? '');
    if (!reference) {
      return err({ parameter: location, reason: `invalid placeholder '${match[0]}'` });
    }
    if (index > cursor) parts.push(value.slice(cursor, index));
    parts.push(reference);
    cursor = index + match[0].length;
  }
  if (cursor < value.length) parts.push(value.slice(cursor));

  const only = parts[0];
  if (parts.length === 1 && only !== undefined && typeof only !== 'string') {
    return ok({ kind: 'reference', reference: only });
  }
  return ok({ kind: 'interpolation', parts });
}

function compileValue(value: unknown, location: string): Result<ParameterTemplate, MalformedReference> {
  if (typeof value === 'string') {
    return compileString(value, location);
  }

  if (Array.isArray(value)) {
    const items: ParameterTemplate[] = [];
    for (const [i, item] of value.entries()) {
      const compiled = compileValue(item, `${location}.${i}`);
      if (!compiled.ok) return compiled;
      items.push(compiled.value);
    }
    return ok(items.every((t) => t.kind === 'literal')
      ? { kind: 'literal', value }
      : { kind: 'array', items });
  }

  if (isPlainObject(value)) {
    if ('$ref' in value) {
      const parsed = parseRefObject(value);
      if (typeof parsed === 'string') {
        return err({ parameter: location, reason: parsed });
      }
      return ok({ kind: 'reference', reference: parsed });
    }
    const compiled = compileEntries(value, `${location}.`);
    if (!compiled.ok) return compiled;
    return ok(Object.values(compiled.value).every((t) => t.kind === 'literal')
      ? { kind: 'literal', value }
      : { kind: 'object', entries: compiled.value });
  }

  return ok({ kind: 'literal', value });
}

function compileEntries(
  values: Record<string, unknown>,
  prefix: string,
): Result<Record<string, ParameterTemplate>, MalformedReference> {
  // fromEntries defines own properties, so a "__proto__" key stays a key
  const entries: Array<[string, ParameterTemplate]> = [];
  for (const [key, value] of Object.entries(values)) {
    const compiled = compileValue(value, `${prefix}${key}`);
    if (!compiled.ok) return compiled;
    entries.push([key, compiled.value]);
  }
  return ok(Object.fromEntries(entries));
}

/**
 * Compile a step's parameters into templates.
 */
export function compileParameters(
  parameters: Record<string, unknown>,
): Result<Record<string, ParameterTemplate>, MalformedReference> {
  return compileEntries(parameters, '');
}

/**
 * Every reference used anywhere in a compiled parameter map.
 */
export function collectReferences(parameters: Readonly<Record<string, ParameterTemplate>>): StepReference[] {
  const found: StepReference[] = [];
  const visit = (template: ParameterTemplate): void => {
    switch (template.kind) {
      case 'literal':
        return;
      case 'reference':
        found.push(template.reference);
        return;
      case 'interpolation':
        for (const part of template.parts) {
          if (typeof part !== 'string') found.push(part);
        }
        return;
      case 'array':
        template.items.forEach(visit);
        return;
      case 'object':
        Object.values(template.entries).forEach(visit);
        return;
    }
  };
  Object.values(parameters).forEach(visit);
  return found;
}

// ============================================================================
// Resolution
// ============================================================================

export type ResultLookup = (stepId: string) => unknown;

function followPath(reference: StepReference, root: unknown): unknown {
  let current = root;
  for (const segment of reference.path) {
    if (typeof segment === 'number') {
      if (!Array.isArray(current) || segment >= current.length) {
        throw new ReferenceResolutionError(
          reference,
          `Cannot resolve '${formatReference(reference)}': index ${segment} not found`,
        );
      }
      current = current[segment];
    } else {
      if (current === null || typeof current !== 'object' || !Object.hasOwn(current, segment)) {
        throw new ReferenceResolutionError(
          reference,
          `Cannot resolve '${formatReference(reference)}': field '${segment}' not found`,
        );
      }
      current = Reflect.get(current, segment);
    }
  }
  return current;
}

function stringify(value: unknown): string {
  return typeof value === 'string' ? value : JSON.stringify(value) ?? String(value);
}

export function resolveTemplate(template: ParameterTemplate, lookup: ResultLookup): unknown {
  switch (template.kind) {
    case 'literal':
      return template.value;
    case 'reference':
      return followPath(template.reference, lookup(template.reference.stepId));
    case 'interpolation':
      return template.parts
        .map((part) => (typeof part === 'string'
          ? part
          : stringify(followPath(part, lookup(part.stepId)))))
        .join('');
    case 'array':
      return template.items.map((item) => resolveTemplate(item, lookup));
    case 'object':
      return resolveParameters(template.entries, lookup);
  }
}

/**
 * Substitute every reference in a step's parameters.
 * Throws ReferenceResolutionError when a path is missing.
 */
export function resolveParameters(
  parameters: Readonly<Record<string, ParameterTemplate>>,
  lookup: ResultLookup,
): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(parameters).map(([key, template]) => [key, resolveTemplate(template, lookup)]),
  );
}
