import { describe, it, expect } from 'vitest';
import {
  parseReferenceExpression,
  formatReference,
  compileParameters,
  collectReferences,
  resolveParameters,
} from './references.js';
import { ReferenceResolutionError } from '../types/errors.js';
import type { ParameterTemplate } from './types.js';

function compiled(parameters: Record<string, unknown>): Record<string, ParameterTemplate> {
  const result = compileParameters(parameters);
  if (!result.ok) throw new Error(result.error.reason);
  return result.value;
}

describe('references', () => {
  describe('parseReferenceExpression', () => {
    it('splits step id and path, numeric segments become indices', () => {
      expect(parseReferenceExpression('search.items.0.title')).toEqual({
        stepId: 'search',
        path: ['items', 0, 'title'],
      });
    });

    it('accepts a bare step id', () => {
      expect(parseReferenceExpression(' search ')).toEqual({ stepId: 'search', path: [] });
    });

    it('rejects empty segments and spaces', () => {
      expect(parseReferenceExpression('')).toBeNull();
      expect(parseReferenceExpression('a..b')).toBeNull();
      expect(parseReferenceExpression('bad id')).toBeNull();
    });

    it('keeps leading-zero segments as field names', () => {
      expect(parseReferenceExpression('a.007')).toEqual({ stepId: 'a', path: ['007'] });
    });
  });

  it('formatReference joins with dots', () => {
    expect(formatReference({ stepId: 'a', path: ['x', 2] })).toBe('a.x.2');
  });

  describe('compileParameters', () => {
    it('keeps plain values as literals', () => {
      expect(compiled({ query: 'weather', limit: 3, tags: ['a'], nested: { on: true } })).toEqual({
        query: { kind: 'literal', value: 'weather' },
        limit: { kind: 'literal', value: 3 },
        tags: { kind: 'literal', value: ['a'] },
        nested: { kind: 'literal', value: { on: true } },
      });
    });

    it('compiles a whole-string placeholder to a reference', () => {
      expect(compiled({ input: '{{search.items.0}}' })).toEqual({
        input: { kind: 'reference', reference: { stepId: 'search', path: ['items', 0] } },
      });
    });

    it('compiles embedded placeholders to an interpolation', () => {
      expect(compiled({ text: 'Top hit: {{search.title}}!' })).toEqual({
        text: {
          kind: 'interpolation',
          parts: ['Top hit: ', { stepId: 'search', path: ['title'] }, '!'],
        },
      });
    });

    it('compiles $ref objects', () => {
      expect(compiled({ input: { $ref: 'search', path: ['items', 1] } })).toEqual({
        input: { kind: 'reference', reference: { stepId: 'search', path: ['items', 1] } },
      });
    });

    it('compiles references inside arrays and objects', () => {
      expect(compiled({ to: ['ops@example.com', '{{lookup.email}}'] })).toEqual({
        to: {
          kind: 'array',
          items: [
            { kind: 'literal', value: 'ops@example.com' },
            { kind: 'reference', reference: { stepId: 'lookup', path: ['email'] } },
          ],
        },
      });
    });

    it('reports the location of a malformed placeholder', () => {
      expect(compileParameters({ to: ['ok', '{{ }}'] })).toEqual({
        ok: false,
        error: { parameter: 'to.1', reason: "invalid placeholder '{{ }}'" },
      });
    });

    it('rejects $ref objects with extra keys', () => {
      expect(compileParameters({ input: { $ref: 'a', field: 'x' } })).toEqual({
        ok: false,
        error: { parameter: 'input', reason: 'unexpected keys next to $ref: field' },
      });
    });

    it('rejects bad $ref paths and ids', () => {
      const badPath = compileParameters({ input: { $ref: 'a', path: [-1] } });
      expect(badPath.ok).toBe(false);
      if (!badPath.ok) {
        expect(badPath.error.reason).toBe('path segments must be strings or non-negative integers');
      }

      const badId = compileParameters({ input: { $ref: '' } });
      expect(badId.ok).toBe(false);
      if (!badId.ok) expect(badId.error.reason).toBe('$ref must be a non-empty string');
    });
  });

  it('collectReferences finds every reference', () => {
    const refs = collectReferences(compiled({
      a: '{{one}}',
      b: 'x {{two.y}} {{three}}',
      c: { d: [{ $ref: 'four' }] },
      e: 'plain',
    }));
    expect(refs.map(formatReference)).toEqual(['one', 'two.y', 'three', 'four']);
  });

  describe('resolveParameters', () => {
    const results: Record<string, unknown> = {
      search: { items: [{ title: 'First' }, { title: 'Second' }], count: 2 },
      status: 'ok',
    };
    const lookup = (id: string): unknown => results[id];

    it('substitutes whole values verbatim, type preserved', () => {
      expect(resolveParameters(compiled({ items: '{{search.items}}', s: '{{status}}' }), lookup)).toEqual({
        items: [{ title: 'First' }, { title: 'Second' }],
        s: 'ok',
      });
    });

    it('interpolates strings as-is and other values as JSON', () => {
      expect(resolveParameters(compiled({
        text: '{{search.count}} hits, first {{search.items.0.title}}: {{search.items.1}}',
      }), lookup)).toEqual({
        text: '2 hits, first First: {"title":"Second"}',
      });
    });

    it('resolves nested templates', () => {
      expect(resolveParameters(compiled({
        message: { body: '{{status}}', to: ['a', { $ref: 'search', path: ['count'] }] },
      }), lookup)).toEqual({
        message: { body: 'ok', to: ['a', 2] },
      });
    });

    it('keeps a parameter named __proto__ as an own key', () => {
      const parameters: Record<string, unknown> = JSON.parse('{"__proto__": {"body": "{{status}}"}}');
      const resolved = resolveParameters(compiled(parameters), lookup);

      expect(Object.hasOwn(resolved, '__proto__')).toBe(true);
      expect(Reflect.get(resolved, '__proto__')).toEqual({ body: 'ok' });
      expect(Object.getPrototypeOf(resolved)).toBe(Object.prototype);
    });

    it('throws for a missing field', () => {
      const params = compiled({ x: '{{search.missing}}' });
      expect(() => resolveParameters(params, lookup)).toThrow(ReferenceResolutionError);
      expect(() => resolveParameters(params, lookup)).toThrow(
        "Cannot resolve 'search.missing': field 'missing' not found",
      );
    });

    it('throws for an index out of range', () => {
      expect(() => resolveParameters(compiled({ x: '{{search.items.5}}' }), lookup)).toThrow(
        "Cannot resolve 'search.items.5': index 5 not found",
      );
    });

    it('does not walk into prototype fields', () => {
      expect(() => resolveParameters(compiled({ x: '{{search.toString}}' }), lookup)).toThrow(
        "field 'toString' not found",
      );
    });
  });
});
