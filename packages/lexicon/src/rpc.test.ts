import { describe, it, expect } from 'vitest';
import { QuireErrorCode, isQuireError } from '@quire/types';

import { compileGraph } from './builder';
import { validateInput, validateOutput, validateParams } from './rpc';
import type { ValidationOutcome } from './types';

const graph = compileGraph([
  {
    lexicon: 1,
    id: 'com.example.getFeed',
    defs: {
      main: {
        type: 'query',
        parameters: {
          type: 'params',
          required: ['actor'],
          properties: {
            actor: { type: 'string', format: 'handle' },
            limit: { type: 'integer', minimum: 1, maximum: 100, default: 50 },
            tags: { type: 'array', items: { type: 'string' } },
          },
        },
        output: {
          encoding: 'application/json',
          schema: { type: 'object', required: ['items'], properties: { items: { type: 'array', items: { type: 'string' } } } },
        },
      },
    },
  },
  {
    lexicon: 1,
    id: 'com.example.upload',
    defs: {
      main: {
        type: 'procedure',
        input: { encoding: 'image/*' },
        output: { encoding: 'application/json', schema: { type: 'ref', ref: '#result' } },
      },
      result: { type: 'object', required: ['ok'], properties: { ok: { type: 'boolean' } } },
    },
  },
  {
    lexicon: 1,
    id: 'com.example.ping',
    defs: { main: { type: 'procedure' } },
  },
  {
    lexicon: 1,
    id: 'com.example.note',
    defs: { main: { type: 'object', properties: {} } },
  },
]);

function paths(outcome: ValidationOutcome): (string | number)[][] {
  return outcome.valid ? [] : outcome.violations.map((v) => [...v.path]);
}

function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (e) {
    return e;
  }
  return undefined;
}

describe('validateParams', () => {
  it('canonicalizes values and fills defaults', () => {
    expect(validateParams(graph, 'com.example.getFeed', { actor: 'Alice.Example.com' })).toEqual({
      valid: true,
      value: { actor: 'alice.example.com', limit: 50 },
    });
  });

  it('reports each bad parameter by name', () => {
    const outcome = validateParams(graph, 'com.example.getFeed', { limit: 500, tags: ['a', 2] });
    expect(paths(outcome)).toEqual([['actor'], ['limit'], ['tags', 1]]);
  });

  it('treats missing parameters as an empty set', () => {
    expect(paths(validateParams(graph, 'com.example.getFeed', undefined))).toEqual([['actor']]);
    expect(validateParams(graph, 'com.example.ping', undefined)).toEqual({ valid: true, value: {} });
  });

  it('accepts anything when no parameters are declared', () => {
    expect(validateParams(graph, 'com.example.ping', { x: 1 })).toEqual({ valid: true, value: { x: 1 } });
  });

  it('throws for a name that is not an endpoint', () => {
    const missing = thrownBy(() => validateParams(graph, 'com.example.nothing', {}));
    expect(isQuireError(missing, QuireErrorCode.DEFINITION_NOT_FOUND)).toBe(true);
    const object = thrownBy(() => validateParams(graph, 'com.example.note', {}));
    expect(isQuireError(object, QuireErrorCode.DEFINITION_KIND_MISMATCH)).toBe(true);
    expect(object).toHaveProperty('message', 'com.example.note is a object, not a query or procedure');
  });
});

describe('validateInput', () => {
  it('matches the encoding against the declared pattern', () => {
    const body = new Uint8Array([1, 2, 3]);
    expect(validateInput(graph, 'com.example.upload', body, 'image/png')).toEqual({ valid: true, value: body });
    expect(validateInput(graph, 'com.example.upload', body, 'text/plain')).toEqual({
      valid: false,
      violations: [
        {
          path: ['encoding'],
          kind: { code: 'EnumMismatch', allowed: ['image/*'] },
          message: expect.any(String),
        },
      ],
    });
  });

  it('rejects a body where none is declared', () => {
    expect(validateInput(graph, 'com.example.ping', undefined)).toEqual({ valid: true, value: undefined });
    const outcome = validateInput(graph, 'com.example.ping', { a: 1 });
    expect(!outcome.valid && outcome.violations[0].kind).toEqual({
      code: 'UnexpectedType',
      expected: 'no body',
      actual: 'object',
    });
  });

  it('throws for a query', () => {
    const thrown = thrownBy(() => validateInput(graph, 'com.example.getFeed', {}));
    expect(isQuireError(thrown, QuireErrorCode.DEFINITION_KIND_MISMATCH)).toBe(true);
    expect(thrown).toHaveProperty('message', 'com.example.getFeed is a query and takes no input');
  });
});

describe('validateOutput', () => {
  it('validates the body schema', () => {
    expect(validateOutput(graph, 'com.example.getFeed', { items: ['a'] })).toEqual({
      valid: true,
      value: { items: ['a'] },
    });
    expect(paths(validateOutput(graph, 'com.example.getFeed', { items: [1] }))).toEqual([['items', 0]]);
  });

  it('follows a ref schema', () => {
    expect(paths(validateOutput(graph, 'com.example.upload', {}))).toEqual([['ok']]);
  });

  it('ignores media-type parameters when comparing encodings', () => {
    const outcome = validateOutput(graph, 'com.example.upload', { ok: true }, 'application/json; charset=utf-8');
    expect(outcome).toEqual({ valid: true, value: { ok: true } });
  });

  it('reports an encoding mismatch together with schema violations', () => {
    expect(paths(validateOutput(graph, 'com.example.getFeed', {}, 'text/html'))).toEqual([['encoding'], ['items']]);
  });
});
