import { describe, it, expect } from 'vitest';
import { LogLevel, QuireErrorCode, createLogger, isQuireError } from '@quire/types';
import type { LogEntry } from '@quire/types';

import { LexiconRegistry } from './registry';
import { validateDefinition } from './validate';

const defs = {
  lexicon: 1,
  id: 'com.example.defs',
  defs: {
    label: { type: 'string', maxLength: 8 },
    main: { type: 'object', properties: {} },
  },
};

const post = {
  lexicon: 1,
  id: 'com.example.post',
  defs: {
    main: {
      type: 'object',
      required: ['label'],
      properties: { label: { type: 'ref', ref: 'com.example.defs#label' } },
    },
  },
};

describe('LexiconRegistry', () => {
  it('registers documents built together', () => {
    const registry = new LexiconRegistry();
    const result = registry.add([post, defs]);
    expect(result.ok).toBe(true);
    expect(registry.size).toBe(2);
    expect(registry.ids()).toEqual(['com.example.defs', 'com.example.post']);
    expect(registry.get('com.example.defs')).toBe(registry.get('com.example.post'));
  });

  it('resolves refs into earlier additions', () => {
    const registry = new LexiconRegistry();
    expect(registry.add([defs]).ok).toBe(true);
    const result = registry.add([post]);
    expect(result.ok).toBe(true);

    const graph = registry.get('com.example.post');
    expect(graph?.documents).toEqual(['com.example.post']);
    if (graph) {
      expect(validateDefinition(graph, 'com.example.post', { label: 'short' }).valid).toBe(true);
      const outcome = validateDefinition(graph, 'com.example.post', { label: 'much too long' });
      expect(!outcome.valid && outcome.violations.map((v) => v.kind.code)).toEqual(['StringTooLong']);
    }
  });

  it('publishes nothing when a build fails', () => {
    const registry = new LexiconRegistry();
    const result = registry.add([post]);
    expect(result.ok).toBe(false);
    expect(!result.ok && result.error.kind).toBe('UnresolvedRef');
    expect(registry.size).toBe(0);
    expect(registry.has('com.example.post')).toBe(false);
  });

  it('looks documents up by canonical id', () => {
    const registry = new LexiconRegistry();
    registry.add([defs]);
    expect(registry.has('COM.Example.defs')).toBe(true);
    const resolved = registry.resolve('COM.EXAMPLE.defs#label');
    expect(resolved).toBeDefined();
    if (resolved) {
      expect(resolved.graph.node(resolved.handle).kind).toBe('string');
    }
    expect(registry.resolve('com.example.defs#nope')).toBeUndefined();
    expect(registry.resolve('com.example.other')).toBeUndefined();
  });

  it('warns when a document is replaced', () => {
    const entries: LogEntry[] = [];
    const logger = createLogger({ level: LogLevel.DEBUG, output: (entry) => entries.push(entry) });
    const registry = new LexiconRegistry({ logger });
    registry.add([defs]);
    registry.add([defs]);
    expect(registry.size).toBe(1);
    const warnings = entries.filter((e) => e.level === 'WARN');
    expect(warnings).toHaveLength(1);
    expect(warnings[0]).toMatchObject({
      message: 'document replaced',
      component: 'registry',
      id: 'com.example.defs',
    });
  });

  it('leaves dependent graphs failing with REF_UNRESOLVED after removal', () => {
    const registry = new LexiconRegistry();
    registry.add([defs]);
    registry.add([post]);
    const graph = registry.get('com.example.post');

    expect(registry.remove('com.example.defs')).toBe(true);
    expect(registry.remove('com.example.defs')).toBe(false);
    expect(registry.ids()).toEqual(['com.example.post']);

    let thrown: unknown;
    try {
      if (graph) {
        validateDefinition(graph, 'com.example.post', { label: 'x' });
      }
    } catch (e) {
      thrown = e;
    }
    expect(isQuireError(thrown, QuireErrorCode.REF_UNRESOLVED)).toBe(true);
  });
});
