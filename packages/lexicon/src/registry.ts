import { parseNsid } from '@quire/syntax';
import { silentLogger } from '@quire/types';
import type { Logger, Result } from '@quire/types';

import { buildGraph } from './builder';
import type { LexiconBuildError } from './errors';
import type { FormatRegistry } from './formats';
import { splitRef } from './graph';
import type { LexiconGraph } from './graph';
import type { ExternalResolver, ResolvedDefinition } from './types';

/** Options for {@link LexiconRegistry}. */
export interface LexiconRegistryOptions {
  formats?: FormatRegistry;
  logger?: Logger;
}

/**
 * In-memory set of compiled graphs, keyed by document id.
 *
 * Each {@link add} builds one graph whose refs into earlier additions go
 * through {@link resolver}, so documents can be registered dependency
 * first. A graph is published only once it has built.
 *
 * @example
 * ```typescript
 * const registry = new LexiconRegistry();
 * registry.add([defsLexicon]);
 * const posts = registry.add([postLexicon]); // may ref com.example.defs
 * ```
 */
export class LexiconRegistry {
  private readonly graphs = new Map<string, LexiconGraph>();
  private readonly formats: FormatRegistry | undefined;
  private readonly log: Logger;

  /** Resolves `(nsid, name)` against the registered graphs. */
  readonly resolver: ExternalResolver = (nsid, name) => {
    const graph = this.graphs.get(nsid);
    const handle = graph?.lookup(nsid, name);
    return graph && handle !== undefined ? { graph, handle } : undefined;
  };

  constructor(options?: LexiconRegistryOptions) {
    this.formats = options?.formats;
    this.log = (options?.logger ?? silentLogger).child('registry');
  }

  /** Number of registered documents. */
  get size(): number {
    return this.graphs.size;
  }

  /**
   * Build `documents` into one graph and register every document in it.
   * A document whose id is already registered replaces the old one.
   */
  add(documents: readonly unknown[]): Result<LexiconGraph, LexiconBuildError> {
    const result = buildGraph(documents, { resolver: this.resolver, formats: this.formats, logger: this.log });
    if (result.ok) {
      for (const id of result.value.documents) {
        if (this.graphs.has(id)) {
          this.log.warn('document replaced', { id });
        }
        this.graphs.set(id, result.value);
      }
    }
    return result;
  }

  /** Whether a document with this id is registered. */
  has(nsid: string): boolean {
    return this.graphs.has(canonical(nsid));
  }

  /** The graph holding document `nsid`. */
  get(nsid: string): LexiconGraph | undefined {
    return this.graphs.get(canonical(nsid));
  }

  /** Follow `nsid#name` (or `nsid`) to its graph and handle. */
  resolve(ref: string): ResolvedDefinition | undefined {
    const { nsid, name } = splitRef(ref);
    return this.resolver(canonical(nsid), name);
  }

  /**
   * Forget a document. Graphs built against it keep working until a
   * validation reaches one of its definitions, which then throws
   * REF_UNRESOLVED.
   */
  remove(nsid: string): boolean {
    return this.graphs.delete(canonical(nsid));
  }

  /** Registered document ids, sorted. */
  ids(): string[] {
    return [...this.graphs.keys()].sort();
  }
}

function canonical(nsid: string): string {
  const parsed = parseNsid(nsid);
  return parsed.ok ? parsed.value.nsid : nsid;
}
