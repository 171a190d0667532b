import { QuireError, QuireErrorCode } from '@quire/types';

import type { NodeHandle, RefTarget, ResolvedDefinition, ResolvedNode } from './types';

/**
 * Split a definition reference into NSID and name: `nsid#name`, or a bare
 * `nsid` meaning `nsid#main`.
 */
export function splitRef(ref: string): { nsid: string; name: string } {
  const hash = ref.indexOf('#');
  return hash < 0 ? { nsid: ref, name: 'main' } : { nsid: ref.slice(0, hash), name: ref.slice(hash + 1) };
}

/**
 * A compiled, immutable set of lexicon definitions.
 *
 * Nodes live in a flat arena addressed by {@link NodeHandle}; refs and
 * union members store handles, so cyclic schemas never produce cyclic
 * data. Cross-document refs keep the resolver they were checked with and
 * are looked up again when a validation reaches them.
 */
export class LexiconGraph {
  private readonly nodes: readonly ResolvedNode[];
  private readonly index: ReadonlyMap<string, NodeHandle>;

  /** Ids of the documents compiled into this graph, sorted. */
  readonly documents: readonly string[];

  constructor(nodes: readonly ResolvedNode[], index: ReadonlyMap<string, NodeHandle>, documents: readonly string[]) {
    this.nodes = nodes;
    this.index = index;
    this.documents = documents;
  }

  /** Number of nodes in the arena, nested definitions included. */
  get size(): number {
    return this.nodes.length;
  }

  /** Whether `ref` (`nsid#name` or `nsid`) names a top-level definition here. */
  has(ref: string): boolean {
    const { nsid, name } = splitRef(ref);
    return this.lookup(nsid, name) !== undefined;
  }

  /** Handle of the top-level definition `nsid#name`, if it exists. */
  lookup(nsid: string, name = 'main'): NodeHandle | undefined {
    return this.index.get(`${nsid}#${name}`);
  }

  /**
   * The node at `handle`.
   *
   * @throws {QuireError} DEFINITION_NOT_FOUND for a handle outside the arena.
   */
  node(handle: NodeHandle): ResolvedNode {
    const node = this.nodes[handle];
    if (node === undefined) {
      throw new QuireError(QuireErrorCode.DEFINITION_NOT_FOUND, `No node with handle ${handle} in this graph`, {
        context: { handle, size: this.nodes.length },
      });
    }
    return node;
  }

  /** Top-level definition names of `nsid`, in sorted order. */
  definitions(nsid: string): string[] {
    const prefix = `${nsid}#`;
    return [...this.index.keys()].filter((key) => key.startsWith(prefix)).map((key) => key.slice(prefix.length));
  }

  /**
   * Follow a ref target to the graph and handle it names.
   *
   * @throws {QuireError} REF_UNRESOLVED when an external definition has
   *   disappeared since the graph was built, RESOLVER_FAILED when the
   *   resolver throws.
   */
  resolveTarget(target: RefTarget): ResolvedDefinition {
    if (target.kind === 'local') {
      return { graph: this, handle: target.handle };
    }
    let resolved: ResolvedDefinition | undefined;
    try {
      resolved = target.resolver(target.nsid, target.name);
    } catch (e) {
      throw new QuireError(QuireErrorCode.RESOLVER_FAILED, `Resolver failed for ${target.nsid}#${target.name}`, {
        cause: e instanceof Error ? e : undefined,
      });
    }
    if (!resolved) {
      throw new QuireError(
        QuireErrorCode.REF_UNRESOLVED,
        `External definition ${target.nsid}#${target.name} is no longer available`,
        { hint: 'Keep referenced documents registered for as long as graphs that point at them are in use.' },
      );
    }
    return resolved;
  }
}
