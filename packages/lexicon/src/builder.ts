/**
 * Compiles lexicon documents into a {@link LexiconGraph}.
 *
 * Compilation is all-or-nothing: the first authoring mistake aborts the
 * build with a {@link LexiconBuildError}. Documents are visited in `id`
 * order and definitions in name order, so the same input set always yields
 * the same handles whatever order it was given in.
 */

import { parseNsid } from '@quire/syntax';
import {
  ok,
  err,
  debug,
  freezeDeep,
  isPlainObject,
  isNonNegativeInteger,
  isStringArray,
  silentLogger,
} from '@quire/types';
import type { Logger, Result } from '@quire/types';

import { DEFINITION_NAME_PATTERN, parseLexiconDocument } from './document';
import type { ParsedDocument } from './document';
import { LexiconBuildError } from './errors';
import { DEFAULT_FORMAT_REGISTRY, lookupFormat } from './formats';
import type { FormatRegistry } from './formats';
import { LexiconGraph, splitRef } from './graph';
import { parseKeyStrategy } from './record';
import type {
  ArrayNode,
  BlobNode,
  BodyNode,
  BooleanNode,
  BytesNode,
  ErrorDeclaration,
  ExternalResolver,
  IntegerNode,
  NodeHandle,
  NodeKind,
  ObjectNode,
  PropertyEntry,
  RefTarget,
  ResolvedDefinition,
  ResolvedNode,
  StringNode,
  UnionMember,
} from './types';

/** Options for {@link buildGraph}. */
export interface BuildOptions {
  /** Looks up refs into documents outside the set being built. */
  resolver?: ExternalResolver;
  /** String formats available to `format`. Defaults to the standard set. */
  formats?: FormatRegistry;
  logger?: Logger;
}

type RawObject = Record<string, unknown>;

interface Context {
  readonly doc: ParsedDocument;
  readonly path: string;
}

interface PendingTarget {
  readonly handle: NodeHandle;
  readonly ref: string;
  readonly path: string;
  readonly member: boolean;
}

const PARAM_KINDS: readonly string[] = ['boolean', 'integer', 'string', 'unknown'];
const BODY_SCHEMA_KINDS: readonly string[] = ['ref', 'union', 'object'];
const MIME_PATTERN = /^[^/\s]+\/[^/\s]+$/;

// ─── Field readers ──────────────────────────────────────────────────────────────

function invalid(path: string, message: string): LexiconBuildError {
  return new LexiconBuildError('InvalidDefinition', path, message);
}

function child(ctx: Context, segment: string): Context {
  return { doc: ctx.doc, path: `${ctx.path}.${segment}` };
}

function readString(raw: RawObject, key: string, path: string): string | undefined {
  const value = raw[key];
  if (value === undefined || typeof value === 'string') {
    return value;
  }
  throw invalid(path, `"${key}" must be a string`);
}

function readBoolean(raw: RawObject, key: string, path: string): boolean | undefined {
  const value = raw[key];
  if (value === undefined || typeof value === 'boolean') {
    return value;
  }
  throw invalid(path, `"${key}" must be a boolean`);
}

function readInteger(raw: RawObject, key: string, path: string): number | undefined {
  const value = raw[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value === 'number' && Number.isSafeInteger(value)) {
    return value;
  }
  throw invalid(path, `"${key}" must be an integer`);
}

function readCount(raw: RawObject, key: string, path: string): number | undefined {
  const value = raw[key];
  if (value === undefined) {
    return undefined;
  }
  if (!isNonNegativeInteger(value)) {
    throw invalid(path, `"${key}" must be a non-negative integer`);
  }
  return value;
}

function readStrings(raw: RawObject, key: string, path: string): string[] | undefined {
  const value = raw[key];
  if (value === undefined || isStringArray(value)) {
    return value;
  }
  throw invalid(path, `"${key}" must be an array of strings`);
}

function readErrors(raw: RawObject, path: string): ErrorDeclaration[] | undefined {
  const value = raw.errors;
  if (value === undefined) {
    return undefined;
  }
  if (!Array.isArray(value)) {
    throw invalid(path, '"errors" must be an array');
  }
  return value.map((item: unknown, index): ErrorDeclaration => {
    const at = `${path}.errors[${index}]`;
    const name = isPlainObject(item) ? item.name : undefined;
    if (!isPlainObject(item) || typeof name !== 'string' || name.length === 0) {
      throw invalid(at, 'an error needs a non-empty "name" string');
    }
    const description = readString(item, 'description', at);
    return description === undefined ? { name } : { name, description };
  });
}

function readIntegers(raw: RawObject, key: string, path: string): number[] | undefined {
  const value = raw[key];
  if (value === undefined) {
    return undefined;
  }
  if (!Array.isArray(value)) {
    throw invalid(path, `"${key}" must be an array of integers`);
  }
  const out: number[] = [];
  for (const item of value) {
    if (typeof item !== 'number' || !Number.isSafeInteger(item)) {
      throw invalid(path, `"${key}" must be an array of integers`);
    }
    out.push(item);
  }
  return out;
}

function checkOrder(min: number | undefined, max: number | undefined, names: string, path: string): void {
  if (min !== undefined && max !== undefined && min > max) {
    throw invalid(path, `${names}: ${min} is greater than ${max}`);
  }
}

/** The `$type` a union member is selected by. */
function memberTag(nsid: string, name: string): string {
  return name === 'main' ? nsid : `${nsid}#${name}`;
}

function checkTargetKind(kind: NodeKind, ref: string, path: string, member: boolean): void {
  if (kind === 'query' || kind === 'procedure') {
    throw invalid(path, `"${ref}" names a ${kind}, which cannot be used as a type`);
  }
  if (member && kind !== 'object' && kind !== 'record') {
    throw invalid(path, `union member "${ref}" must name an object or record, not a ${kind}`);
  }
}

// ─── Cycle detection ────────────────────────────────────────────────────────────

/**
 * Whether some finite instance of `node` exists, given what is already
 * known about the nodes it points at. External targets count as
 * satisfiable; their own graph was checked when it was built.
 */
function satisfiable(node: ResolvedNode, known: readonly boolean[]): boolean {
  const reaches = (target: RefTarget): boolean => target.kind === 'external' || known[target.handle];
  switch (node.kind) {
    case 'ref':
      return reaches(node.target);
    case 'union':
      // an open union also takes any unknown $type
      return !node.closed || node.members.length === 0 || node.members.some((m: UnionMember) => reaches(m.target));
    case 'record':
      return known[node.payload];
    case 'object':
      // an optional or nullable property can be left out
      return node.properties.every((p) => !p.required || p.nullable || known[p.handle]);
    default:
      return true;
  }
}

/** The first edge out of an unsatisfiable node that leads to another one. */
function blockingEdge(node: ResolvedNode, known: readonly boolean[]): NodeHandle | undefined {
  const edges: RefTarget[] = [];
  switch (node.kind) {
    case 'ref':
      edges.push(node.target);
      break;
    case 'union':
      edges.push(...node.members.map((m: UnionMember) => m.target));
      break;
    case 'record':
      return node.payload;
    case 'object':
      return node.properties.find((p) => p.required && !p.nullable && !known[p.handle])?.handle;
    default:
      return undefined;
  }
  for (const target of edges) {
    if (target.kind === 'local' && !known[target.handle]) {
      return target.handle;
    }
  }
  return undefined;
}

/**
 * Find a cycle no finite instance could satisfy. Returns the handles along
 * it, first handle repeated at the end.
 */
export function findReferenceCycle(nodes: readonly ResolvedNode[]): NodeHandle[] | undefined {
  const known = new Array<boolean>(nodes.length).fill(false);
  let changed = true;
  while (changed) {
    changed = false;
    for (let handle = 0; handle < nodes.length; handle++) {
      if (!known[handle] && satisfiable(nodes[handle], known)) {
        known[handle] = true;
        changed = true;
      }
    }
  }

  const start = known.indexOf(false);
  if (start < 0) {
    return undefined;
  }
  // every unsatisfiable node has an unsatisfiable successor, so the walk closes
  const trail: NodeHandle[] = [];
  const seen = new Map<NodeHandle, number>();
  let handle: NodeHandle | undefined = start;
  while (handle !== undefined && !seen.has(handle)) {
    seen.set(handle, trail.length);
    trail.push(handle);
    handle = blockingEdge(nodes[handle], known);
  }
  if (handle === undefined) {
    return undefined;
  }
  return [...trail.slice(seen.get(handle)), handle];
}

// ─── Builder ────────────────────────────────────────────────────────────────────

class GraphBuilder {
  private readonly documents: readonly ParsedDocument[];
  private readonly formats: FormatRegistry;
  private readonly resolver: ExternalResolver | undefined;
  private readonly slots: (ResolvedNode | undefined)[] = [];
  private readonly index = new Map<string, NodeHandle>();
  private readonly pending: PendingTarget[] = [];
  externalRefs = 0;

  constructor(documents: readonly ParsedDocument[], options: BuildOptions | undefined) {
    this.documents = documents;
    this.formats = options?.formats ?? DEFAULT_FORMAT_REGISTRY;
    this.resolver = options?.resolver;
  }

  build(): LexiconGraph {
    // Top-level handles first, so refs can point forward.
    for (const doc of this.documents) {
      for (const name of Object.keys(doc.defs).sort()) {
        this.index.set(`${doc.id}#${name}`, this.slots.push(undefined) - 1);
      }
    }
    for (const doc of this.documents) {
      for (const name of Object.keys(doc.defs).sort()) {
        const handle = this.lookup(`${doc.id}#${name}`);
        this.slots[handle] = this.definition(doc.defs[name], { doc, path: `${doc.id}#${name}` }, name);
      }
    }

    const nodes: ResolvedNode[] = [];
    for (const node of this.slots) {
      if (node === undefined) {
        throw new Error('graph builder left a node slot empty');
      }
      nodes.push(node);
    }

    for (const { handle, ref, path, member } of this.pending) {
      checkTargetKind(nodes[handle].kind, ref, path, member);
    }

    const cycle = findReferenceCycle(nodes);
    if (cycle) {
      const trail = cycle.map((handle) => nodes[handle].path).join(' -> ');
      throw new LexiconBuildError('ReferenceCycle', nodes[cycle[0]].path, `reference cycle: ${trail}`);
    }

    freezeDeep(nodes);
    return new LexiconGraph(
      nodes,
      this.index,
      this.documents.map((doc) => doc.id),
    );
  }

  private lookup(key: string): NodeHandle {
    const handle = this.index.get(key);
    if (handle === undefined) {
      throw new Error(`graph builder has no handle for ${key}`);
    }
    return handle;
  }

  /** Compile a nested definition into a fresh slot. */
  private add(raw: unknown, ctx: Context): NodeHandle {
    const handle = this.slots.push(undefined) - 1;
    this.slots[handle] = this.definition(raw, ctx);
    return handle;
  }

  /**
   * Compile one definition. `name` is set for a document's top-level
   * definitions, which are the only place primary types may appear.
   */
  private definition(raw: unknown, ctx: Context, name?: string): ResolvedNode {
    const { path } = ctx;
    if (!isPlainObject(raw)) {
      throw invalid(path, 'a definition must be an object');
    }
    const { type } = raw;
    if (typeof type !== 'string') {
      throw invalid(path, 'a definition needs a string "type"');
    }
    const description = readString(raw, 'description', path);

    if (type === 'record' || type === 'query' || type === 'procedure' || type === 'token') {
      if (name === undefined) {
        throw invalid(path, `"${type}" definitions may only appear at the top level of a document`);
      }
      if (type !== 'token' && name !== 'main') {
        throw invalid(path, `"${type}" definitions must be named "main"`);
      }
    }

    switch (type) {
      case 'record': {
        const key = parseKeyStrategy(raw.key);
        if (!key) {
          throw invalid(path, '"key" must be "tid", "any", "nsid" or "literal:<value>"');
        }
        if (!isPlainObject(raw.record) || raw.record.type !== 'object') {
          throw invalid(path, '"record" must be an object definition');
        }
        return { kind: 'record', path, description, key, payload: this.add(raw.record, child(ctx, 'record')) };
      }
      case 'query':
        return {
          kind: 'query',
          path,
          description,
          parameters: this.params(raw.parameters, child(ctx, 'parameters')),
          output: this.body(raw.output, child(ctx, 'output')),
          errors: readErrors(raw, path),
        };
      case 'procedure':
        return {
          kind: 'procedure',
          path,
          description,
          parameters: this.params(raw.parameters, child(ctx, 'parameters')),
          input: this.body(raw.input, child(ctx, 'input')),
          output: this.body(raw.output, child(ctx, 'output')),
          errors: readErrors(raw, path),
        };
      case 'object':
        return this.object(raw, ctx, description);
      case 'array':
        return this.array(raw, ctx, description);
      case 'string':
        return this.string(raw, ctx, description);
      case 'integer':
        return this.integer(raw, ctx, description);
      case 'boolean': {
        const node: BooleanNode = {
          kind: 'boolean',
          path,
          description,
          default: readBoolean(raw, 'default', path),
          const: readBoolean(raw, 'const', path),
        };
        return node;
      }
      case 'bytes': {
        const node: BytesNode = {
          kind: 'bytes',
          path,
          description,
          minLength: readCount(raw, 'minLength', path),
          maxLength: readCount(raw, 'maxLength', path),
        };
        checkOrder(node.minLength, node.maxLength, 'minLength/maxLength', path);
        return node;
      }
      case 'blob':
        return this.blob(raw, ctx, description);
      case 'cid-link':
        return { kind: 'cid-link', path, description };
      case 'null':
        return { kind: 'null', path, description };
      case 'unknown':
        return { kind: 'unknown', path, description };
      case 'token':
        return { kind: 'token', path, description, value: memberTag(ctx.doc.id, name ?? 'main') };
      case 'ref': {
        const ref = readString(raw, 'ref', path);
        if (ref === undefined) {
          throw invalid(path, 'a ref needs a "ref" string');
        }
        return { kind: 'ref', path, description, ref, target: this.target(ref, ctx, false).target };
      }
      case 'union':
        return this.union(raw, ctx, description);
      default:
        throw invalid(path, `unknown definition type "${type}"`);
    }
  }

  private object(raw: RawObject, ctx: Context, description: string | undefined, paramKinds?: boolean): ObjectNode {
    const { path } = ctx;
    const properties = raw.properties ?? {};
    if (!isPlainObject(properties)) {
      throw invalid(path, '"properties" must be an object');
    }
    const required = readStrings(raw, 'required', path) ?? [];
    const nullable = readStrings(raw, 'nullable', path) ?? [];
    for (const [list, names] of [
      ['required', required],
      ['nullable', nullable],
    ] as const) {
      for (const field of names) {
        if (!Object.hasOwn(properties, field)) {
          throw invalid(path, `"${field}" is listed in "${list}" but not declared in "properties"`);
        }
      }
    }

    const entries: PropertyEntry[] = [];
    for (const [field, prop] of Object.entries(properties)) {
      const propCtx = child(ctx, `properties.${field}`);
      if (paramKinds) {
        this.checkParam(prop, propCtx.path);
      }
      entries.push({
        name: field,
        handle: this.add(prop, propCtx),
        required: required.includes(field),
        nullable: nullable.includes(field),
      });
    }

    return {
      kind: 'object',
      path,
      description,
      properties: entries,
      closed: readBoolean(raw, 'closed', path) ?? false,
    };
  }

  private checkParam(prop: unknown, path: string): void {
    if (!isPlainObject(prop) || typeof prop.type !== 'string') {
      return; // definition() reports the shape problem
    }
    if (PARAM_KINDS.includes(prop.type)) {
      return;
    }
    if (prop.type === 'array' && isPlainObject(prop.items) && typeof prop.items.type === 'string') {
      if (PARAM_KINDS.includes(prop.items.type)) {
        return;
      }
    }
    throw invalid(path, 'parameters must be boolean, integer, string, unknown, or arrays of those');
  }

  private params(raw: unknown, ctx: Context): NodeHandle | undefined {
    if (raw === undefined) {
      return undefined;
    }
    if (!isPlainObject(raw) || raw.type !== 'params') {
      throw invalid(ctx.path, '"parameters" must be a params definition');
    }
    const handle = this.slots.push(undefined) - 1;
    this.slots[handle] = this.object(raw, ctx, readString(raw, 'description', ctx.path), true);
    return handle;
  }

  private body(raw: unknown, ctx: Context): BodyNode | undefined {
    if (raw === undefined) {
      return undefined;
    }
    if (!isPlainObject(raw)) {
      throw invalid(ctx.path, 'a body must be an object');
    }
    const encoding = readString(raw, 'encoding', ctx.path);
    if (encoding === undefined || encoding.length === 0) {
      throw invalid(ctx.path, 'a body needs an "encoding" MIME type');
    }
    const { schema } = raw;
    if (schema === undefined) {
      return { encoding };
    }
    if (!isPlainObject(schema) || typeof schema.type !== 'string' || !BODY_SCHEMA_KINDS.includes(schema.type)) {
      throw invalid(ctx.path, 'a body schema must be a ref, union or object');
    }
    return { encoding, schema: this.add(schema, child(ctx, 'schema')) };
  }

  private array(raw: RawObject, ctx: Context, description: string | undefined): ArrayNode {
    const { path } = ctx;
    if (raw.items === undefined) {
      throw invalid(path, 'an array needs "items"');
    }
    const minLength = readCount(raw, 'minLength', path);
    const maxLength = readCount(raw, 'maxLength', path);
    checkOrder(minLength, maxLength, 'minLength/maxLength', path);
    return { kind: 'array', path, description, items: this.add(raw.items, child(ctx, 'items')), minLength, maxLength };
  }

  private string(raw: RawObject, ctx: Context, description: string | undefined): StringNode {
    const { path } = ctx;
    const formatName = readString(raw, 'format', path);
    const node: StringNode = {
      kind: 'string',
      path,
      description,
      format:
        formatName === undefined
          ? undefined
          : { name: formatName, validate: lookupFormat(this.formats, formatName, path) },
      default: readString(raw, 'default', path),
      const: readString(raw, 'const', path),
      minLength: readCount(raw, 'minLength', path),
      maxLength: readCount(raw, 'maxLength', path),
      minGraphemes: readCount(raw, 'minGraphemes', path),
      maxGraphemes: readCount(raw, 'maxGraphemes', path),
      knownValues: readStrings(raw, 'knownValues', path),
      enum: readStrings(raw, 'enum', path),
    };
    checkOrder(node.minLength, node.maxLength, 'minLength/maxLength', path);
    checkOrder(node.minGraphemes, node.maxGraphemes, 'minGraphemes/maxGraphemes', path);
    return node;
  }

  private integer(raw: RawObject, ctx: Context, description: string | undefined): IntegerNode {
    const { path } = ctx;
    const node: IntegerNode = {
      kind: 'integer',
      path,
      description,
      default: readInteger(raw, 'default', path),
      const: readInteger(raw, 'const', path),
      minimum: readInteger(raw, 'minimum', path),
      maximum: readInteger(raw, 'maximum', path),
      enum: readIntegers(raw, 'enum', path),
    };
    checkOrder(node.minimum, node.maximum, 'minimum/maximum', path);
    return node;
  }

  private blob(raw: RawObject, ctx: Context, description: string | undefined): BlobNode {
    const { path } = ctx;
    const accept = readStrings(raw, 'accept', path);
    for (const pattern of accept ?? []) {
      if (!MIME_PATTERN.test(pattern)) {
        throw invalid(path, `"${pattern}" is not a MIME type pattern`);
      }
    }
    return { kind: 'blob', path, description, accept, maxSize: readCount(raw, 'maxSize', path) };
  }

  private union(raw: RawObject, ctx: Context, description: string | undefined): ResolvedNode {
    const { path } = ctx;
    const refs = readStrings(raw, 'refs', path);
    if (refs === undefined) {
      throw invalid(path, 'a union needs a "refs" array');
    }
    const members: UnionMember[] = [];
    for (const ref of refs) {
      const { target, tag } = this.target(ref, ctx, true);
      if (members.some((m) => m.tag === tag)) {
        throw invalid(path, `union member "${ref}" is listed twice`);
      }
      members.push({ tag, target });
    }
    return { kind: 'union', path, description, members, closed: readBoolean(raw, 'closed', path) ?? false };
  }

  /**
   * Resolve a ref string: `#name` within the current document, otherwise
   * `nsid#name` or `nsid`. Refs into the documents being built become
   * handles; anything else goes through the resolver.
   */
  private target(ref: string, ctx: Context, member: boolean): { target: RefTarget; tag: string } {
    const { path } = ctx;
    const split = splitRef(ref.startsWith('#') ? `${ctx.doc.id}${ref}` : ref);
    const nsid = parseNsid(split.nsid);
    if (!nsid.ok || !DEFINITION_NAME_PATTERN.test(split.name)) {
      throw invalid(path, `"${ref}" is not a valid reference`);
    }
    const id = nsid.value.nsid;
    const { name } = split;
    const tag = memberTag(id, name);

    const local = this.index.get(`${id}#${name}`);
    if (local !== undefined) {
      this.pending.push({ handle: local, ref, path, member });
      return { target: { kind: 'local', handle: local }, tag };
    }
    if (this.documents.some((doc) => doc.id === id)) {
      throw new LexiconBuildError('UnresolvedRef', path, `"${ref}" does not name a definition in ${id}`);
    }

    const { resolver } = this;
    if (!resolver) {
      throw new LexiconBuildError('UnresolvedRef', path, `"${ref}" points outside the documents being built`);
    }
    let resolved: ResolvedDefinition | undefined;
    try {
      resolved = resolver(id, name);
    } catch (e) {
      throw new LexiconBuildError('ResolverFailed', path, `resolver failed for "${ref}"`, {
        cause: e instanceof Error ? e : undefined,
      });
    }
    if (!resolved) {
      throw new LexiconBuildError('UnresolvedRef', path, `"${ref}" could not be resolved`);
    }
    checkTargetKind(resolved.graph.node(resolved.handle).kind, ref, path, member);
    this.externalRefs++;
    return { target: { kind: 'external', nsid: id, name, resolver }, tag };
  }
}

// ─── Public API ─────────────────────────────────────────────────────────────────

function parseAll(documents: readonly unknown[]): ParsedDocument[] {
  const parsed: ParsedDocument[] = [];
  for (const document of documents) {
    const result = parseLexiconDocument(document);
    if (!result.ok) {
      throw result.error;
    }
    parsed.push(result.value);
  }
  parsed.sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
  for (let i = 1; i < parsed.length; i++) {
    if (parsed[i].id === parsed[i - 1].id) {
      throw new LexiconBuildError('DuplicateDefinition', parsed[i].id, `document "${parsed[i].id}" was given more than once`);
    }
  }
  return parsed;
}

/**
 * Compile a set of lexicon documents into one immutable graph.
 *
 * @example
 * ```typescript
 * const result = buildGraph([postLexicon, profileLexicon], { logger });
 * if (!result.ok) {
 *   throw result.error;
 * }
 * const graph = result.value;
 * ```
 */
export function buildGraph(
  documents: readonly unknown[],
  options?: BuildOptions,
): Result<LexiconGraph, LexiconBuildError> {
  const log = (options?.logger ?? silentLogger).child('graph');
  const stop = debug.lexicon.time('buildGraph');
  try {
    const builder = new GraphBuilder(parseAll(documents), options);
    const graph = builder.build();
    log.info('lexicon graph built', {
      documents: graph.documents.length,
      nodes: graph.size,
      external: builder.externalRefs,
    });
    return ok(graph);
  } catch (e) {
    if (e instanceof LexiconBuildError) {
      log.warn('lexicon graph build failed', { kind: e.kind, definitionPath: e.definitionPath });
      return err(e);
    }
    throw e;
  } finally {
    stop();
  }
}

/**
 * Like {@link buildGraph}, but throws the {@link LexiconBuildError}.
 */
export function compileGraph(documents: readonly unknown[], options?: BuildOptions): LexiconGraph {
  const result = buildGraph(documents, options);
  if (!result.ok) {
    throw result.error;
  }
  return result.value;
}
