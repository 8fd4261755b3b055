/**
 * ModelGraph Engine - Formula Dependency Index
 *
 * Maps every node to the formula-bearing nodes whose expressions reference it.
 * Edges carry the text spans they came from, so the fixup engine can rewrite
 * exactly those spans.
 *
 * Key features:
 * - Per-expression rebuild: an expression's edges are replaced wholesale
 *   whenever its text changes, never patched
 * - Name-keyed reverse lookup, so adds and renames re-bind references that
 *   were unresolved before
 * - Incremental maintenance from object graph change notifications
 * - Cycles are allowed and not special-cased
 */

import {
  hasExpression,
  type ExpressionHolder,
  type ModelNode,
  type TextSpan,
} from '../types/index.js';
import type { GraphChange, ObjectGraph } from '../model/ObjectGraph.js';
import { nameKey } from '../model/ObjectGraph.js';
import { compareNodeIds, type NodeId } from '../model/NodeId.js';
import {
  tokenizeFormula,
  tokenText,
  type FormulaToken,
  type Tokenizer,
} from './Tokenizer.js';
import { unbracketName, unquoteTableName } from './ReferenceText.js';

// =============================================================================
// Types
// =============================================================================

/**
 * - table: 'Sales', or Sales in front of a bracket
 * - member: [Amount]
 * - qualifiedMember: 'Sales'[Amount], spanning qualifier and bracket
 */
export type ReferenceForm = 'table' | 'member' | 'qualifiedMember';

export interface ReferenceSite {
  readonly span: TextSpan;
  readonly form: ReferenceForm;
  readonly target: NodeId;
  /** qualifiedMember only: the qualifier token and the table it named */
  readonly qualifier?: {
    readonly span: TextSpan;
    readonly table: NodeId;
  };
}

export interface ExpressionParse {
  readonly text: string;
  /** null when tokenization failed */
  readonly tokens: readonly FormulaToken[] | null;
  readonly sites: readonly ReferenceSite[];
  /** Reference text that did not resolve, e.g. "[Missing]" */
  readonly unresolved: readonly string[];
  readonly parseError: string | null;
}

export interface ExpressionDiagnostic {
  node: NodeId;
  kind: 'parse' | 'fixup';
  message: string;
}

export interface DependencyIndexStats {
  expressions: number;
  edges: number;
  unresolved: number;
  parseErrors: number;
  fixupFailures: number;
}

interface IndexEntry extends ExpressionParse {
  /** Name keys mentioned in reference positions, resolved or not */
  readonly names: ReadonlySet<string>;
  readonly targets: ReadonlySet<NodeId>;
}

// =============================================================================
// DependencyIndex Class
// =============================================================================

export class DependencyIndex {
  private graph: ObjectGraph;
  private tokenizer: Tokenizer;

  /** Map: holder → parsed expression */
  private entries: Map<NodeId, IndexEntry> = new Map();

  /** Map: target → holders referencing it */
  private dependents: Map<NodeId, Set<NodeId>> = new Map();

  /** Map: name key → holders mentioning that name */
  private byName: Map<string, Set<NodeId>> = new Map();

  /** Map: holder → last fixup failure, cleared when its text changes */
  private fixupFailures: Map<NodeId, string> = new Map();

  private unsubscribe: (() => void) | null;

  constructor(graph: ObjectGraph, tokenizer: Tokenizer = tokenizeFormula) {
    this.graph = graph;
    this.tokenizer = tokenizer;
    this.unsubscribe = graph.subscribe(change => this.handleGraphChange(change));
    this.rebuild();
  }

  /**
   * Stop following graph changes.
   */
  dispose(): void {
    this.unsubscribe?.();
    this.unsubscribe = null;
  }

  // ===========================================================================
  // Indexing
  // ===========================================================================

  /**
   * Re-tokenize and re-resolve one expression, replacing all of its edges.
   */
  onExpressionChanged(node: ExpressionHolder, oldText: string, newText: string): void {
    if (oldText !== newText) {
      this.fixupFailures.delete(node.id);
    }
    this.indexText(node, newText);
  }

  /**
   * Drop the index and rebuild it from every expression in the graph.
   */
  rebuild(): void {
    this.clear();
    for (const node of this.graph.all()) {
      if (hasExpression(node)) {
        this.indexText(node, node.expression);
      }
    }
  }

  clear(): void {
    this.entries.clear();
    this.dependents.clear();
    this.byName.clear();
    this.fixupFailures.clear();
  }

  private indexText(holder: ExpressionHolder, text: string): void {
    this.unlink(holder.id);

    let tokens: readonly FormulaToken[] | null = null;
    let parseError: string | null = null;
    try {
      tokens = this.tokenizer(text);
    } catch (error) {
      parseError = error instanceof Error ? error.message : String(error);
    }

    const entry: IndexEntry = tokens
      ? this.resolve(holder, text, tokens)
      : { text, tokens: null, sites: [], unresolved: [], parseError, names: new Set<string>(), targets: new Set<NodeId>() };

    this.entries.set(holder.id, entry);
    for (const target of entry.targets) {
      addToSetMap(this.dependents, target, holder.id);
    }
    for (const name of entry.names) {
      addToSetMap(this.byName, name, holder.id);
    }
  }

  private unlink(holder: NodeId): void {
    const entry = this.entries.get(holder);
    if (!entry) return;
    for (const target of entry.targets) {
      removeFromSetMap(this.dependents, target, holder);
    }
    for (const name of entry.names) {
      removeFromSetMap(this.byName, name, holder);
    }
    this.entries.delete(holder);
  }

  /**
   * Resolve reference tokens against current names (case-insensitive).
   */
  private resolve(
    holder: ExpressionHolder,
    text: string,
    tokens: readonly FormulaToken[]
  ): IndexEntry {
    const sites: ReferenceSite[] = [];
    const unresolved: string[] = [];
    const names = new Set<string>();
    const targets = new Set<NodeId>();

    const addSite = (span: TextSpan, form: ReferenceForm, target: NodeId): void => {
      sites.push({ span, form, target });
      targets.add(target);
    };

    for (let i = 0; i < tokens.length; i++) {
      const token = tokens[i];
      const next: FormulaToken | undefined = tokens[i + 1];
      const raw = tokenText(text, token);

      if (token.classification === 'bracketedReference') {
        const memberName = unbracketName(raw);
        names.add(nameKey(memberName));
        const member = this.resolveMember(holder.id, memberName);
        if (member) {
          addSite(token.span, 'member', member.id);
        } else {
          unresolved.push(raw);
        }
        continue;
      }

      const isQuoted = token.classification === 'quotedQualifiedReference';
      if (!isQuoted && token.classification !== 'identifier') continue;

      const tableName = isQuoted ? unquoteTableName(raw) : raw;
      const qualifies = next !== undefined &&
        next.classification === 'bracketedReference' &&
        next.span.start === token.span.end;

      // A bare identifier is only a table name as a qualifier; alone it is a
      // function, variable or keyword.
      if (!isQuoted && !qualifies) continue;

      names.add(nameKey(tableName));
      const table = this.graph.findTable(tableName);

      if (!qualifies || next === undefined) {
        if (table) {
          addSite(token.span, 'table', table.id);
        } else if (isQuoted) {
          unresolved.push(raw);
        }
        continue;
      }

      const memberText = tokenText(text, next);
      const memberName = unbracketName(memberText);
      names.add(nameKey(memberName));
      i++;

      if (!table) {
        unresolved.push(raw + memberText);
        continue;
      }
      addSite(token.span, 'table', table.id);
      const member = this.graph.findTableMember(table.id, memberName);
      if (member) {
        sites.push({
          span: { start: token.span.start, end: next.span.end },
          form: 'qualifiedMember',
          target: member.id,
          qualifier: { span: token.span, table: table.id },
        });
        targets.add(member.id);
      } else {
        unresolved.push(raw + memberText);
      }
    }

    return { text, tokens, sites, unresolved, parseError: null, names, targets };
  }

  /**
   * What `[name]` written in `holder`'s expression refers to: a column or
   * measure of the holder's table, else a measure anywhere in the model.
   */
  resolveMember(holder: NodeId, name: string): ModelNode | undefined {
    const host = this.graph.getHostTable(holder);
    return (host ? this.graph.findTableMember(host.id, name) : undefined) ??
      this.graph.findMeasure(name);
  }

  // ===========================================================================
  // Graph Change Handling
  // ===========================================================================

  /**
   * Keep the index current. Runs for replayed changes too.
   */
  handleGraphChange(change: GraphChange): void {
    const affected = new Set<NodeId>();

    switch (change.type) {
      case 'nodeAdded':
        for (const node of change.subtree) {
          if (hasExpression(node)) affected.add(node.id);
          this.collectByName(node.name, affected);
        }
        break;

      case 'nodeRemoved': {
        const removed = new Set(change.subtree.map(node => node.id));
        for (const node of change.subtree) {
          this.collectDependents(node.id, affected);
          this.collectByName(node.name, affected);
        }
        for (const id of removed) {
          this.unlink(id);
          this.fixupFailures.delete(id);
          affected.delete(id);
        }
        break;
      }

      case 'propertyChanged': {
        const { node, property, oldValue, newValue } = change;
        if (property === 'expression') {
          if (hasExpression(node)) {
            this.onExpressionChanged(
              node,
              typeof oldValue === 'string' ? oldValue : '',
              typeof newValue === 'string' ? newValue : ''
            );
          }
          return;
        }
        if (property === 'name') {
          this.collectDependents(node.id, affected);
          if (typeof oldValue === 'string') this.collectByName(oldValue, affected);
          this.collectByName(node.name, affected);
        } else if (property === 'parent') {
          this.collectDependents(node.id, affected);
          this.collectByName(node.name, affected);
          for (const member of this.graph.getSubtree(node.id)) {
            if (hasExpression(member)) affected.add(member.id);
          }
        }
        break;
      }
    }

    this.reindex(affected);
  }

  private reindex(ids: Iterable<NodeId>): void {
    for (const id of ids) {
      const node: ModelNode | undefined = this.graph.get(id);
      if (node && hasExpression(node)) {
        this.indexText(node, node.expression);
      }
    }
  }

  private collectDependents(target: NodeId, into: Set<NodeId>): void {
    for (const holder of this.dependents.get(target) ?? []) {
      into.add(holder);
    }
  }

  private collectByName(name: string, into: Set<NodeId>): void {
    for (const holder of this.byName.get(nameKey(name)) ?? []) {
      into.add(holder);
    }
  }

  // ===========================================================================
  // Queries
  // ===========================================================================

  /**
   * Formula-bearing nodes with an edge into `node`, in id order.
   */
  getDependents(node: NodeId): NodeId[] {
    return Array.from(this.dependents.get(node) ?? []).sort(compareNodeIds);
  }

  /**
   * Nodes the expression of `holder` references, in id order.
   */
  getPrecedents(holder: NodeId): NodeId[] {
    const entry = this.entries.get(holder);
    return entry ? Array.from(entry.targets).sort(compareNodeIds) : [];
  }

  /**
   * Transitive dependents (BFS), excluding `node` itself unless it is on a cycle.
   */
  getAllDependents(node: NodeId): NodeId[] {
    const result = new Set<NodeId>();
    const queue = [node];

    while (queue.length > 0) {
      const current = queue.shift();
      if (current === undefined) break;
      for (const dependent of this.dependents.get(current) ?? []) {
        if (!result.has(dependent)) {
          result.add(dependent);
          queue.push(dependent);
        }
      }
    }

    return Array.from(result).sort(compareNodeIds);
  }

  /**
   * Reference sites in `holder`'s expression, optionally only those targeting
   * `target`, in text order.
   */
  getReferenceSites(holder: NodeId, target?: NodeId): ReferenceSite[] {
    const sites = this.entries.get(holder)?.sites ?? [];
    return sites.filter(site => target === undefined || site.target === target);
  }

  getParse(holder: NodeId): ExpressionParse | undefined {
    return this.entries.get(holder);
  }

  /**
   * Holders whose expression failed to tokenize.
   */
  getParseFailures(): NodeId[] {
    const result: NodeId[] = [];
    for (const [id, entry] of this.entries) {
      if (entry.parseError !== null) result.push(id);
    }
    return result.sort(compareNodeIds);
  }

  markFixupFailure(holder: NodeId, message: string): void {
    this.fixupFailures.set(holder, message);
  }

  getFixupFailure(holder: NodeId): string | undefined {
    return this.fixupFailures.get(holder);
  }

  clearFixupFailure(holder: NodeId): void {
    this.fixupFailures.delete(holder);
  }

  getDiagnostics(): ExpressionDiagnostic[] {
    const result: ExpressionDiagnostic[] = [];
    for (const [node, entry] of this.entries) {
      if (entry.parseError !== null) {
        result.push({ node, kind: 'parse', message: entry.parseError });
      }
    }
    for (const [node, message] of this.fixupFailures) {
      result.push({ node, kind: 'fixup', message });
    }
    return result.sort((a, b) => compareNodeIds(a.node, b.node) || a.kind.localeCompare(b.kind));
  }

  /**
   * Order holders so a holder comes after the holders it references
   * (Kahn's algorithm over edges inside the set). Ties and cycle members
   * fall back to id order.
   */
  getFixupOrder(holders: Iterable<NodeId>): NodeId[] {
    const pending = new Set(holders);
    const result: NodeId[] = [];
    const inDegree = new Map<NodeId, number>();

    for (const holder of pending) {
      let count = 0;
      for (const precedent of this.getPrecedents(holder)) {
        if (precedent !== holder && pending.has(precedent)) count++;
      }
      inDegree.set(holder, count);
    }

    const ready = Array.from(pending).filter(id => inDegree.get(id) === 0).sort(compareNodeIds);

    while (ready.length > 0) {
      const holder = ready.shift();
      if (holder === undefined) break;
      result.push(holder);

      for (const dependent of this.getDependents(holder)) {
        if (dependent === holder || !pending.has(dependent)) continue;
        const degree = (inDegree.get(dependent) ?? 0) - 1;
        inDegree.set(dependent, degree);
        if (degree === 0) {
          ready.push(dependent);
          ready.sort(compareNodeIds);
        }
      }
    }

    // Remaining holders are on cycles
    const emitted = new Set(result);
    for (const holder of Array.from(pending).sort(compareNodeIds)) {
      if (!emitted.has(holder)) result.push(holder);
    }

    return result;
  }

  getStats(): DependencyIndexStats {
    let edges = 0;
    let unresolved = 0;
    let parseErrors = 0;
    for (const entry of this.entries.values()) {
      edges += entry.targets.size;
      unresolved += entry.unresolved.length;
      if (entry.parseError !== null) parseErrors++;
    }
    return {
      expressions: this.entries.size,
      edges,
      unresolved,
      parseErrors,
      fixupFailures: this.fixupFailures.size,
    };
  }
}

// =============================================================================
// Helpers
// =============================================================================

function addToSetMap<K, V>(map: Map<K, Set<V>>, key: K, value: V): void {
  let set = map.get(key);
  if (!set) {
    set = new Set();
    map.set(key, set);
  }
  set.add(value);
}

function removeFromSetMap<K, V>(map: Map<K, Set<V>>, key: K, value: V): void {
  const set = map.get(key);
  if (!set) return;
  set.delete(value);
  if (set.size === 0) map.delete(key);
}
