/**
 * ModelGraph Engine - Rename/Move Fixup Engine
 *
 * When a table, column or measure is renamed or moved, rewrites every formula
 * that references it so the formula keeps pointing at the same node.
 *
 * Sequence (one synchronous call):
 *   validating → applying → indexing → rewriting → committed
 * A validation failure ends in `rejected` before any side effect.
 *
 * Resolution follows current names, so dependents and their reference sites
 * are captured before the change is applied and rewritten after it. Rewrites
 * are span-based: only spans the index resolved to the target are replaced.
 */

import { hasExpression, isReferenceTarget, type ModelNode } from '../types/index.js';
import { HistoryInvariantError } from '../types/errors.js';
import type { ObjectGraph } from '../model/ObjectGraph.js';
import type { NodeId } from '../model/NodeId.js';
import type { UndoRedoManager } from '../history/UndoRedoManager.js';
import { CustomAction } from '../history/ModelActions.js';
import type { DependencyIndex, ReferenceSite } from '../formula/DependencyIndex.js';
import type { FormulaToken, Tokenizer } from '../formula/Tokenizer.js';
import { tokenizeFormula } from '../formula/Tokenizer.js';
import { bracketName, qualifiedName, quoteTableName } from '../formula/ReferenceText.js';

// =============================================================================
// Types
// =============================================================================

export type FixupPhase =
  | 'idle'
  | 'validating'
  | 'applying'
  | 'indexing'
  | 'rewriting'
  | 'committed'
  | 'rejected';

export interface FixupReport {
  /** Renamed or moved node */
  target: NodeId;
  phase: 'committed';
  /** Holders whose expression was rewritten, in rewrite order */
  rewritten: NodeId[];
  /** Holders left unchanged and marked with a fixup diagnostic */
  flagged: NodeId[];
}

/**
 * Records an expression change through the normal mutation path.
 */
export type ExpressionWriter = (holder: NodeId, text: string) => void;

export interface FixupRequest {
  target: NodeId;
  /** Throws to reject; runs before anything is captured or changed */
  validate: () => void;
  /** Applies (and records) the rename or move itself */
  apply: () => void;
  write: ExpressionWriter;
}

interface CapturedDependent {
  holder: NodeId;
  text: string;
  sites: ReferenceSite[];
}

interface FixupPlan {
  target: NodeId;
  dependents: CapturedDependent[];
  /** Holders that fail to tokenize but mention the target's current text */
  suspects: NodeId[];
  oldText: string;
}

// =============================================================================
// FixupEngine Class
// =============================================================================

export class FixupEngine {
  private graph: ObjectGraph;
  private index: DependencyIndex;
  private history: UndoRedoManager;
  private tokenizer: Tokenizer;
  private phase: FixupPhase = 'idle';

  constructor(
    graph: ObjectGraph,
    index: DependencyIndex,
    history: UndoRedoManager,
    tokenizer: Tokenizer = tokenizeFormula
  ) {
    this.graph = graph;
    this.index = index;
    this.history = history;
    this.tokenizer = tokenizer;
  }

  getPhase(): FixupPhase {
    return this.phase;
  }

  /**
   * Run a rename or move with its cascaded rewrites.
   * The caller owns the enclosing batch.
   *
   * @throws HistoryInvariantError during undo/redo replay
   */
  run(request: FixupRequest): FixupReport {
    if (this.history.isReplaying()) {
      throw new HistoryInvariantError('Fixups cannot run during undo/redo replay');
    }

    this.phase = 'validating';
    try {
      request.validate();
    } catch (error) {
      this.phase = 'rejected';
      throw error;
    }

    const target = this.graph.require(request.target);
    const plan = isReferenceTarget(target) ? this.capture(target) : null;

    this.phase = 'applying';
    request.apply();

    if (!plan) {
      this.phase = 'committed';
      return { target: target.id, phase: 'committed', rewritten: [], flagged: [] };
    }

    this.phase = 'indexing';
    const order = this.index.getFixupOrder(plan.dependents.map(d => d.holder));
    const byHolder = new Map(plan.dependents.map(d => [d.holder, d]));

    this.phase = 'rewriting';
    const rewritten: NodeId[] = [];
    const flagged: NodeId[] = [];

    for (const holder of order) {
      const captured = byHolder.get(holder);
      if (!captured) continue;
      const outcome = this.rewrite(captured, request.write);
      if (outcome === 'rewritten') rewritten.push(holder);
      if (outcome === 'flagged') flagged.push(holder);
    }

    for (const suspect of plan.suspects) {
      this.flag(suspect, `Expression could not be parsed; references to ${plan.oldText} were not updated`);
      flagged.push(suspect);
    }

    this.phase = 'committed';
    return { target: target.id, phase: 'committed', rewritten, flagged };
  }

  // ===========================================================================
  // Capture
  // ===========================================================================

  private capture(target: ModelNode): FixupPlan {
    const dependents: CapturedDependent[] = [];
    for (const holder of this.index.getDependents(target.id)) {
      const parse = this.index.getParse(holder);
      if (!parse || parse.tokens === null) continue;
      dependents.push({
        holder,
        text: parse.text,
        sites: this.index.getReferenceSites(holder, target.id),
      });
    }

    const oldText = target.kind === 'table' ? quoteTableName(target.name) : bracketName(target.name);
    const needle = oldText.toLowerCase();
    const suspects = this.index.getParseFailures().filter(holder => {
      const node = this.graph.get(holder);
      return node !== undefined && hasExpression(node) && node.expression.toLowerCase().includes(needle);
    });

    return { target: target.id, dependents, suspects, oldText };
  }

  // ===========================================================================
  // Rewrite
  // ===========================================================================

  private rewrite(
    captured: CapturedDependent,
    write: ExpressionWriter
  ): 'rewritten' | 'flagged' | 'unchanged' {
    const node = this.graph.get(captured.holder);
    if (!node || !hasExpression(node) || node.expression !== captured.text) {
      return 'unchanged';
    }

    let tokens: readonly FormulaToken[];
    try {
      tokens = this.tokenizer(captured.text);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.flag(captured.holder, `Could not re-read expression: ${reason}`);
      return 'flagged';
    }

    if (!captured.sites.every(site => sitesMatchTokens(site, tokens))) {
      this.flag(captured.holder, 'Reference positions changed before rewrite');
      return 'flagged';
    }

    // Right to left so earlier offsets stay valid
    const sites = [...captured.sites].sort((a, b) => b.span.start - a.span.start);
    let text = captured.text;
    for (const site of sites) {
      text = text.slice(0, site.span.start) +
        this.canonicalText(captured, site) +
        text.slice(site.span.end);
    }

    if (text === captured.text) return 'unchanged';
    write(captured.holder, text);
    return 'rewritten';
  }

  /**
   * Mark a holder with a fixup diagnostic, recorded in the current batch so
   * undoing the rename or move also withdraws the mark.
   */
  private flag(holder: NodeId, message: string): void {
    const previous = this.index.getFixupFailure(holder);
    const set = (value: string | undefined): void => {
      if (value === undefined) {
        this.index.clearFixupFailure(holder);
      } else {
        this.index.markFixupFailure(holder, value);
      }
    };

    set(message);
    this.history.add(new CustomAction(`Flag ${holder}`, () => set(message), () => set(previous)));
  }

  /**
   * Reference text for a site's target as it is named and placed now.
   * The result resolves back to the same target from the holder.
   */
  private canonicalText(captured: CapturedDependent, site: ReferenceSite): string {
    const target = this.graph.require(site.target);
    const table = this.graph.getHostTable(target.id);
    switch (site.form) {
      case 'table':
        return quoteTableName(target.name);
      case 'member':
        if (!table || this.index.resolveMember(captured.holder, target.name)?.id === target.id) {
          return bracketName(target.name);
        }
        return qualifiedName(table.name, target.name);
      case 'qualifiedMember': {
        if (!table) return bracketName(target.name);
        const { qualifier } = site;
        if (qualifier && qualifier.table === table.id) {
          return captured.text.slice(qualifier.span.start, qualifier.span.end) + bracketName(target.name);
        }
        return qualifiedName(table.name, target.name);
      }
    }
  }
}

function sitesMatchTokens(site: ReferenceSite, tokens: readonly FormulaToken[]): boolean {
  const startsToken = tokens.some(token => token.span.start === site.span.start);
  const endsToken = tokens.some(token => token.span.end === site.span.end);
  return startsToken && endsToken;
}
