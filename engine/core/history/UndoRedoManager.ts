/**
 * ModelGraph Engine - Undo/Redo Manager (Command Pattern)
 *
 * Transactional undo/redo for one modeling session.
 * Each primitive mutation is an Action with apply() and revert(); actions are
 * grouped into Transactions, and a Transaction is the unit of undo and redo.
 *
 * Features:
 * - Nested batches: only the outermost begin/end commits
 * - Replay guard: nothing is recorded while undoing or redoing
 * - Configurable history depth
 * - Event System: hooks for UI state synchronization and logging
 *
 * Design:
 * - Actions are immutable after creation
 * - Transactions revert in reverse order and re-apply in original order
 * - No timers, no UI/DOM dependencies
 */

import { HistoryInvariantError } from '../types/errors.js';

// =============================================================================
// Types - Action Interface
// =============================================================================

export type ActionType =
  | 'setProperty'
  | 'addNode'
  | 'removeNode'
  | 'moveNode'
  | 'custom';

/**
 * One primitive mutation, already applied when it is recorded.
 */
export interface ModelAction {
  /** Unique action ID */
  readonly id: string;
  readonly type: ActionType;
  /** Human-readable description for UI */
  readonly description: string;
  readonly timestamp: number;

  /**
   * Re-apply the mutation. Must restore exactly the post-mutation state.
   */
  apply(): void;

  /**
   * Invert the mutation. Must restore exactly the pre-mutation state.
   */
  revert(): void;
}

// =============================================================================
// Types - State & Events
// =============================================================================

export type HistoryState = 'idle' | 'recording' | 'undoing' | 'redoing';

export interface UndoRedoState {
  canUndo: boolean;
  canRedo: boolean;
  undoCount: number;
  redoCount: number;
  /** Label of the transaction undo() would revert */
  undoDescription: string | null;
  /** Label of the transaction redo() would re-apply */
  redoDescription: string | null;
  state: HistoryState;
  /** Open batch nesting depth */
  batchDepth: number;
}

export interface UndoRedoEvents {
  /** Called when a transaction is committed */
  onRecord?: (transaction: Transaction) => void;
  /** Called after a transaction was undone */
  onUndo?: (transaction: Transaction) => void;
  /** Called after a transaction was redone */
  onRedo?: (transaction: Transaction) => void;
  /** Called when state changes */
  onStateChange?: (state: UndoRedoState) => void;
}

export interface UndoRedoConfig {
  /** Maximum number of transactions to keep (default: 100) */
  maxHistory?: number;
}

export interface HistoryEntry {
  id: string;
  description: string;
  timestamp: number;
  actionCount: number;
}

// =============================================================================
// Transaction
// =============================================================================

/** Counter for generating unique IDs */
let transactionIdCounter = 0;

function generateTransactionId(): string {
  return `txn_${++transactionIdCounter}_${Date.now()}`;
}

/**
 * Labelled, ordered group of actions undone and redone as one unit.
 */
export class Transaction {
  readonly id: string;
  readonly description: string;
  readonly timestamp: number;
  private readonly actionList: ModelAction[] = [];

  constructor(description: string) {
    this.id = generateTransactionId();
    this.description = description;
    this.timestamp = Date.now();
  }

  get actions(): ReadonlyArray<ModelAction> {
    return this.actionList;
  }

  get size(): number {
    return this.actionList.length;
  }

  /** Only the manager appends, and only while the transaction is pending. */
  append(action: ModelAction): void {
    this.actionList.push(action);
  }

  apply(): void {
    // Apply in order
    for (const action of this.actionList) {
      action.apply();
    }
  }

  revert(): void {
    // Revert in reverse order
    for (let i = this.actionList.length - 1; i >= 0; i--) {
      this.actionList[i].revert();
    }
  }
}

// =============================================================================
// Undo/Redo Manager
// =============================================================================

export class UndoRedoManager {
  /** Undo stack (most recent at end) */
  private undoStack: Transaction[] = [];

  /** Redo stack (most recent at end) */
  private redoStack: Transaction[] = [];

  private events: UndoRedoEvents = {};

  private config: Required<UndoRedoConfig>;

  private state: HistoryState = 'idle';

  /** Open batch nesting depth */
  private depth: number = 0;

  /** Transaction being recorded by the open batch */
  private pending: Transaction | null = null;

  constructor(config: UndoRedoConfig = {}) {
    this.config = {
      maxHistory: config.maxHistory ?? 100,
    };
  }

  // ===========================================================================
  // Configuration
  // ===========================================================================

  setEventHandlers(events: UndoRedoEvents): void {
    this.events = { ...this.events, ...events };
  }

  setConfig(config: Partial<UndoRedoConfig>): void {
    this.config = { ...this.config, ...config };
    this.trimHistory();
  }

  // ===========================================================================
  // State Queries
  // ===========================================================================

  getState(): UndoRedoState {
    return {
      canUndo: this.undoStack.length > 0,
      canRedo: this.redoStack.length > 0,
      undoCount: this.undoStack.length,
      redoCount: this.redoStack.length,
      undoDescription: this.undoStack.length > 0
        ? this.undoStack[this.undoStack.length - 1].description
        : null,
      redoDescription: this.redoStack.length > 0
        ? this.redoStack[this.redoStack.length - 1].description
        : null,
      state: this.state,
      batchDepth: this.depth,
    };
  }

  canUndo(): boolean {
    return this.undoStack.length > 0;
  }

  canRedo(): boolean {
    return this.redoStack.length > 0;
  }

  isInBatch(): boolean {
    return this.depth > 0;
  }

  /**
   * True while a transaction is being undone or redone.
   * Secondary side effects (recording, fixups) must not run then.
   */
  isReplaying(): boolean {
    return this.state === 'undoing' || this.state === 'redoing';
  }

  // ===========================================================================
  // Recording
  // ===========================================================================

  /**
   * Record an action that has already been applied.
   *
   * @throws HistoryInvariantError during replay
   */
  add(action: ModelAction): void {
    if (this.isReplaying()) {
      throw new HistoryInvariantError(
        `Cannot record '${action.description}' while ${this.state}`
      );
    }

    if (this.pending) {
      this.pending.append(action);
      if (this.redoStack.length > 0) {
        this.redoStack = [];
        this.notifyStateChange();
      }
      return;
    }

    const transaction = new Transaction(action.description);
    transaction.append(action);
    this.commit(transaction);
  }

  /**
   * Begin a batch. All actions recorded until the matching endBatch()
   * are one undo step. Nested batches join the outermost one.
   */
  beginBatch(label: string): void {
    if (this.isReplaying()) {
      throw new HistoryInvariantError(`Cannot begin a batch while ${this.state}`);
    }
    if (this.depth === 0) {
      this.pending = new Transaction(label);
      this.setHistoryState('recording');
    }
    this.depth++;
  }

  /**
   * End a batch. At depth 0 the pending transaction is committed,
   * unless it is empty.
   *
   * @returns The committed transaction, or null if nothing was committed
   * @throws HistoryInvariantError if no batch is open
   */
  endBatch(): Transaction | null {
    if (this.depth === 0) {
      throw new HistoryInvariantError('endBatch() called without a matching beginBatch()');
    }

    this.depth--;
    if (this.depth > 0) return null;

    const transaction = this.pending;
    this.pending = null;
    this.setHistoryState('idle');

    if (!transaction || transaction.size === 0) return null;
    this.commit(transaction);
    return transaction;
  }

  private commit(transaction: Transaction): void {
    this.undoStack.push(transaction);
    this.redoStack = [];
    this.trimHistory();

    this.events.onRecord?.(transaction);
    this.notifyStateChange();
  }

  // ===========================================================================
  // Undo/Redo Operations
  // ===========================================================================

  /**
   * Undo the most recent transaction.
   *
   * @returns The undone transaction, or null if there was nothing to undo
   * @throws HistoryInvariantError while a batch is open
   */
  undo(): Transaction | null {
    this.assertNoOpenBatch('undo');

    const transaction = this.undoStack.pop();
    if (!transaction) return null;

    this.replay('undoing', () => transaction.revert());

    this.redoStack.push(transaction);
    this.events.onUndo?.(transaction);
    this.notifyStateChange();

    return transaction;
  }

  /**
   * Redo the most recently undone transaction.
   *
   * @returns The redone transaction, or null if there was nothing to redo
   * @throws HistoryInvariantError while a batch is open
   */
  redo(): Transaction | null {
    this.assertNoOpenBatch('redo');

    const transaction = this.redoStack.pop();
    if (!transaction) return null;

    this.replay('redoing', () => transaction.apply());

    this.undoStack.push(transaction);
    this.events.onRedo?.(transaction);
    this.notifyStateChange();

    return transaction;
  }

  /**
   * Run a replay step. If it throws, the transaction (already popped) is
   * dropped and the error propagates.
   */
  private replay(state: 'undoing' | 'redoing', run: () => void): void {
    this.setHistoryState(state);
    try {
      run();
    } finally {
      this.setHistoryState('idle');
    }
  }

  private assertNoOpenBatch(operation: string): void {
    if (this.isReplaying()) {
      throw new HistoryInvariantError(`Cannot ${operation} while ${this.state}`);
    }
    if (this.depth > 0) {
      throw new HistoryInvariantError(`Cannot ${operation} while a batch is open`);
    }
  }

  // ===========================================================================
  // History Management
  // ===========================================================================

  /**
   * Get undo history (most recent first).
   */
  getUndoHistory(): HistoryEntry[] {
    return this.undoStack.map(toHistoryEntry).reverse();
  }

  /**
   * Get redo history (most recent first).
   */
  getRedoHistory(): HistoryEntry[] {
    return this.redoStack.map(toHistoryEntry).reverse();
  }

  /**
   * Empty both stacks. Only valid when no batch is open.
   */
  clear(): void {
    this.assertNoOpenBatch('clear');
    this.undoStack = [];
    this.redoStack = [];
    this.notifyStateChange();
  }

  private trimHistory(): void {
    const overflow = this.undoStack.length - this.config.maxHistory;
    if (overflow > 0) {
      this.undoStack.splice(0, overflow);
    }
  }

  // ===========================================================================
  // Internal
  // ===========================================================================

  private setHistoryState(state: HistoryState): void {
    if (this.state === state) return;
    this.state = state;
    this.notifyStateChange();
  }

  private notifyStateChange(): void {
    this.events.onStateChange?.(this.getState());
  }
}

function toHistoryEntry(transaction: Transaction): HistoryEntry {
  return {
    id: transaction.id,
    description: transaction.description,
    timestamp: transaction.timestamp,
    actionCount: transaction.size,
  };
}

// =============================================================================
// Factory Functions
// =============================================================================

export function createUndoRedoManager(config?: UndoRedoConfig): UndoRedoManager {
  return new UndoRedoManager(config);
}
