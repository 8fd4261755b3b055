/**
 * UndoRedoManager Unit Tests
 *
 * Tests the transactional history including:
 * - State queries
 * - Recording and redo-branch discard
 * - Undo/redo operations and the replay guard
 * - Batch nesting
 * - History trimming
 * - Event system
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { UndoRedoManager, createUndoRedoManager } from './UndoRedoManager.js';
import { CustomAction } from './ModelActions.js';
import { HistoryInvariantError } from '../types/errors.js';

describe('UndoRedoManager', () => {
  let manager: UndoRedoManager;
  let log: string[];
  let counter: { value: number };

  /** Applies `+delta` immediately and returns the recordable action */
  function increment(delta: number, description = `add ${delta}`): CustomAction {
    counter.value += delta;
    return new CustomAction(
      description,
      () => {
        counter.value += delta;
        log.push(`apply ${description}`);
      },
      () => {
        counter.value -= delta;
        log.push(`revert ${description}`);
      }
    );
  }

  beforeEach(() => {
    manager = createUndoRedoManager();
    log = [];
    counter = { value: 0 };
  });

  // ===========================================================================
  // State Queries
  // ===========================================================================

  describe('State Queries', () => {
    it('should return initial state', () => {
      const state = manager.getState();

      expect(state.canUndo).toBe(false);
      expect(state.canRedo).toBe(false);
      expect(state.undoCount).toBe(0);
      expect(state.redoCount).toBe(0);
      expect(state.undoDescription).toBeNull();
      expect(state.redoDescription).toBeNull();
      expect(state.state).toBe('idle');
      expect(state.batchDepth).toBe(0);
    });

    it('should reflect state after recording', () => {
      manager.add(increment(1, 'First'));

      const state = manager.getState();
      expect(state.canUndo).toBe(true);
      expect(state.undoCount).toBe(1);
      expect(state.undoDescription).toBe('First');
    });

    it('should report recording state and depth inside a batch', () => {
      manager.beginBatch('Outer');
      manager.beginBatch('Inner');

      expect(manager.getState().state).toBe('recording');
      expect(manager.getState().batchDepth).toBe(2);
      expect(manager.isInBatch()).toBe(true);
    });
  });

  // ===========================================================================
  // Recording
  // ===========================================================================

  describe('add', () => {
    it('should create a single-action transaction outside a batch', () => {
      manager.add(increment(1));
      manager.add(increment(2));

      expect(manager.getState().undoCount).toBe(2);
    });

    it('should discard the redo stack', () => {
      manager.add(increment(1));
      manager.add(increment(2));
      manager.undo();
      expect(manager.canRedo()).toBe(true);

      manager.add(increment(5));

      expect(manager.canRedo()).toBe(false);
      expect(manager.getState().undoCount).toBe(2);
    });

    it('should refuse to record during replay', () => {
      let inner: unknown = null;
      const action = new CustomAction(
        'reentrant',
        () => {},
        () => {
          try {
            manager.add(increment(1));
          } catch (error) {
            inner = error;
          }
        }
      );
      manager.add(action);

      manager.undo();

      expect(inner).toBeInstanceOf(HistoryInvariantError);
      expect(manager.getState().redoCount).toBe(1);
      expect(manager.getState().undoCount).toBe(0);
    });
  });

  // ===========================================================================
  // Undo/Redo Operations
  // ===========================================================================

  describe('undo/redo', () => {
    it('should be a no-op on empty stacks', () => {
      expect(manager.undo()).toBeNull();
      expect(manager.redo()).toBeNull();
      expect(manager.getState().state).toBe('idle');
    });

    it('should revert and re-apply a transaction', () => {
      manager.add(increment(3));
      expect(counter.value).toBe(3);

      manager.undo();
      expect(counter.value).toBe(0);

      manager.redo();
      expect(counter.value).toBe(3);
    });

    it('should move transactions between stacks', () => {
      manager.add(increment(1, 'A'));
      manager.add(increment(1, 'B'));

      const undone = manager.undo();

      expect(undone?.description).toBe('B');
      expect(manager.getState().undoDescription).toBe('A');
      expect(manager.getState().redoDescription).toBe('B');
    });

    it('should mark the replay state for the duration', () => {
      const seen: string[] = [];
      manager.add(
        new CustomAction(
          'probe',
          () => seen.push(manager.getState().state),
          () => seen.push(manager.getState().state)
        )
      );

      manager.undo();
      manager.redo();

      expect(seen).toEqual(['undoing', 'redoing']);
      expect(manager.isReplaying()).toBe(false);
    });

    it('should throw while a batch is open', () => {
      manager.add(increment(1));
      manager.beginBatch('Open');

      expect(() => manager.undo()).toThrow(HistoryInvariantError);
      expect(() => manager.redo()).toThrow(HistoryInvariantError);
    });

    it('should drop a transaction whose replay fails and return to idle', () => {
      manager.add(
        new CustomAction(
          'broken',
          () => {},
          () => {
            throw new HistoryInvariantError('mismatch');
          }
        )
      );

      expect(() => manager.undo()).toThrow('mismatch');
      expect(manager.getState().state).toBe('idle');
      expect(manager.getState().undoCount).toBe(0);
      expect(manager.getState().redoCount).toBe(0);
    });
  });

  // ===========================================================================
  // Batch Operations
  // ===========================================================================

  describe('Batch Operations', () => {
    it('should group actions into one transaction', () => {
      manager.beginBatch('Batch');
      manager.add(increment(1, 'A'));
      manager.add(increment(2, 'B'));
      manager.add(increment(3, 'C'));
      manager.endBatch();

      expect(manager.getState().undoCount).toBe(1);
      expect(manager.getState().undoDescription).toBe('Batch');
      expect(counter.value).toBe(6);

      manager.undo();

      expect(counter.value).toBe(0);
      expect(log).toEqual(['revert C', 'revert B', 'revert A']);
    });

    it('should redo in original order', () => {
      manager.beginBatch('Batch');
      manager.add(increment(1, 'A'));
      manager.add(increment(2, 'B'));
      manager.endBatch();
      manager.undo();
      log = [];

      manager.redo();

      expect(log).toEqual(['apply A', 'apply B']);
      expect(counter.value).toBe(3);
    });

    it('should commit only at the outermost endBatch', () => {
      manager.beginBatch('Outer');
      manager.add(increment(1));
      manager.beginBatch('Inner');
      manager.add(increment(1));
      manager.endBatch();

      expect(manager.getState().undoCount).toBe(0);

      manager.endBatch();

      expect(manager.getState().undoCount).toBe(1);
      expect(manager.getState().undoDescription).toBe('Outer');
    });

    it('should commit nothing for an empty batch', () => {
      manager.add(increment(1));
      manager.undo();

      manager.beginBatch('Empty');
      manager.endBatch();

      expect(manager.getState().undoCount).toBe(0);
      expect(manager.canRedo()).toBe(true);
    });

    it('should throw on endBatch without beginBatch', () => {
      expect(() => manager.endBatch()).toThrow(HistoryInvariantError);
    });

    it('should clear the redo stack when a batch commits', () => {
      manager.add(increment(1));
      manager.undo();

      manager.beginBatch('New');
      manager.add(increment(2));
      manager.endBatch();

      expect(manager.canRedo()).toBe(false);
    });

    it('should clear the redo stack as soon as a batch records an action', () => {
      manager.add(increment(1));
      manager.undo();

      manager.beginBatch('New');
      expect(manager.canRedo()).toBe(true);

      manager.add(increment(2));
      expect(manager.canRedo()).toBe(false);
      expect(manager.getState().redoCount).toBe(0);

      manager.endBatch();
      expect(manager.getState().undoCount).toBe(1);
    });
  });

  // ===========================================================================
  // History Management
  // ===========================================================================

  describe('History Management', () => {
    it('should list history most recent first', () => {
      manager.add(increment(1, 'A'));
      manager.add(increment(1, 'B'));
      manager.add(increment(1, 'C'));
      manager.undo();

      expect(manager.getUndoHistory().map(e => e.description)).toEqual(['B', 'A']);
      expect(manager.getRedoHistory().map(e => e.description)).toEqual(['C']);
      expect(manager.getUndoHistory()[0].actionCount).toBe(1);
    });

    it('should evict the oldest transaction beyond maxHistory', () => {
      const small = createUndoRedoManager({ maxHistory: 2 });
      small.add(increment(1, 'A'));
      small.add(increment(1, 'B'));
      small.add(increment(1, 'C'));

      expect(small.getUndoHistory().map(e => e.description)).toEqual(['C', 'B']);
    });

    it('should trim when maxHistory is lowered', () => {
      manager.add(increment(1, 'A'));
      manager.add(increment(1, 'B'));

      manager.setConfig({ maxHistory: 1 });

      expect(manager.getUndoHistory().map(e => e.description)).toEqual(['B']);
    });

    it('should clear both stacks', () => {
      manager.add(increment(1));
      manager.add(increment(1));
      manager.undo();

      manager.clear();

      expect(manager.canUndo()).toBe(false);
      expect(manager.canRedo()).toBe(false);
    });
  });

  // ===========================================================================
  // Event System
  // ===========================================================================

  describe('Event System', () => {
    it('should notify record, undo and redo', () => {
      const onRecord = vi.fn();
      const onUndo = vi.fn();
      const onRedo = vi.fn();
      manager.setEventHandlers({ onRecord, onUndo, onRedo });

      manager.add(increment(1, 'A'));
      manager.undo();
      manager.redo();

      expect(onRecord).toHaveBeenCalledTimes(1);
      expect(onRecord.mock.calls[0][0].description).toBe('A');
      expect(onUndo).toHaveBeenCalledTimes(1);
      expect(onRedo).toHaveBeenCalledTimes(1);
    });

    it('should notify state changes', () => {
      const onStateChange = vi.fn();
      manager.setEventHandlers({ onStateChange });

      manager.add(increment(1));

      expect(onStateChange).toHaveBeenCalled();
      const last = onStateChange.mock.calls[onStateChange.mock.calls.length - 1][0];
      expect(last.canUndo).toBe(true);
    });
  });
});
