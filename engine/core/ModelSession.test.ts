/**
 * ModelSession Tests
 *
 * End-to-end behaviour of the session surface: adds, renames and moves with
 * their formula fixups, cascading removals, batching and undo/redo.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { ModelSession, createModelSession } from './ModelSession.js';
import { createNodeIdFactory, type NodeId } from './model/NodeId.js';
import {
  HistoryInvariantError,
  InvalidMoveError,
  InvalidValueError,
  NameConflictError,
  NodeNotFoundError,
} from './types/errors.js';
import type { ModelNode } from './types/index.js';

describe('ModelSession', () => {
  let session: ModelSession;

  function expressionOf(id: NodeId): string {
    const node: ModelNode = session.getNode(id);
    return node.kind === 'measure' || (node.kind === 'column' && node.columnType === 'calculated')
      ? node.expression
      : '';
  }

  beforeEach(() => {
    session = createModelSession();
  });

  // ===========================================================================
  // Adding Nodes
  // ===========================================================================

  describe('Adding Nodes', () => {
    it('should add nodes under their parents with sequential ids', () => {
      const sales = session.addTable({ name: 'Sales' });
      const amount = session.addDataColumn(sales, { name: 'Amount', dataType: 'decimal' });

      expect(session.getModel().id).toBe('n_1');
      expect(sales).toBe('n_2');
      expect(amount).toBe('n_3');
      expect(session.getNode(amount)).toEqual({
        id: 'n_3',
        kind: 'column',
        columnType: 'data',
        name: 'Amount',
        parent: 'n_2',
        description: '',
        dataType: 'decimal',
        isHidden: false,
        sourceColumn: 'Amount',
      });
      expect(session.getChildren(sales).map(child => child.name)).toEqual(['Amount']);
    });

    it('should pick unique default names', () => {
      const first = session.addTable();
      const second = session.addTable();
      const m1 = session.addMeasure(first);
      const m2 = session.addMeasure(first);
      const m3 = session.addMeasure(second);
      const calc = session.addCalculatedColumn(first);
      const column = session.addDataColumn(first);

      expect(session.getNode(first).name).toBe('New Table');
      expect(session.getNode(second).name).toBe('New Table 1');
      expect(session.getNode(m1).name).toBe('New Measure');
      expect(session.getNode(m2).name).toBe('New Measure 1');
      expect(session.getNode(m3).name).toBe('New Measure 2');
      expect(session.getNode(calc).name).toBe('New Calculated Column');
      expect(session.getNode(column).name).toBe('New Column');
    });

    it('should reject names that collide within a naming scope', () => {
      const sales = session.addTable({ name: 'Sales' });
      const product = session.addTable({ name: 'Product' });
      session.addDataColumn(sales, { name: 'Amount' });
      session.addMeasure(sales, { name: 'Total' });

      expect(() => session.addTable({ name: 'SALES' })).toThrow(NameConflictError);
      expect(() => session.addMeasure(sales, { name: 'amount' })).toThrow(NameConflictError);
      expect(() => session.addDataColumn(sales, { name: 'Total' })).toThrow(NameConflictError);
      expect(() => session.addMeasure(product, { name: 'Total' })).toThrow(NameConflictError);
      expect(() => session.addDataColumn(product, { name: 'Amount' })).not.toThrow();
    });

    it('should reject malformed names', () => {
      expect(() => session.addTable({ name: '  ' })).toThrow(InvalidValueError);
      expect(() => session.addTable({ name: 'Tab\tle' })).toThrow(InvalidValueError);
      expect(() => session.addTable({ name: 'x'.repeat(512) })).toThrow(InvalidValueError);
      expect(() => session.addTable({ name: 'x'.repeat(511) })).not.toThrow();
    });

    it('should reject nodes under the wrong kind of parent', () => {
      const sales = session.addTable({ name: 'Sales' });
      const amount = session.addDataColumn(sales, { name: 'Amount' });

      expect(() => session.addMeasure(amount, { name: 'M' })).toThrow(InvalidMoveError);
      const missing = createNodeIdFactory(98)();
      expect(() => session.addDataColumn(missing, { name: 'X' })).toThrow(NodeNotFoundError);
    });

    it('should validate relationship ends', () => {
      const sales = session.addTable({ name: 'Sales' });
      const customer = session.addTable({ name: 'Customer' });
      const a = session.addDataColumn(sales, { name: 'CustomerKey' });
      const b = session.addDataColumn(sales, { name: 'OrderKey' });
      const c = session.addDataColumn(customer, { name: 'CustomerKey' });
      const total = session.addMeasure(sales, { name: 'Total' });

      expect(() => session.addRelationship(a, b)).toThrow(InvalidValueError);
      expect(() => session.addRelationship(total, c)).toThrow(InvalidValueError);

      const relationship = session.addRelationship(a, c);
      expect(session.getNode(relationship)).toMatchObject({
        name: 'New Relationship',
        fromColumn: a,
        toColumn: c,
        isActive: true,
        crossFilter: 'oneDirection',
      });
    });

    it('should not record rejected adds', () => {
      session.addTable({ name: 'Sales' });
      const before = session.getHistoryState().undoCount;

      expect(() => session.addTable({ name: 'Sales' })).toThrow(NameConflictError);

      expect(session.getHistoryState().undoCount).toBe(before);
    });
  });

  // ===========================================================================
  // Rename
  // ===========================================================================

  describe('Rename', () => {
    let sales: NodeId;

    beforeEach(() => {
      sales = session.addTable({ name: 'Sales' });
    });

    it('should rewrite dependents and undo the rename with its fixups in one step', () => {
      const m1 = session.addMeasure(sales, { name: 'M1', expression: '1' });
      const m2 = session.addMeasure(sales, { name: 'M2', expression: '[M1] + 1' });

      const report = session.rename(m1, 'M1Renamed');

      expect(report).toEqual({ target: m1, phase: 'committed', rewritten: [m2], flagged: [] });
      expect(expressionOf(m2)).toBe('[M1Renamed] + 1');
      expect(session.getUndoHistory()[0]).toMatchObject({
        description: "Rename measure 'M1' to 'M1Renamed'",
        actionCount: 2,
      });

      expect(session.undo()).toBe(true);

      expect(session.getNode(m1).name).toBe('M1');
      expect(expressionOf(m2)).toBe('[M1] + 1');
      expect(session.getDependents(m1)).toEqual([m2]);
    });

    it('should redo the rename and its fixups', () => {
      const m1 = session.addMeasure(sales, { name: 'M1', expression: '1' });
      const m2 = session.addMeasure(sales, { name: 'M2', expression: '[M1] + 1' });
      session.rename(m1, 'Base');
      session.undo();

      expect(session.redo()).toBe(true);

      expect(session.getNode(m1).name).toBe('Base');
      expect(expressionOf(m2)).toBe('[Base] + 1');
      expect(session.getDependents(m1)).toEqual([m2]);
    });

    it('should reject a conflicting name without changing anything', () => {
      const m1 = session.addMeasure(sales, { name: 'M1', expression: '1' });
      session.addMeasure(sales, { name: 'M2', expression: '[M1]' });
      const depth = session.getHistoryState().undoCount;

      expect(() => session.rename(m1, 'm2')).toThrow(NameConflictError);

      expect(session.getNode(m1).name).toBe('M1');
      expect(session.getHistoryState().undoCount).toBe(depth);
      expect(session.getHistoryState().batchDepth).toBe(0);
    });

    it('should leave references inside string literals alone', () => {
      const m1 = session.addMeasure(sales, { name: 'M1', expression: '1' });
      const m2 = session.addMeasure(sales, { name: 'M2', expression: '"[M1]" + [M1]' });

      session.rename(m1, 'Base');

      expect(expressionOf(m2)).toBe('"[M1]" + [Base]');
    });

    it('should rewrite qualified references when a table is renamed', () => {
      const amount = session.addDataColumn(sales, { name: 'Amount' });
      const product = session.addTable({ name: 'Product' });
      const total = session.addMeasure(product, { name: 'Total', expression: 'SUM(Sales[Amount])' });
      const rows = session.addMeasure(product, { name: 'Rows', expression: "COUNTROWS('Sales')" });

      const report = session.rename(sales, 'Revenue');

      expect(report.rewritten).toEqual([total, rows]);
      expect(expressionOf(total)).toBe("SUM('Revenue'[Amount])");
      expect(expressionOf(rows)).toBe("COUNTROWS('Revenue')");
      expect(session.getDependents(amount)).toEqual([total]);
    });

    it('should rewrite only the bracket of qualified references when a column is renamed', () => {
      const amount = session.addDataColumn(sales, { name: 'Amount' });
      const total = session.addMeasure(sales, {
        name: 'Total',
        expression: "SUM(Sales[Amount]) + SUM('Sales'[Amount]) + [Amount]",
      });

      session.rename(amount, 'Net');

      expect(expressionOf(total)).toBe("SUM(Sales[Net]) + SUM('Sales'[Net]) + [Net]");
      expect(session.getPrecedents(total)).toEqual([sales, amount]);
    });

    it('should qualify a rewritten reference that would otherwise bind to another node', () => {
      const qty = session.addDataColumn(sales, { name: 'Qty' });
      const product = session.addTable({ name: 'Product' });
      const m1 = session.addMeasure(product, { name: 'M1', expression: '1' });
      const calc = session.addCalculatedColumn(sales, { name: 'CC', expression: '[M1] * 2' });

      const report = session.rename(m1, 'Qty');

      expect(report.rewritten).toEqual([calc]);
      expect(expressionOf(calc)).toBe("'Product'[Qty] * 2");
      expect(session.getPrecedents(calc)).toEqual([product, m1]);
      expect(session.getDependents(qty)).toEqual([]);

      session.undo();

      expect(expressionOf(calc)).toBe('[M1] * 2');
      expect(session.getPrecedents(calc)).toEqual([m1]);
    });

    it('should leave variables alone when a table with the same name is renamed', () => {
      const totals = session.addTable({ name: 'Total' });
      const amount = session.addDataColumn(sales, { name: 'Amount' });
      const measure = session.addMeasure(sales, {
        name: 'M',
        expression: 'VAR Total = SUM(Sales[Amount]) RETURN Total * 2',
      });

      const report = session.rename(totals, 'Grand Total');

      expect(report.rewritten).toEqual([]);
      expect(expressionOf(measure)).toBe('VAR Total = SUM(Sales[Amount]) RETURN Total * 2');
      expect(session.getDependents(totals)).toEqual([]);
      expect(session.getPrecedents(measure)).toEqual([sales, amount]);
    });

    it('should rewrite dependents in reference order', () => {
      const base = session.addMeasure(sales, { name: 'Base', expression: '1' });
      const top = session.addMeasure(sales, { name: 'Top', expression: '[Mid] + [Base]' });
      const mid = session.addMeasure(sales, { name: 'Mid', expression: '[Base] * 2' });

      const report = session.rename(base, 'Root');

      expect(report.rewritten).toEqual([mid, top]);
    });

    it('should bind references that become resolvable', () => {
      const report = session.addMeasure(sales, { name: 'Report', expression: '[Revenue] * 2' });
      const total = session.addMeasure(sales, { name: 'Total', expression: '1' });

      session.rename(total, 'Revenue');

      expect(session.getDependents(total)).toEqual([report]);
      expect(expressionOf(report)).toBe('[Revenue] * 2');
    });

    it('should flag unparseable expressions that mention the old name', () => {
      const m1 = session.addMeasure(sales, { name: 'M1', expression: '1' });
      const broken = session.addMeasure(sales, { name: 'Broken', expression: '[M1] + "open' });

      const report = session.rename(m1, 'Base');

      expect(report.flagged).toEqual([broken]);
      expect(expressionOf(broken)).toBe('[M1] + "open');
      expect(session.getDiagnostics()).toEqual([
        {
          node: broken,
          kind: 'fixup',
          message: 'Expression could not be parsed; references to [M1] were not updated',
        },
        { node: broken, kind: 'parse', message: 'Unterminated string literal at offset 7' },
      ]);
    });

    it('should withdraw fixup flags when the rename is undone', () => {
      const m1 = session.addMeasure(sales, { name: 'M1', expression: '1' });
      const broken = session.addMeasure(sales, { name: 'Broken', expression: '[M1] + "open' });
      const parseDiagnostic = { node: broken, kind: 'parse', message: 'Unterminated string literal at offset 7' };

      session.rename(m1, 'Base');
      session.undo();

      expect(session.getDiagnostics()).toEqual([parseDiagnostic]);

      session.redo();

      expect(session.getDiagnostics()).toEqual([
        {
          node: broken,
          kind: 'fixup',
          message: 'Expression could not be parsed; references to [M1] were not updated',
        },
        parseDiagnostic,
      ]);
    });

    it('should not record a rename to the current name', () => {
      const depth = session.getHistoryState().undoCount;

      const report = session.rename(sales, 'Sales');

      expect(report.rewritten).toEqual([]);
      expect(session.getHistoryState().undoCount).toBe(depth);
    });

    it('should rename nodes that formulas cannot reference', () => {
      const role = session.addRole({ name: 'Reader' });

      const report = session.rename(role, 'Viewer');

      expect(report).toEqual({ target: role, phase: 'committed', rewritten: [], flagged: [] });
      expect(session.findByPath('role:viewer')).toBe(role);
    });

    it('should notify fixup listeners', () => {
      const m1 = session.addMeasure(sales, { name: 'M1', expression: '1' });
      const reports: NodeId[][] = [];
      session.setEventHandlers({ onFixup: report => reports.push(report.rewritten) });

      session.addMeasure(sales, { name: 'M2', expression: '[M1]' });
      session.rename(m1, 'Base');

      expect(reports).toEqual([['n_4']]);
    });
  });

  // ===========================================================================
  // Move
  // ===========================================================================

  describe('Move', () => {
    let sales: NodeId;
    let product: NodeId;

    beforeEach(() => {
      sales = session.addTable({ name: 'Sales' });
      product = session.addTable({ name: 'Product' });
    });

    it('should rewrite qualified references to a moved measure', () => {
      const total = session.addMeasure(sales, { name: 'Total', expression: '1' });
      const report = session.addMeasure(product, { name: 'Report', expression: 'Sales[Total] + [Total]' });

      const result = session.move(total, product);

      expect(result.rewritten).toEqual([report]);
      expect(session.getNode(total).parent).toBe(product);
      expect(expressionOf(report)).toBe("'Product'[Total] + [Total]");

      session.undo();

      expect(session.getNode(total).parent).toBe(sales);
      expect(expressionOf(report)).toBe('Sales[Total] + [Total]');
      expect(session.getDependents(total)).toEqual([report]);
    });

    it('should move annotations between nodes', () => {
      const note = session.addAnnotation(sales, { name: 'Owner', value: 'finance' });

      session.move(note, product);

      expect(session.getPath(note)).toBe("'Product'@Owner");
    });

    it('should reject moves of other kinds', () => {
      const amount = session.addDataColumn(sales, { name: 'Amount' });
      const total = session.addMeasure(sales, { name: 'Total' });
      const role = session.addRole({ name: 'Reader' });

      expect(() => session.move(amount, product)).toThrow(InvalidMoveError);
      expect(() => session.move(total, role)).toThrow(InvalidMoveError);
      expect(() => session.move(sales, product)).toThrow(InvalidMoveError);
    });

    it('should reject a move into a table with a member of the same name', () => {
      const total = session.addMeasure(sales, { name: 'Total' });
      session.addDataColumn(product, { name: 'Total' });
      const depth = session.getHistoryState().undoCount;

      expect(() => session.move(total, product)).toThrow(NameConflictError);
      expect(session.getNode(total).parent).toBe(sales);
      expect(session.getHistoryState().undoCount).toBe(depth);
    });

    it('should route parent writes to move', () => {
      const total = session.addMeasure(sales, { name: 'Total' });

      const report = session.setProperty(total, 'parent', product);

      expect(report?.target).toBe(total);
      expect(session.getPath(total)).toBe("'Product'[Total]");
    });
  });

  // ===========================================================================
  // Property Writes
  // ===========================================================================

  describe('Property Writes', () => {
    let sales: NodeId;

    beforeEach(() => {
      sales = session.addTable({ name: 'Sales' });
    });

    it('should set and undo expressions', () => {
      const total = session.addMeasure(sales, { name: 'Total', expression: '1' });

      expect(session.setExpression(total, '2')).toBe(true);
      expect(session.setExpression(total, '2')).toBe(false);
      expect(expressionOf(total)).toBe('2');

      session.undo();
      expect(expressionOf(total)).toBe('1');
    });

    it('should reject expressions on nodes without one', () => {
      const amount = session.addDataColumn(sales, { name: 'Amount' });

      expect(() => session.setExpression(amount, '1')).toThrow(InvalidValueError);
      expect(() => session.setExpression(sales, '1')).toThrow(InvalidValueError);
    });

    it('should validate generic property writes', () => {
      const amount = session.addDataColumn(sales, { name: 'Amount' });

      expect(session.setProperty(amount, 'dataType', 'decimal')).toBeNull();
      expect(session.getProperty(amount, 'dataType')).toBe('decimal');

      expect(() => session.setProperty(amount, 'dataType', 'money')).toThrow(InvalidValueError);
      expect(() => session.setProperty(amount, 'isHidden', 'yes')).toThrow(InvalidValueError);
      expect(() => session.setProperty(amount, 'formatString', '0')).toThrow(InvalidValueError);
      expect(() => session.setProperty(amount, 'color', 'red')).toThrow(InvalidValueError);
    });

    it('should route name writes to rename', () => {
      const m1 = session.addMeasure(sales, { name: 'M1', expression: '1' });
      const m2 = session.addMeasure(sales, { name: 'M2', expression: '[M1]' });

      const report = session.setProperty(m1, 'name', 'Base');

      expect(report?.rewritten).toEqual([m2]);
      expect(expressionOf(m2)).toBe('[Base]');
    });

    it('should not record unchanged values', () => {
      const depth = session.getHistoryState().undoCount;

      session.setProperty(sales, 'isHidden', false);

      expect(session.getHistoryState().undoCount).toBe(depth);
    });

    it('should validate hierarchy levels against the owning table', () => {
      const customer = session.addTable({ name: 'Customer' });
      const country = session.addDataColumn(customer, { name: 'Country' });
      const amount = session.addDataColumn(sales, { name: 'Amount' });
      const geo = session.addHierarchy(customer, { name: 'Geography' });

      session.setProperty(geo, 'levels', [country]);

      expect(session.getProperty(geo, 'levels')).toEqual([country]);
      expect(() => session.setProperty(geo, 'levels', [amount])).toThrow(InvalidValueError);
      expect(() => session.setProperty(geo, 'levels', [country, country])).toThrow(InvalidValueError);
    });
  });

  // ===========================================================================
  // Removal
  // ===========================================================================

  describe('Removal', () => {
    let sales: NodeId;
    let customer: NodeId;
    let salesKey: NodeId;
    let customerKey: NodeId;

    beforeEach(() => {
      sales = session.addTable({ name: 'Sales' });
      customer = session.addTable({ name: 'Customer' });
      salesKey = session.addDataColumn(sales, { name: 'CustomerKey' });
      customerKey = session.addDataColumn(customer, { name: 'CustomerKey' });
    });

    it('should remove relationships on a removed column in the same transaction', () => {
      const relationship = session.addRelationship(salesKey, customerKey, { name: 'Sales to Customer' });
      const depth = session.getHistoryState().undoCount;
      const before = session.snapshot();

      session.removeNode(salesKey);

      expect(session.hasNode(salesKey)).toBe(false);
      expect(session.hasNode(relationship)).toBe(false);
      expect(session.getHistoryState().undoCount).toBe(depth + 1);

      session.undo();

      expect(session.snapshot()).toEqual(before);
      expect(session.getHistoryState().undoCount).toBe(depth);
    });

    it('should drop hierarchy levels and perspective members that point at removed nodes', () => {
      const country = session.addDataColumn(customer, { name: 'Country' });
      const city = session.addDataColumn(customer, { name: 'City' });
      const geo = session.addHierarchy(customer, { name: 'Geography', levels: [country, city] });
      const view = session.addPerspective({ name: 'View', members: [sales, city] });

      session.removeNode(city);

      expect(session.getProperty(geo, 'levels')).toEqual([country]);
      expect(session.getProperty(view, 'members')).toEqual([sales]);

      session.undo();

      expect(session.getProperty(geo, 'levels')).toEqual([country, city]);
      expect(session.getProperty(view, 'members')).toEqual([sales, city]);
    });

    it('should unbind and rebind references when a table is removed and restored', () => {
      const total = session.addMeasure(sales, { name: 'Total', expression: '1' });
      const report = session.addMeasure(customer, { name: 'Report', expression: '[Total]' });

      session.removeNode(sales);
      expect(session.getDependents(total)).toEqual([]);

      session.undo();
      expect(session.getDependents(total)).toEqual([report]);
    });

    it('should refuse to remove the model root', () => {
      expect(() => session.removeNode(session.getModel().id)).toThrow(InvalidMoveError);
    });
  });

  // ===========================================================================
  // Paths
  // ===========================================================================

  describe('Paths', () => {
    it('should format and resolve paths', () => {
      const sales = session.addTable({ name: "Bob's Sales" });
      const amount = session.addDataColumn(sales, { name: 'Amount' });
      const geo = session.addHierarchy(sales, { name: 'Geo' });
      const total = session.addMeasure(sales, { name: 'Total' });
      const role = session.addRole({ name: 'Reader' });
      const note = session.addAnnotation(total, { name: 'Owner' });

      expect(session.getPath(sales)).toBe("'Bob''s Sales'");
      expect(session.getPath(amount)).toBe("'Bob''s Sales'[Amount]");
      expect(session.getPath(role)).toBe('role:Reader');
      expect(session.getPath(note)).toBe("'Bob''s Sales'[Total]@Owner");

      expect(session.findByPath("'bob''s sales'")).toBe(sales);
      expect(session.findByPath("'Bob''s Sales'[AMOUNT]")).toBe(amount);
      expect(session.findByPath("'Bob''s Sales'[Geo]")).toBe(geo);
      expect(session.findByPath('[total]')).toBe(total);
      expect(session.findByPath('role:Reader')).toBe(role);
    });

    it('should return undefined for paths that name nothing', () => {
      session.addTable({ name: 'Sales' });

      expect(session.findByPath('Nope')).toBeUndefined();
      expect(session.findByPath('Sales[Nope]')).toBeUndefined();
      expect(session.findByPath('[Nope]')).toBeUndefined();
      expect(session.findByPath('perspective:Nope')).toBeUndefined();
      expect(session.findByPath("'unterminated")).toBeUndefined();
    });
  });

  // ===========================================================================
  // History Properties
  // ===========================================================================

  describe('History Properties', () => {
    let sales: NodeId;
    let amount: NodeId;
    let total: NodeId;

    beforeEach(() => {
      sales = session.addTable({ name: 'Sales' });
      amount = session.addDataColumn(sales, { name: 'Amount' });
      total = session.addMeasure(sales, { name: 'Total', expression: 'SUM(Sales[Amount])' });
      session.addMeasure(sales, { name: 'Double', expression: '[Total] * 2' });
    });

    it('should restore the exact state after each edit is undone', () => {
      const edits: Array<() => void> = [
        () => session.rename(total, 'Revenue'),
        () => session.rename(sales, 'Orders'),
        () => session.rename(amount, 'Net'),
        () => session.setExpression(total, '42'),
        () => session.setProperty(amount, 'isHidden', true),
        () => session.addMeasure(sales, { name: 'Extra', expression: '[Total]' }),
        () => session.removeNode(amount),
        () => session.removeNode(sales),
        () => session.move(total, session.addTable({ name: 'Other' })),
      ];

      for (const edit of edits) {
        const before = session.snapshot();
        session.batch('Edit', edit);
        session.undo();
        expect(session.snapshot()).toEqual(before);
      }
    });

    it('should restore the post-edit state on redo', () => {
      session.rename(total, 'Revenue');
      const after = session.snapshot();

      session.undo();
      session.redo();

      expect(session.snapshot()).toEqual(after);
    });

    it('should record K edits in one batch as one entry', () => {
      const depth = session.getHistoryState().undoCount;
      const before = session.snapshot();

      session.beginBatch('Bulk');
      session.addMeasure(sales, { name: 'A' });
      session.addMeasure(sales, { name: 'B' });
      session.setExpression(total, '1');
      session.endBatch();

      expect(session.getHistoryState().undoCount).toBe(depth + 1);
      expect(session.getUndoHistory()[0]).toMatchObject({ description: 'Bulk', actionCount: 3 });

      session.undo();
      expect(session.snapshot()).toEqual(before);
    });

    it('should discard the redo stack on a new edit', () => {
      session.setExpression(total, '1');
      session.undo();
      expect(session.canRedo()).toBe(true);

      session.addMeasure(sales, { name: 'Fresh' });

      expect(session.canRedo()).toBe(false);
    });

    it('should treat undo and redo on empty stacks as no-ops', () => {
      session.clearHistory();

      expect(session.undo()).toBe(false);
      expect(session.redo()).toBe(false);
    });

    it('should refuse undo while a batch is open', () => {
      session.beginBatch('Open');

      expect(() => session.undo()).toThrow(HistoryInvariantError);

      session.endBatch();
    });

    it('should roll back an atomic block that throws', () => {
      const depth = session.getHistoryState().undoCount;

      expect(() =>
        session.atomically('Failing', () => {
          session.addMeasure(sales, { name: 'Partial' });
          session.rename(total, 'Double');
        })
      ).toThrow(NameConflictError);

      expect(session.findByPath('[Partial]')).toBeUndefined();
      expect(session.getHistoryState().undoCount).toBe(depth);
    });

    it('should keep partial edits of a failing batch', () => {
      expect(() =>
        session.batch('Failing', () => {
          session.addMeasure(sales, { name: 'Partial' });
          throw new Error('stop');
        })
      ).toThrow('stop');

      expect(session.findByPath('[Partial]')).toBeDefined();
      expect(session.getUndoHistory()[0].description).toBe('Failing');
    });

    it('should keep the undo depth within maxHistory', () => {
      const small = createModelSession({ maxHistory: 2 });
      small.addTable({ name: 'A' });
      small.addTable({ name: 'B' });
      small.addTable({ name: 'C' });

      expect(small.getHistoryState().undoCount).toBe(2);
    });
  });

  // ===========================================================================
  // Events & Replay Guard
  // ===========================================================================

  describe('Events', () => {
    it('should report changes with a replay flag', () => {
      const flags: boolean[] = [];
      session.setEventHandlers({ onChange: (_change, replay) => flags.push(replay) });

      session.addTable({ name: 'Sales' });
      session.undo();
      session.redo();

      expect(flags).toEqual([false, true, true]);
    });

    it('should refuse mutations from listeners during replay', () => {
      let caught: unknown;
      session.addTable({ name: 'Sales' });
      session.setEventHandlers({
        onChange: (_change, replay) => {
          if (!replay) return;
          try {
            session.addTable({ name: 'Sneaky' });
          } catch (error) {
            caught = error;
          }
        },
      });

      session.undo();

      expect(caught).toBeInstanceOf(HistoryInvariantError);
      expect(session.findByPath('Sneaky')).toBeUndefined();
    });

    it('should report history state changes', () => {
      const counts: number[] = [];
      session.setEventHandlers({ onHistoryChange: state => counts.push(state.undoCount) });

      session.addTable({ name: 'Sales' });
      session.undo();

      // undo also reports entering and leaving the undoing state
      expect(counts).toEqual([1, 0, 0, 0]);
    });
  });

  // ===========================================================================
  // Lifecycle & Statistics
  // ===========================================================================

  describe('Lifecycle', () => {
    it('should reset to an empty model without history', () => {
      const sales = session.addTable({ name: 'Sales' });
      session.addMeasure(sales, { name: 'Total', expression: '1' });

      session.reset('Fresh');

      expect(session.getModel().name).toBe('Fresh');
      expect(session.snapshot().nodes).toHaveLength(1);
      expect(session.canUndo()).toBe(false);
      expect(session.getStats().index.expressions).toBe(0);
    });

    it('should report statistics', () => {
      const sales = session.addTable({ name: 'Sales' });
      session.addMeasure(sales, { name: 'Total', expression: '[Missing]' });

      const stats = session.getStats();

      expect(stats.graph.nodeCount).toBe(3);
      expect(stats.graph.byKind.measure).toBe(1);
      expect(stats.index).toEqual({
        expressions: 1,
        edges: 0,
        unresolved: 1,
        parseErrors: 0,
        fixupFailures: 0,
      });
      expect(stats.history.undoCount).toBe(2);
    });
  });
});
