/**
 * ModelGraph Engine
 *
 * Editing core for semantic data models:
 * - Object graph of tables, columns, measures and relationships
 * - Transactional undo/redo
 * - Formula dependency index
 * - Rename/move fixups that keep formulas pointing at the same objects
 *
 * @example
 * ```typescript
 * import { ModelSession } from '@modelgraph/engine';
 *
 * const session = new ModelSession();
 * const sales = session.addTable({ name: 'Sales' });
 * const total = session.addMeasure(sales, { name: 'Total', expression: '1' });
 * const double = session.addMeasure(sales, { name: 'Double', expression: '[Total] * 2' });
 *
 * session.rename(total, 'Revenue');
 * session.getNode(double); // expression: "[Revenue] * 2"
 *
 * session.undo();
 * session.getNode(double); // expression: "[Total] * 2"
 * ```
 */

export * from './core/index.js';
