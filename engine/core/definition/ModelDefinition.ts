/**
 * ModelGraph Engine - JSON Model Definition Schema
 *
 * The external shape a model is loaded from and exported to. Nodes are
 * referenced by name here (`Table[Column]` paths for relationships and
 * perspective members); ids only exist inside a session.
 */

import { z } from 'zod';
import { CROSS_FILTERS, DATA_TYPES, MODEL_PERMISSIONS } from '../types/index.js';

const name = z.string().min(1, 'Name must not be empty');

export const annotationSchema = z.object({
  name,
  value: z.string().default(''),
});

const annotations = z.array(annotationSchema).default([]);

export const columnSchema = z
  .object({
    name,
    type: z.enum(['data', 'calculated']).default('data'),
    dataType: z.enum(DATA_TYPES).default('string'),
    sourceColumn: z.string().optional(),
    expression: z.string().optional(),
    isHidden: z.boolean().default(false),
    description: z.string().default(''),
    annotations,
  })
  .superRefine((column, ctx) => {
    if (column.type === 'data' && column.expression !== undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['expression'],
        message: 'Data columns have no expression',
      });
    }
    if (column.type === 'calculated' && column.sourceColumn !== undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['sourceColumn'],
        message: 'Calculated columns have no source column',
      });
    }
  });

export const measureSchema = z.object({
  name,
  expression: z.string().default(''),
  formatString: z.string().default(''),
  displayFolder: z.string().default(''),
  isHidden: z.boolean().default(false),
  description: z.string().default(''),
  annotations,
});

export const hierarchySchema = z.object({
  name,
  /** Column names of the owning table, top level first */
  levels: z.array(z.string()).default([]),
  isHidden: z.boolean().default(false),
  description: z.string().default(''),
  annotations,
});

export const tableSchema = z.object({
  name,
  isHidden: z.boolean().default(false),
  description: z.string().default(''),
  columns: z.array(columnSchema).default([]),
  measures: z.array(measureSchema).default([]),
  hierarchies: z.array(hierarchySchema).default([]),
  annotations,
});

export const relationshipSchema = z.object({
  name: name.optional(),
  /** `'Table'[Column]` or `Table[Column]` */
  from: z.string(),
  to: z.string(),
  isActive: z.boolean().default(true),
  crossFilter: z.enum(CROSS_FILTERS).default('oneDirection'),
  description: z.string().default(''),
  annotations,
});

export const perspectiveSchema = z.object({
  name,
  /** Paths of tables, columns, measures and hierarchies */
  members: z.array(z.string()).default([]),
  description: z.string().default(''),
  annotations,
});

export const roleSchema = z.object({
  name,
  modelPermission: z.enum(MODEL_PERMISSIONS).default('read'),
  description: z.string().default(''),
  annotations,
});

export const modelDefinitionSchema = z.object({
  name: name.default('Model'),
  description: z.string().default(''),
  culture: z.string().default('en-US'),
  tables: z.array(tableSchema).default([]),
  relationships: z.array(relationshipSchema).default([]),
  perspectives: z.array(perspectiveSchema).default([]),
  roles: z.array(roleSchema).default([]),
  annotations,
});

/** Definition with every default filled in */
export type ModelDefinition = z.output<typeof modelDefinitionSchema>;

/** Definition as written by hand */
export type ModelDefinitionInput = z.input<typeof modelDefinitionSchema>;

export type TableDefinition = z.output<typeof tableSchema>;
export type ColumnDefinition = z.output<typeof columnSchema>;
export type MeasureDefinition = z.output<typeof measureSchema>;
export type HierarchyDefinition = z.output<typeof hierarchySchema>;
export type RelationshipDefinition = z.output<typeof relationshipSchema>;
export type PerspectiveDefinition = z.output<typeof perspectiveSchema>;
export type RoleDefinition = z.output<typeof roleSchema>;
export type AnnotationDefinition = z.output<typeof annotationSchema>;
