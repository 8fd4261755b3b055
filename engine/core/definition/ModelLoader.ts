/**
 * ModelGraph Engine - Model Definition Loader
 *
 * Validates a JSON model definition and replays it into a session through the
 * normal mutation surface. A load starts the session over: the model is reset
 * first and the history is cleared afterwards, so a load cannot be undone.
 */

import { readFileSync } from 'node:fs';
import { ZodError } from 'zod';
import type { ModelSession } from '../ModelSession.js';
import type { NodeId } from '../model/NodeId.js';
import { ModelDefinitionError, isModelError } from '../types/errors.js';
import { qualifiedName, quoteTableName } from '../formula/ReferenceText.js';
import {
  modelDefinitionSchema,
  type AnnotationDefinition,
  type ModelDefinition,
} from './ModelDefinition.js';

/**
 * @throws ModelDefinitionError listing every schema issue
 */
export function parseModelDefinition(input: unknown): ModelDefinition {
  try {
    return modelDefinitionSchema.parse(input);
  } catch (error) {
    if (error instanceof ZodError) {
      throw new ModelDefinitionError(
        error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      );
    }
    throw error;
  }
}

/**
 * Read and parse a JSON file. Schema validation happens in
 * loadModelDefinition().
 *
 * @throws ModelDefinitionError if the file is not valid JSON
 */
export function readModelDefinitionFile(path: string): unknown {
  const text = readFileSync(path, 'utf-8');
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ModelDefinitionError([`${path}: ${reason}`]);
  }
}

/**
 * Replace the session's model with a definition.
 * On failure the session is left with an empty model.
 *
 * @throws ModelDefinitionError
 */
export function loadModelDefinition(session: ModelSession, input: unknown): ModelDefinition {
  const definition = parseModelDefinition(input);

  session.reset(definition.name);
  try {
    session.batch('Load model', () => applyDefinition(session, definition));
  } catch (error) {
    session.reset(definition.name);
    if (error instanceof ModelDefinitionError) throw error;
    if (isModelError(error)) throw new ModelDefinitionError([error.message]);
    throw error;
  }
  session.clearHistory();

  return definition;
}

function applyDefinition(session: ModelSession, definition: ModelDefinition): void {
  const model = session.getModel();
  session.setProperty(model.id, 'description', definition.description);
  session.setProperty(model.id, 'culture', definition.culture);
  addAnnotations(session, model.id, definition.annotations);

  // Tables first so every expression can resolve once all names exist
  for (const table of definition.tables) {
    const tableId = session.addTable({
      name: table.name,
      description: table.description,
      isHidden: table.isHidden,
    });

    for (const column of table.columns) {
      const common = {
        name: column.name,
        description: column.description,
        dataType: column.dataType,
        isHidden: column.isHidden,
      };
      const columnId = column.type === 'calculated'
        ? session.addCalculatedColumn(tableId, { ...common, expression: column.expression ?? '' })
        : session.addDataColumn(tableId, { ...common, sourceColumn: column.sourceColumn });
      addAnnotations(session, columnId, column.annotations);
    }

    for (const measure of table.measures) {
      const measureId = session.addMeasure(tableId, {
        name: measure.name,
        description: measure.description,
        expression: measure.expression,
        formatString: measure.formatString,
        displayFolder: measure.displayFolder,
        isHidden: measure.isHidden,
      });
      addAnnotations(session, measureId, measure.annotations);
    }

    addAnnotations(session, tableId, table.annotations);
  }

  definition.tables.forEach((table, tableIndex) => {
    const tableId = requirePath(session, quoteTableName(table.name), `tables.${tableIndex}`);
    table.hierarchies.forEach((hierarchy, index) => {
      const levels = hierarchy.levels.map(level =>
        requirePath(session, qualifiedName(table.name, level), `tables.${tableIndex}.hierarchies.${index}.levels`)
      );
      const hierarchyId = session.addHierarchy(tableId, {
        name: hierarchy.name,
        description: hierarchy.description,
        isHidden: hierarchy.isHidden,
        levels,
      });
      addAnnotations(session, hierarchyId, hierarchy.annotations);
    });
  });

  definition.relationships.forEach((relationship, index) => {
    const from = requirePath(session, relationship.from, `relationships.${index}.from`);
    const to = requirePath(session, relationship.to, `relationships.${index}.to`);
    const relationshipId = session.addRelationship(from, to, {
      name: relationship.name,
      description: relationship.description,
      isActive: relationship.isActive,
      crossFilter: relationship.crossFilter,
    });
    addAnnotations(session, relationshipId, relationship.annotations);
  });

  definition.perspectives.forEach((perspective, index) => {
    const members = perspective.members.map(member =>
      requirePath(session, member, `perspectives.${index}.members`)
    );
    const perspectiveId = session.addPerspective({
      name: perspective.name,
      description: perspective.description,
      members,
    });
    addAnnotations(session, perspectiveId, perspective.annotations);
  });

  for (const role of definition.roles) {
    const roleId = session.addRole({
      name: role.name,
      description: role.description,
      modelPermission: role.modelPermission,
    });
    addAnnotations(session, roleId, role.annotations);
  }
}

function addAnnotations(
  session: ModelSession,
  parent: NodeId,
  annotations: readonly AnnotationDefinition[]
): void {
  for (const annotation of annotations) {
    session.addAnnotation(parent, { name: annotation.name, value: annotation.value });
  }
}

function requirePath(session: ModelSession, path: string, location: string): NodeId {
  const id = session.findByPath(path);
  if (id === undefined) {
    throw new ModelDefinitionError([`${location}: '${path}' does not name a node`]);
  }
  return id;
}
