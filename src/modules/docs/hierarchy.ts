import { randomUUID } from 'node:crypto';
import type { z } from 'zod';
import { BackendUnavailableError, NotFoundError, ValidationError, VersionConflictError, isBackendUnavailable } from '../../errors.js';
import {
  docCategorySchema,
  docStepSchema,
  docSubcategorySchema,
  docSubsubcategorySchema,
  type DocCategory,
  type DocLevel,
  type DocStep,
  type DocSubcategory,
  type DocSubsubcategory,
} from '../../domain/entities.js';
import type { RelationalStore } from '../../stores/types.js';
import type { HealthMonitor } from '../health/monitor.js';
import type { ConsistencyPropagator } from '../propagation/propagator.js';
import { logger } from '../../utils/logger.js';
import { parseInput } from '../../utils/validation.js';
import { DOC_PATCH_SCHEMAS, type DocLevelName } from './schemas.js';

const log = logger.child({ module: 'docs' });

export type DocNode = DocCategory | DocSubcategory | DocSubsubcategory | DocStep;

interface LevelSpec {
  entityType: DocLevel;
  parent: { column: string; level: DocLevelName } | null;
  child: { column: string; level: DocLevelName } | null;
  orderColumn: 'name' | 'title';
  editable: readonly string[];
  patch: z.ZodType<Record<string, unknown>>;
  parse: (row: unknown) => DocNode;
}

const LEVELS: Record<DocLevelName, LevelSpec> = {
  categories: {
    entityType: 'doc_category',
    parent: null,
    child: { column: 'category_id', level: 'subcategories' },
    orderColumn: 'name',
    editable: ['name'],
    patch: DOC_PATCH_SCHEMAS.categories,
    parse: (row) => docCategorySchema.parse(row),
  },
  subcategories: {
    entityType: 'doc_subcategory',
    parent: { column: 'category_id', level: 'categories' },
    child: { column: 'subcategory_id', level: 'subsubcategories' },
    orderColumn: 'name',
    editable: ['name'],
    patch: DOC_PATCH_SCHEMAS.subcategories,
    parse: (row) => docSubcategorySchema.parse(row),
  },
  subsubcategories: {
    entityType: 'doc_subsubcategory',
    parent: { column: 'subcategory_id', level: 'subcategories' },
    child: { column: 'subsubcategory_id', level: 'steps' },
    orderColumn: 'name',
    editable: ['name'],
    patch: DOC_PATCH_SCHEMAS.subsubcategories,
    parse: (row) => docSubsubcategorySchema.parse(row),
  },
  steps: {
    entityType: 'document',
    parent: { column: 'subsubcategory_id', level: 'subsubcategories' },
    child: null,
    orderColumn: 'title',
    editable: ['title', 'description', 'solution', 'image_path', 'status'],
    patch: DOC_PATCH_SCHEMAS.steps,
    parse: (row) => docStepSchema.parse(row),
  },
};

/**
 * Four-level troubleshooting tree: category → subcategory → subsubcategory
 * → step. Steps are the searchable documents.
 */
export class DocsHierarchy {
  constructor(
    private readonly relational: RelationalStore,
    private readonly propagator: ConsistencyPropagator,
    private readonly monitor: HealthMonitor
  ) {}

  async create(level: DocLevelName, input: Record<string, unknown>): Promise<DocNode> {
    this.ensureWritable();
    const spec = LEVELS[level];

    if (spec.parent) {
      const parentId = input[spec.parent.column];
      if (typeof parentId !== 'string') {
        throw new ValidationError(`Missing ${spec.parent.column}`, { [spec.parent.column]: ['Required'] });
      }
      await this.get(spec.parent.level, parentId);
    }

    const row = await this.propagator.commit(spec.entityType, { ...input, id: randomUUID() }, 0);
    log.info({ level, id: row.id }, 'Document node created');
    return spec.parse(row);
  }

  async get(level: DocLevelName, id: string): Promise<DocNode> {
    const spec = LEVELS[level];
    const row = await this.guarded(() => this.relational.read(spec.entityType, id));
    if (!row || row.deleted_at !== null) {
      throw new NotFoundError(spec.entityType, id);
    }
    return spec.parse(row);
  }

  /** Children of `parentId`, or every category when listing the top level. */
  async list(level: DocLevelName, parentId: string | null): Promise<DocNode[]> {
    const spec = LEVELS[level];
    const eq: Record<string, string> = {};

    if (spec.parent) {
      if (!parentId) throw new ValidationError(`Missing ${spec.parent.column}`);
      await this.get(spec.parent.level, parentId);
      eq[spec.parent.column] = parentId;
    }

    return this.guarded(async () => {
      const nodes: DocNode[] = [];
      for await (const row of this.relational.query(spec.entityType, {
        eq,
        orderBy: { column: spec.orderColumn, ascending: true },
      })) {
        nodes.push(spec.parse(row));
      }
      return nodes;
    });
  }

  /** Renames or edits a node. The parent reference is fixed at creation. */
  async update(
    level: DocLevelName,
    id: string,
    changes: Record<string, unknown>,
    expectedVersion?: number
  ): Promise<DocNode> {
    this.ensureWritable();
    const spec = LEVELS[level];

    const rejected = Object.keys(changes).filter((key) => !spec.editable.includes(key));
    if (rejected.length) {
      throw new ValidationError(
        `Cannot change ${rejected.join(', ')}`,
        Object.fromEntries(rejected.map((key) => [key, ['Not editable']]))
      );
    }

    const fields = parseInput(spec.patch, changes);

    const current = await this.get(level, id);
    if (expectedVersion !== undefined && expectedVersion !== current.version) {
      throw new VersionConflictError(spec.entityType, id, expectedVersion);
    }
    if (Object.keys(fields).length === 0) return current;

    const row = await this.propagator.commit(spec.entityType, { ...fields, id }, current.version);
    return spec.parse(row);
  }

  /**
   * Soft-deletes the node, which takes everything beneath it out of reach,
   * then clears the descendants. Returns how many nodes were removed.
   */
  async remove(level: DocLevelName, id: string, expectedVersion?: number): Promise<number> {
    this.ensureWritable();
    const spec = LEVELS[level];
    const current = await this.get(level, id);
    if (expectedVersion !== undefined && expectedVersion !== current.version) {
      throw new VersionConflictError(spec.entityType, id, expectedVersion);
    }

    await this.propagator.remove(spec.entityType, id, current.version);
    const descendants = await this.removeDescendants(level, id);
    log.info({ level, id, descendants }, 'Document node removed');
    return descendants + 1;
  }

  /** Best-effort; a failed child stays behind as an unreachable row. */
  private async removeDescendants(level: DocLevelName, id: string): Promise<number> {
    const { child } = LEVELS[level];
    if (!child) return 0;
    const { entityType } = LEVELS[child.level];

    const childIds = await this.ids(entityType, child.column, id).catch((error: unknown) => {
      log.warn({ err: error, level: child.level, parentId: id }, 'Could not list descendants');
      return [];
    });

    let removed = 0;
    for (const childId of childIds) {
      try {
        const node = await this.get(child.level, childId);
        await this.propagator.remove(entityType, childId, node.version);
        removed += 1;
      } catch (error) {
        log.warn({ err: error, level: child.level, id: childId }, 'Descendant removal failed');
      }
      removed += await this.removeDescendants(child.level, childId);
    }
    return removed;
  }

  private ids(entityType: DocLevel, column: string, parentId: string): Promise<string[]> {
    return this.guarded(async () => {
      const ids: string[] = [];
      for await (const row of this.relational.query(entityType, { eq: { [column]: parentId } })) ids.push(row.id);
      return ids;
    });
  }

  private ensureWritable(): void {
    if (!this.monitor.isAvailable('relational')) {
      throw new BackendUnavailableError('relational');
    }
  }

  private async guarded<T>(operation: () => Promise<T>): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      if (isBackendUnavailable(error, 'relational')) this.monitor.report('relational', false);
      throw error;
    }
  }
}
