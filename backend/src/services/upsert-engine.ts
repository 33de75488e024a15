import type { RecordStore } from '../store/record-store.js';
import type {
  EntityDefinition,
  EntityType,
  FieldValues,
  NaturalKey,
  StoredRow,
  UpsertResult,
} from '../types/loader.js';
import { columnType, getEntity } from './entity-catalog.js';
import type { KeyResolver } from './key-resolver.js';
import { sameValue } from './normalize.js';

type UpsertEngineOptions = {
  store: RecordStore;
  resolver: KeyResolver;
  catalog?: (type: EntityType) => EntityDefinition;
};

/**
 * Insert-or-update keyed by natural key. Unchanged records are never written,
 * so replaying the same workbook performs no writes.
 */
export class UpsertEngine {
  private readonly store: RecordStore;
  private readonly resolver: KeyResolver;
  private readonly catalog: (type: EntityType) => EntityDefinition;

  constructor({ store, resolver, catalog = getEntity }: UpsertEngineOptions) {
    this.store = store;
    this.resolver = resolver;
    this.catalog = catalog;
  }

  async upsert(entityType: EntityType, naturalKey: NaturalKey, fieldValues: FieldValues): Promise<UpsertResult> {
    const entity = this.catalog(entityType);
    if (naturalKey.length !== entity.naturalKey.length) {
      throw new Error(`${entityType}: expected ${entity.naturalKey.length} natural key values, got ${naturalKey.length}`);
    }

    const keyFields: FieldValues = {};
    entity.naturalKey.forEach((name, index) => {
      keyFields[name] = naturalKey[index] ?? null;
    });

    const result = await this.store.withTransaction(async () => {
      const existing = await this.findExisting(entity, naturalKey, keyFields);
      if (!existing) {
        const id = await this.store.insert(entity.table, entity.idColumn, { ...fieldValues, ...keyFields });
        return { id, outcome: 'inserted' } satisfies UpsertResult;
      }

      const id = Number(existing[entity.idColumn]);
      const changes = this.diff(entity, existing, fieldValues);
      if (Object.keys(changes).length === 0) {
        return { id, outcome: 'unchanged' } satisfies UpsertResult;
      }
      await this.store.update(entity.table, { [entity.idColumn]: id }, changes);
      return { id, outcome: 'updated' } satisfies UpsertResult;
    });

    this.resolver.register(entityType, naturalKey, result.id);
    return result;
  }

  private async findExisting(
    entity: EntityDefinition,
    naturalKey: NaturalKey,
    keyFields: FieldValues
  ): Promise<StoredRow | undefined> {
    const cachedId = this.resolver.lookup(entity.type, naturalKey);
    if (cachedId !== undefined) {
      const cached = await this.store.findOne(entity.table, { [entity.idColumn]: cachedId });
      if (cached) return cached;
    }
    return this.store.findOne(entity.table, keyFields);
  }

  private diff(entity: EntityDefinition, existing: StoredRow, fieldValues: FieldValues): FieldValues {
    const changes: FieldValues = {};
    for (const [name, value] of Object.entries(fieldValues)) {
      if (entity.naturalKey.includes(name)) continue;
      if (!sameValue({ name, type: columnType(entity, name) }, existing[name], value)) {
        changes[name] = value;
      }
    }
    return changes;
  }
}
