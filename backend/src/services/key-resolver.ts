import { unresolvedReference } from '../errors.js';
import type { RecordStore } from '../store/record-store.js';
import type { EntityDefinition, EntityType, NaturalKey } from '../types/loader.js';
import { columnType } from './entity-catalog.js';
import { normalizeField } from './normalize.js';

function serializeKey(naturalKey: NaturalKey): string {
  return JSON.stringify(naturalKey);
}

/**
 * Natural key to generated id, per entity type. Built up during a load pass
 * and optionally seeded from records already in the store.
 */
export class KeyResolver {
  private readonly maps = new Map<EntityType, Map<string, number>>();
  private readonly primaries = new Map<EntityType, number>();
  // workbook-local hint numbers; never seeded, they only live for one pass
  private readonly hints = new Map<EntityType, Map<number, number>>();

  private mapFor(entityType: EntityType): Map<string, number> {
    let map = this.maps.get(entityType);
    if (!map) {
      map = new Map();
      this.maps.set(entityType, map);
    }
    return map;
  }

  register(entityType: EntityType, naturalKey: NaturalKey, id: number): void {
    this.mapFor(entityType).set(serializeKey(naturalKey), id);
    if (!this.primaries.has(entityType)) {
      this.primaries.set(entityType, id);
    }
  }

  lookup(entityType: EntityType, naturalKey: NaturalKey): number | undefined {
    return this.maps.get(entityType)?.get(serializeKey(naturalKey));
  }

  resolve(entityType: EntityType, naturalKey: NaturalKey): number {
    const id = this.lookup(entityType, naturalKey);
    if (id === undefined) {
      throw unresolvedReference(entityType, naturalKey);
    }
    return id;
  }

  /**
   * Null when any key component is missing, since such a key names no record.
   * A complete but unknown key still fails.
   */
  resolveOptional(entityType: EntityType, naturalKey: NaturalKey): number | null {
    if (naturalKey.some((part) => part === null)) {
      return null;
    }
    return this.resolve(entityType, naturalKey);
  }

  /** The first record registered for the entity type. */
  primary(entityType: EntityType): number {
    const id = this.primaries.get(entityType);
    if (id === undefined) {
      throw unresolvedReference(entityType, []);
    }
    return id;
  }

  registerHint(entityType: EntityType, hint: number, id: number): void {
    let map = this.hints.get(entityType);
    if (!map) {
      map = new Map();
      this.hints.set(entityType, map);
    }
    map.set(hint, id);
  }

  resolveHint(entityType: EntityType, hint: number): number {
    const id = this.hints.get(entityType)?.get(hint);
    if (id === undefined) {
      throw unresolvedReference(`${entityType} hint`, [hint]);
    }
    return id;
  }

  size(entityType: EntityType): number {
    return this.maps.get(entityType)?.size ?? 0;
  }

  async seed(store: RecordStore, entities: readonly EntityDefinition[]): Promise<number> {
    let total = 0;
    for (const entity of entities) {
      const rows = await store.findAll(entity.table, entity.idColumn);
      for (const row of rows) {
        const id = Number(row[entity.idColumn]);
        if (!Number.isSafeInteger(id)) continue;
        const naturalKey = entity.naturalKey.map((name) =>
          normalizeField({ name, type: columnType(entity, name) }, row[name])
        );
        this.register(entity.type, naturalKey, id);
        total += 1;
      }
    }
    return total;
  }
}
