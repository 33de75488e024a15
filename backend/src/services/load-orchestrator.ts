import { isLoadError, malformedRow, sheetNotFound, type LoadErrorKind } from '../errors.js';
import type { RecordStore } from '../store/record-store.js';
import type {
  EntityDefinition,
  EntityType,
  FieldValues,
  NaturalKey,
  UpsertOutcome,
} from '../types/loader.js';
import { LoadLog, type LoadLogEntry } from '../utils/load-log.js';
import { LOAD_ORDER, columnType, findColumn, getEntity, sheetFields } from './entity-catalog.js';
import { KeyResolver } from './key-resolver.js';
import { normalizeField } from './normalize.js';
import { assertMandatory, type SheetReader, type SheetRow } from './sheet-reader.js';
import { UpsertEngine } from './upsert-engine.js';

export type RowFailure = {
  sheet: string;
  rowIndex: number;
  kind: LoadErrorKind;
  reason: string;
};

export type EntityTally = {
  sheet: string;
  inserted: number;
  updated: number;
  unchanged: number;
  failed: RowFailure[];
};

export type LoadStatus = 'completed' | 'failed';

export type LoadReport = {
  status: LoadStatus;
  error: string | null;
  startedAt: string;
  finishedAt: string;
  entities: Partial<Record<EntityType, EntityTally>>;
  logs: LoadLogEntry[];
};

type LoadOrchestratorOptions = {
  reader: SheetReader;
  store: RecordStore;
  log?: LoadLog;
  resolver?: KeyResolver;
  order?: readonly EntityType[];
  seed?: boolean;
};

type PreparedRow = {
  naturalKey: NaturalKey;
  fields: FieldValues;
  hint: number | null;
};

function readHint(field: string, row: SheetRow): number | null {
  const value = normalizeField({ name: field, type: 'integer' }, row.record[field] ?? null);
  return typeof value === 'number' ? value : null;
}

/** Fills each column left blank from the first of its aliases that holds a value. */
function withAliases(entity: EntityDefinition, row: SheetRow): SheetRow {
  const record = { ...row.record };
  for (const column of entity.columns) {
    for (const alias of column.aliases ?? []) {
      if (record[column.name] == null) {
        record[column.name] = record[alias] ?? null;
      }
    }
  }
  return { rowIndex: row.rowIndex, record };
}

/** Sheet fields that must hold a value before the row can be resolved. */
function mandatoryFields(entity: EntityDefinition): string[] {
  const produced = new Set(entity.references.map((reference) => reference.column));
  const fields = new Set<string>();
  for (const column of entity.columns) {
    if (column.required || entity.naturalKey.includes(column.name)) {
      fields.add(column.name);
    }
  }
  // a reference with a hint field is checked once the hint is known
  for (const reference of entity.references) {
    if (reference.optional || reference.fallbackToPrimary || reference.hintField) continue;
    for (const field of reference.key) {
      if (!produced.has(field)) fields.add(field);
    }
  }
  return [...fields];
}

export class LoadOrchestrator {
  private readonly reader: SheetReader;
  private readonly store: RecordStore;
  private readonly log: LoadLog;
  private readonly order: readonly EntityType[];
  private readonly seed: boolean;
  readonly resolver: KeyResolver;
  private readonly engine: UpsertEngine;

  constructor({ reader, store, log, resolver, order = LOAD_ORDER, seed = true }: LoadOrchestratorOptions) {
    this.reader = reader;
    this.store = store;
    this.log = log ?? new LoadLog();
    this.order = order;
    this.seed = seed;
    this.resolver = resolver ?? new KeyResolver();
    this.engine = new UpsertEngine({ store, resolver: this.resolver });
  }

  async run(): Promise<LoadReport> {
    const startedAt = new Date().toISOString();
    const entities: Partial<Record<EntityType, EntityTally>> = {};
    let status: LoadStatus = 'completed';
    let error: string | null = null;

    try {
      if (this.seed) {
        const seeded = await this.resolver.seed(this.store, this.order.map(getEntity));
        this.log.info(`Registered ${seeded} existing records from the store`);
      }

      for (const type of this.order) {
        await this.loadEntity(getEntity(type), entities);
      }

      this.log.info('School data load completed');
    } catch (caught) {
      status = 'failed';
      error = caught instanceof Error ? caught.message : String(caught);
      this.log.error(`Load aborted: ${error}`);
    }

    return {
      status,
      error,
      startedAt,
      finishedAt: new Date().toISOString(),
      entities,
      logs: this.log.list(),
    };
  }

  /** Tallies into `entities` as rows go, so an aborted sheet still reports what it did. */
  private async loadEntity(
    entity: EntityDefinition,
    entities: Partial<Record<EntityType, EntityTally>>
  ): Promise<void> {
    if (!this.reader.hasSheet(entity.sheet) && entity.required) {
      throw sheetNotFound(entity.sheet);
    }

    const tally: EntityTally = { sheet: entity.sheet, inserted: 0, updated: 0, unchanged: 0, failed: [] };
    entities[entity.type] = tally;
    if (!this.reader.hasSheet(entity.sheet)) {
      this.log.warn(`Optional sheet ${entity.sheet} not provided; skipping.`);
      return;
    }

    this.log.info(`Loading sheet ${entity.sheet} into ${entity.table}`);
    const mandatory = mandatoryFields(entity);

    for (const sheetRow of this.reader.read(entity.sheet, sheetFields(entity))) {
      const row = withAliases(entity, sheetRow);
      try {
        assertMandatory(row, mandatory);
        const { naturalKey, fields, hint } = this.prepareRow(entity, row);
        const { id, outcome } = await this.engine.upsert(entity.type, naturalKey, fields);
        if (hint !== null) {
          this.resolver.registerHint(entity.type, hint, id);
        }
        this.count(tally, outcome);
      } catch (error) {
        if (!isLoadError(error) || error.fatal) {
          throw error;
        }
        tally.failed.push({ sheet: entity.sheet, rowIndex: row.rowIndex, kind: error.kind, reason: error.message });
        this.log.warn(`${entity.sheet} row ${row.rowIndex}: ${error.message}`);
      }
    }

    this.log.info(
      `${entity.sheet}: ${tally.inserted} inserted, ${tally.updated} updated, ${tally.unchanged} unchanged, ${tally.failed.length} failed`
    );
  }

  private count(tally: EntityTally, outcome: UpsertOutcome): void {
    tally[outcome] += 1;
  }

  private prepareRow(entity: EntityDefinition, row: SheetRow): PreparedRow {
    const context: FieldValues = {};
    for (const column of entity.columns) {
      context[column.name] = normalizeField(column, row.record[column.name]);
    }

    const produced = new Set<string>();
    for (const reference of entity.references) {
      const parent = getEntity(reference.entity);
      reference.key.forEach((field, index) => {
        if (produced.has(field) || field in context) return;
        const parentName = parent.naturalKey[index];
        if (parentName === undefined) {
          throw new Error(`${entity.type}: reference to ${parent.type} has more key fields than its natural key`);
        }
        const parentColumn = findColumn(parent, parentName) ?? { name: parentName, type: columnType(parent, parentName) };
        context[field] = normalizeField({ ...parentColumn, name: field }, row.record[field]);
      });

      const key = reference.key.map((field) => context[field] ?? null);
      const incomplete = key.some((part) => part === null);
      const hint = reference.hintField ? readHint(reference.hintField, row) : null;
      if (incomplete && hint !== null) {
        context[reference.column] = this.resolver.resolveHint(reference.entity, hint);
      } else if (reference.optional) {
        context[reference.column] = this.resolver.resolveOptional(reference.entity, key);
      } else if (reference.fallbackToPrimary && incomplete) {
        context[reference.column] = this.resolver.primary(reference.entity);
      } else if (incomplete && reference.hintField) {
        const missing = reference.key.find((field) => (context[field] ?? null) === null);
        throw malformedRow(
          `row ${row.rowIndex}: missing value for mandatory field ${missing ?? reference.key.join(', ')} or ${reference.hintField}`,
          { rowIndex: row.rowIndex, field: missing, hintField: reference.hintField }
        );
      } else {
        context[reference.column] = this.resolver.resolve(reference.entity, key);
      }
      produced.add(reference.column);
    }

    const fields: FieldValues = {};
    for (const column of entity.columns) {
      const value = context[column.name] ?? null;
      if (entity.naturalKey.includes(column.name) || (value === null && column.hasDefault)) continue;
      fields[column.name] = value;
    }
    for (const reference of entity.references) {
      if (reference.contextOnly || entity.naturalKey.includes(reference.column)) continue;
      fields[reference.column] = context[reference.column] ?? null;
    }

    return {
      naturalKey: entity.naturalKey.map((name) => context[name] ?? null),
      fields,
      hint: entity.hintField ? readHint(entity.hintField, row) : null,
    };
  }
}
