import { and, asc, eq, gt, isNull, lte, or } from 'drizzle-orm';
import type { Database } from '../db.js';
import { datasetsVersion, trainedModelsVersion, tasksVersion } from '../schema/index.js';
import type { ShadowHistoryRepository } from '../../interfaces/index.js';
import { ENTITY_KINDS } from '@strata/protocol';
import type { EntityKind, Id, ShadowRecord, TransactionId } from '@strata/protocol';

type ShadowTable = typeof datasetsVersion;

const shadowTables = {
  dataset: datasetsVersion,
  trained_model: trainedModelsVersion,
  task: tasksVersion,
} satisfies Record<EntityKind, ShadowTable>;

export class PgShadowHistoryRepository implements ShadowHistoryRepository {
  constructor(private db: Database) {}

  async locate(entityId: Id): Promise<EntityKind | null> {
    for (const kind of ENTITY_KINDS) {
      const table = shadowTables[kind];
      const [row] = await this.db
        .select({ entityId: table.entityId })
        .from(table)
        .where(eq(table.entityId, entityId))
        .limit(1);
      if (row) return kind;
    }
    return null;
  }

  async findOpen(kind: EntityKind, entityId: Id): Promise<ShadowRecord | null> {
    const table = shadowTables[kind];
    const [row] = await this.db
      .select()
      .from(table)
      .where(and(eq(table.entityId, entityId), isNull(table.endTransactionId)));
    return row ? this.rowToRecord(kind, row) : null;
  }

  async close(
    kind: EntityKind,
    entityId: Id,
    endTransactionId: TransactionId
  ): Promise<ShadowRecord | null> {
    const table = shadowTables[kind];
    const [row] = await this.db
      .update(table)
      .set({ endTransactionId })
      .where(and(eq(table.entityId, entityId), isNull(table.endTransactionId)))
      .returning();
    return row ? this.rowToRecord(kind, row) : null;
  }

  async insert(record: ShadowRecord): Promise<ShadowRecord> {
    const [row] = await this.db
      .insert(shadowTables[record.kind])
      .values({
        entityId: record.entityId,
        transactionId: record.transactionId,
        endTransactionId: record.endTransactionId,
        operation: record.operation,
        schemaRevision: record.schemaRevision,
        attributes: record.attributes,
      })
      .returning();
    return this.rowToRecord(record.kind, row);
  }

  async list(kind: EntityKind, entityId: Id): Promise<ShadowRecord[]> {
    const table = shadowTables[kind];
    const rows = await this.db
      .select()
      .from(table)
      .where(eq(table.entityId, entityId))
      .orderBy(asc(table.transactionId));
    return rows.map((r) => this.rowToRecord(kind, r));
  }

  async findContaining(
    kind: EntityKind,
    entityId: Id,
    transactionId: TransactionId
  ): Promise<ShadowRecord | null> {
    const table = shadowTables[kind];
    const [row] = await this.db
      .select()
      .from(table)
      .where(
        and(
          eq(table.entityId, entityId),
          lte(table.transactionId, transactionId),
          or(isNull(table.endTransactionId), gt(table.endTransactionId, transactionId))
        )
      );
    return row ? this.rowToRecord(kind, row) : null;
  }

  private rowToRecord(kind: EntityKind, row: ShadowTable['$inferSelect']): ShadowRecord {
    return {
      entityId: row.entityId,
      kind,
      transactionId: row.transactionId,
      endTransactionId: row.endTransactionId,
      operation: row.operation,
      schemaRevision: row.schemaRevision,
      attributes: row.attributes,
    };
  }
}
