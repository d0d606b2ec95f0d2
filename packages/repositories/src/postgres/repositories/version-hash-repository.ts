import { randomUUID } from 'node:crypto';
import { asc, eq } from 'drizzle-orm';
import type { Database } from '../db.js';
import { versionHashes } from '../schema/index.js';
import type {
  CreateVersionHashInput,
  VersionHashRepository,
} from '../../interfaces/index.js';
import type { ContentHash, Id, VersionHash } from '@strata/protocol';

export class PgVersionHashRepository implements VersionHashRepository {
  constructor(private db: Database) {}

  async insert(input: CreateVersionHashInput): Promise<VersionHash> {
    const [row] = await this.db
      .insert(versionHashes)
      .values({
        id: randomUUID(),
        entityId: input.entityId,
        transactionId: input.transactionId,
        contentHash: input.contentHash,
        createdAt: new Date(),
      })
      .returning();
    return this.rowToVersionHash(row);
  }

  async get(id: Id): Promise<VersionHash | null> {
    const [row] = await this.db.select().from(versionHashes).where(eq(versionHashes.id, id));
    return row ? this.rowToVersionHash(row) : null;
  }

  async findByHash(contentHash: ContentHash): Promise<VersionHash | null> {
    const [row] = await this.db
      .select()
      .from(versionHashes)
      .where(eq(versionHashes.contentHash, contentHash));
    return row ? this.rowToVersionHash(row) : null;
  }

  async listForEntity(entityId: Id): Promise<VersionHash[]> {
    const rows = await this.db
      .select()
      .from(versionHashes)
      .where(eq(versionHashes.entityId, entityId))
      .orderBy(asc(versionHashes.transactionId));
    return rows.map((r) => this.rowToVersionHash(r));
  }

  async deleteForEntity(entityId: Id): Promise<VersionHash[]> {
    // Tags bound to these hashes go with them (on delete cascade)
    const rows = await this.db
      .delete(versionHashes)
      .where(eq(versionHashes.entityId, entityId))
      .returning();
    return rows.map((r) => this.rowToVersionHash(r));
  }

  private rowToVersionHash(row: typeof versionHashes.$inferSelect): VersionHash {
    return {
      id: row.id,
      entityId: row.entityId,
      transactionId: row.transactionId,
      contentHash: row.contentHash,
      createdAt: row.createdAt.toISOString(),
    };
  }
}
