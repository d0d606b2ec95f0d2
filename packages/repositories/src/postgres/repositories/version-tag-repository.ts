import { randomUUID } from 'node:crypto';
import { asc, eq, inArray } from 'drizzle-orm';
import type { Database } from '../db.js';
import { tagEvents, versionTags } from '../schema/index.js';
import type {
  AppendTagEventInput,
  CreateVersionTagInput,
  VersionTagRepository,
} from '../../interfaces/index.js';
import type { Id, TagEvent, VersionTag } from '@strata/protocol';

export class PgVersionTagRepository implements VersionTagRepository {
  constructor(private db: Database) {}

  async findByName(tagName: string): Promise<VersionTag | null> {
    const [row] = await this.db.select().from(versionTags).where(eq(versionTags.tagName, tagName));
    return row ? this.rowToVersionTag(row) : null;
  }

  async insert(input: CreateVersionTagInput): Promise<VersionTag> {
    const now = new Date();
    const [row] = await this.db
      .insert(versionTags)
      .values({
        id: randomUUID(),
        versionHashId: input.versionHashId,
        tagName: input.tagName,
        createdAt: now,
        updatedAt: now,
      })
      .returning();
    return this.rowToVersionTag(row);
  }

  async move(tagName: string, versionHashId: Id): Promise<VersionTag | null> {
    const [row] = await this.db
      .update(versionTags)
      .set({ versionHashId, updatedAt: new Date() })
      .where(eq(versionTags.tagName, tagName))
      .returning();
    return row ? this.rowToVersionTag(row) : null;
  }

  async listForHash(versionHashId: Id): Promise<VersionTag[]> {
    const rows = await this.db
      .select()
      .from(versionTags)
      .where(eq(versionTags.versionHashId, versionHashId))
      .orderBy(asc(versionTags.tagName));
    return rows.map((r) => this.rowToVersionTag(r));
  }

  async deleteForHashes(versionHashIds: Id[]): Promise<VersionTag[]> {
    if (versionHashIds.length === 0) return [];
    const rows = await this.db
      .delete(versionTags)
      .where(inArray(versionTags.versionHashId, versionHashIds))
      .returning();
    return rows.map((r) => this.rowToVersionTag(r));
  }

  async appendEvent(input: AppendTagEventInput): Promise<TagEvent> {
    const [row] = await this.db
      .insert(tagEvents)
      .values({
        id: randomUUID(),
        tagName: input.tagName,
        fromVersionHashId: input.fromVersionHashId,
        toVersionHashId: input.toVersionHashId,
        transactionId: input.transactionId,
        createdAt: new Date(),
      })
      .returning();
    return this.rowToTagEvent(row);
  }

  async listEvents(tagName: string): Promise<TagEvent[]> {
    const rows = await this.db
      .select()
      .from(tagEvents)
      .where(eq(tagEvents.tagName, tagName))
      .orderBy(asc(tagEvents.transactionId), asc(tagEvents.createdAt));
    return rows.map((r) => this.rowToTagEvent(r));
  }

  private rowToVersionTag(row: typeof versionTags.$inferSelect): VersionTag {
    return {
      id: row.id,
      versionHashId: row.versionHashId,
      tagName: row.tagName,
      createdAt: row.createdAt.toISOString(),
      updatedAt: row.updatedAt.toISOString(),
    };
  }

  private rowToTagEvent(row: typeof tagEvents.$inferSelect): TagEvent {
    return {
      id: row.id,
      tagName: row.tagName,
      fromVersionHashId: row.fromVersionHashId,
      toVersionHashId: row.toVersionHashId,
      transactionId: row.transactionId,
      createdAt: row.createdAt.toISOString(),
    };
  }
}
