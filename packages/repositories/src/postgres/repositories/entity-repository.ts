import { eq } from 'drizzle-orm';
import type { Database } from '../db.js';
import { entities, datasets, trainedModels, tasks } from '../schema/index.js';
import type { EntityRepository, CreateEntityInput } from '../../interfaces/index.js';
import { indexedColumns } from '@strata/protocol';
import type { ContentHash, Entity, EntityKind, Id, JsonObject } from '@strata/protocol';

const subtypeTables = {
  dataset: datasets,
  trained_model: trainedModels,
  task: tasks,
} satisfies Record<EntityKind, typeof datasets>;

export class PgEntityRepository implements EntityRepository {
  constructor(private db: Database) {}

  async get(id: Id): Promise<Entity | null> {
    const [row] = await this.db.select().from(entities).where(eq(entities.id, id));
    if (!row) return null;

    const payload = subtypeTables[row.kind];
    const [subtype] = await this.db.select().from(payload).where(eq(payload.id, id));
    return this.rowToEntity(row, subtype?.attributes ?? {});
  }

  async create(input: CreateEntityInput): Promise<Entity> {
    const now = new Date();

    const [row] = await this.db
      .insert(entities)
      .values({
        id: input.id,
        kind: input.kind,
        ...indexedColumns(input.attributes),
        createdAt: now,
        updatedAt: now,
      })
      .returning();

    await this.db
      .insert(subtypeTables[input.kind])
      .values({ id: input.id, attributes: input.attributes });

    return this.rowToEntity(row, input.attributes);
  }

  async update(id: Id, attributes: JsonObject): Promise<Entity | null> {
    const [row] = await this.db
      .update(entities)
      .set({ ...indexedColumns(attributes), updatedAt: new Date() })
      .where(eq(entities.id, id))
      .returning();
    if (!row) return null;

    const payload = subtypeTables[row.kind];
    await this.db.update(payload).set({ attributes }).where(eq(payload.id, id));

    return this.rowToEntity(row, attributes);
  }

  async setCurrentVersionHash(id: Id, contentHash: ContentHash | null): Promise<void> {
    await this.db
      .update(entities)
      .set({ currentVersionHash: contentHash })
      .where(eq(entities.id, id));
  }

  async delete(id: Id): Promise<boolean> {
    // Subtype rows go with the base row (on delete cascade)
    const rows = await this.db
      .delete(entities)
      .where(eq(entities.id, id))
      .returning({ id: entities.id });
    return rows.length > 0;
  }

  private rowToEntity(row: typeof entities.$inferSelect, attributes: JsonObject): Entity {
    return {
      id: row.id,
      kind: row.kind,
      name: row.name,
      isPrivate: row.isPrivate,
      attributes,
      currentVersionHash: row.currentVersionHash,
      createdAt: row.createdAt.toISOString(),
      updatedAt: row.updatedAt.toISOString(),
    };
  }
}
