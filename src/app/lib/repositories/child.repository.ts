import { asc, count, eq } from 'drizzle-orm';
import type { DbExecutor } from '@/app/lib/db';
import { children } from '@/app/lib/db/schema';
import { NotFoundError } from '@/app/lib/errors';
import { visibilityCondition } from '@/app/lib/repositories/conditions';
import type { Child, ChildChanges, ChildRepository, FindOptions, ListOptions, NewChild } from '@/app/lib/repositories/types';

export class DrizzleChildRepository implements ChildRepository {
  constructor(private readonly db: DbExecutor) {}

  async findById(id: number, options: FindOptions = {}): Promise<Child | undefined> {
    const query = this.db.select().from(children).where(eq(children.id, id)).limit(1);
    const [child] = options.forUpdate ? await query.for('update') : await query;
    return child;
  }

  async list({ visibility, limit, offset }: ListOptions): Promise<{ children: Child[]; totalCount: number }> {
    const where = visibilityCondition(children.archivedAt, visibility);

    let query = this.db.select().from(children).where(where).orderBy(asc(children.name), asc(children.id)).$dynamic();
    if (limit !== undefined) query = query.limit(limit);
    if (offset !== undefined) query = query.offset(offset);

    const rows = await query;
    const [total] = await this.db.select({ value: count() }).from(children).where(where);
    return { children: rows, totalCount: total?.value ?? 0 };
  }

  async insert(values: NewChild): Promise<Child> {
    const [child] = await this.db.insert(children).values(values).returning();
    return child;
  }

  async update(id: number, changes: ChildChanges): Promise<Child> {
    const [child] = await this.db
      .update(children)
      .set({ ...changes, updatedAt: new Date() })
      .where(eq(children.id, id))
      .returning();
    if (!child) {
      throw new NotFoundError('Child', id);
    }
    return child;
  }

  async delete(id: number): Promise<void> {
    await this.db.delete(children).where(eq(children.id, id));
  }
}
