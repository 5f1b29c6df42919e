import { and, asc, count, desc, eq, inArray, isNotNull, isNull, sql } from 'drizzle-orm';
import type { DbExecutor } from '@/app/lib/db';
import { donors } from '@/app/lib/db/schema';
import { NotFoundError } from '@/app/lib/errors';
import { visibilityCondition } from '@/app/lib/repositories/conditions';
import { withConstraintTranslation } from '@/app/lib/repositories/pg-errors';
import type { Donor, DonorChanges, DonorRepository, FindOptions, ListOptions, NewDonor } from '@/app/lib/repositories/types';

const lowerEmail = sql`lower(${donors.email})`;

export class DrizzleDonorRepository implements DonorRepository {
  constructor(private readonly db: DbExecutor) {}

  async findById(id: number, options: FindOptions = {}): Promise<Donor | undefined> {
    const query = this.db.select().from(donors).where(eq(donors.id, id)).limit(1);
    const [donor] = options.forUpdate ? await query.for('update') : await query;
    return donor;
  }

  async findByIds(ids: number[]): Promise<Donor[]> {
    if (ids.length === 0) return [];
    return this.db.select().from(donors).where(inArray(donors.id, ids));
  }

  async findKeptByEmail(email: string): Promise<Donor | undefined> {
    const [donor] = await this.db
      .select()
      .from(donors)
      .where(and(eq(lowerEmail, email.trim().toLowerCase()), isNull(donors.archivedAt)))
      .limit(1);
    return donor;
  }

  async findArchivedByEmail(email: string): Promise<Donor | undefined> {
    const [donor] = await this.db
      .select()
      .from(donors)
      .where(and(eq(lowerEmail, email.trim().toLowerCase()), isNotNull(donors.archivedAt)))
      .orderBy(desc(donors.archivedAt), desc(donors.id))
      .limit(1);
    return donor;
  }

  async list({ visibility, limit, offset }: ListOptions): Promise<{ donors: Donor[]; totalCount: number }> {
    const where = and(isNull(donors.mergedIntoId), visibilityCondition(donors.archivedAt, visibility));

    let query = this.db.select().from(donors).where(where).orderBy(asc(donors.name), asc(donors.id)).$dynamic();
    if (limit !== undefined) query = query.limit(limit);
    if (offset !== undefined) query = query.offset(offset);

    const rows = await query;
    const [total] = await this.db.select({ value: count() }).from(donors).where(where);
    return { donors: rows, totalCount: total?.value ?? 0 };
  }

  async insert(values: NewDonor): Promise<Donor> {
    return withConstraintTranslation(async () => {
      const [donor] = await this.db.insert(donors).values(values).returning();
      return donor;
    });
  }

  async update(id: number, changes: DonorChanges): Promise<Donor> {
    return withConstraintTranslation(async () => {
      const [donor] = await this.db
        .update(donors)
        .set({ ...changes, updatedAt: new Date() })
        .where(eq(donors.id, id))
        .returning();
      if (!donor) {
        throw new NotFoundError('Donor', id);
      }
      return donor;
    });
  }

  async delete(id: number): Promise<void> {
    await this.db.delete(donors).where(eq(donors.id, id));
  }
}
