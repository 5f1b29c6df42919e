import { and, asc, count, eq, inArray, isNull, sql } from 'drizzle-orm';
import type { DbExecutor } from '@/app/lib/db';
import { sponsorships } from '@/app/lib/db/schema';
import { ConflictError, NotFoundError } from '@/app/lib/errors';
import { ownerCondition } from '@/app/lib/repositories/conditions';
import { CONSTRAINTS } from '@/app/lib/repositories/pg-errors';
import type {
  NewSponsorship,
  OwnerRef,
  Sponsorship,
  SponsorshipChanges,
  SponsorshipRepository,
} from '@/app/lib/repositories/types';

export class DrizzleSponsorshipRepository implements SponsorshipRepository {
  constructor(private readonly db: DbExecutor) {}

  async findById(id: number): Promise<Sponsorship | undefined> {
    const [sponsorship] = await this.db.select().from(sponsorships).where(eq(sponsorships.id, id)).limit(1);
    return sponsorship;
  }

  async findActive(donorId: number, childId: number, monthlyAmount: number): Promise<Sponsorship | undefined> {
    const [sponsorship] = await this.db
      .select()
      .from(sponsorships)
      .where(
        and(
          eq(sponsorships.donorId, donorId),
          eq(sponsorships.childId, childId),
          eq(sponsorships.monthlyAmount, monthlyAmount),
          isNull(sponsorships.endDate)
        )
      )
      .limit(1);
    return sponsorship;
  }

  /**
   * ON CONFLICT DO NOTHING keeps the transaction usable when a concurrent
   * writer already holds the active pledge; the caller re-reads and reuses it.
   */
  async insertActive(values: NewSponsorship): Promise<Sponsorship> {
    const [sponsorship] = await this.db
      .insert(sponsorships)
      .values({ ...values, endDate: null })
      .onConflictDoNothing({
        target: [sponsorships.donorId, sponsorships.childId, sponsorships.monthlyAmount],
        where: sql`end_date is null`,
      })
      .returning();

    if (!sponsorship) {
      throw new ConflictError(
        CONSTRAINTS.sponsorshipActivePledge,
        `Active sponsorship already exists for donor ${values.donorId} and child ${values.childId}`
      );
    }
    return sponsorship;
  }

  async update(id: number, changes: SponsorshipChanges): Promise<Sponsorship> {
    const [sponsorship] = await this.db
      .update(sponsorships)
      .set({ ...changes, updatedAt: new Date() })
      .where(eq(sponsorships.id, id))
      .returning();
    if (!sponsorship) {
      throw new NotFoundError('Sponsorship', id);
    }
    return sponsorship;
  }

  async listBy(owner: OwnerRef): Promise<Sponsorship[]> {
    return this.db
      .select()
      .from(sponsorships)
      .where(ownerCondition(sponsorships, owner))
      .orderBy(asc(sponsorships.startDate), asc(sponsorships.id));
  }

  async countBy(owner: OwnerRef, options: { activeOnly?: boolean } = {}): Promise<number> {
    const [result] = await this.db
      .select({ value: count() })
      .from(sponsorships)
      .where(
        and(ownerCondition(sponsorships, owner), options.activeOnly ? isNull(sponsorships.endDate) : undefined)
      );
    return result?.value ?? 0;
  }

  async reassignDonor(fromDonorIds: number[], toDonorId: number): Promise<number> {
    if (fromDonorIds.length === 0) return 0;
    const moved = await this.db
      .update(sponsorships)
      .set({ donorId: toDonorId, updatedAt: new Date() })
      .where(inArray(sponsorships.donorId, fromDonorIds))
      .returning({ id: sponsorships.id });
    return moved.length;
  }
}
