import { and, count, desc, eq, inArray, isNull, max, ne, type SQL } from 'drizzle-orm';
import type { DbExecutor } from '@/app/lib/db';
import { donations } from '@/app/lib/db/schema';
import type { DonationStatus } from '@/app/lib/db/schema/enums';
import { NotFoundError } from '@/app/lib/errors';
import { ownerCondition } from '@/app/lib/repositories/conditions';
import { withConstraintTranslation } from '@/app/lib/repositories/pg-errors';
import type {
  Donation,
  DonationChanges,
  DonationRepository,
  DonationView,
  ExternalDonationKey,
  NewDonation,
  OwnerRef,
} from '@/app/lib/repositories/types';

function viewCondition(view: DonationView): SQL | undefined {
  switch (view.view) {
    case 'all':
      return undefined;
    case 'pending_review':
      return ne(donations.status, 'succeeded');
    case 'active':
      return eq(donations.status, 'succeeded');
    case 'for_subscription':
      return eq(donations.externalSubscriptionId, view.subscriptionId);
  }
}

export class DrizzleDonationRepository implements DonationRepository {
  constructor(private readonly db: DbExecutor) {}

  async findById(id: number): Promise<Donation | undefined> {
    const [donation] = await this.db.select().from(donations).where(eq(donations.id, id)).limit(1);
    return donation;
  }

  async findByExternalKey(key: ExternalDonationKey): Promise<Donation | undefined> {
    const externalId =
      key.externalInvoiceId !== null
        ? eq(donations.externalInvoiceId, key.externalInvoiceId)
        : key.externalChargeId !== null
          ? eq(donations.externalChargeId, key.externalChargeId)
          : undefined;
    if (!externalId) return undefined;

    const [donation] = await this.db
      .select()
      .from(donations)
      .where(
        and(
          externalId,
          'childId' in key.target
            ? eq(donations.childId, key.target.childId)
            : and(isNull(donations.childId), eq(donations.projectId, key.target.projectId))
        )
      )
      .orderBy(donations.id)
      .limit(1);
    return donation;
  }

  async existsForSubscriptionChild(subscriptionId: string, childId: number): Promise<boolean> {
    const [row] = await this.db
      .select({ id: donations.id })
      .from(donations)
      .where(and(eq(donations.externalSubscriptionId, subscriptionId), eq(donations.childId, childId)))
      .limit(1);
    return row !== undefined;
  }

  async insert(values: NewDonation): Promise<Donation> {
    return withConstraintTranslation(async () => {
      const [donation] = await this.db.insert(donations).values(values).returning();
      return donation;
    });
  }

  async update(id: number, changes: DonationChanges): Promise<Donation> {
    return withConstraintTranslation(async () => {
      const [donation] = await this.db
        .update(donations)
        .set({ ...changes, updatedAt: new Date() })
        .where(eq(donations.id, id))
        .returning();
      if (!donation) {
        throw new NotFoundError('Donation', id);
      }
      return donation;
    });
  }

  async list(
    view: DonationView,
    { limit, offset }: { limit?: number; offset?: number } = {}
  ): Promise<{ donations: Donation[]; totalCount: number }> {
    const where = viewCondition(view);

    let query = this.db.select().from(donations).where(where).orderBy(desc(donations.date), desc(donations.id)).$dynamic();
    if (limit !== undefined) query = query.limit(limit);
    if (offset !== undefined) query = query.offset(offset);

    const rows = await query;
    const [total] = await this.db.select({ value: count() }).from(donations).where(where);
    return { donations: rows, totalCount: total?.value ?? 0 };
  }

  async countBy(owner: OwnerRef): Promise<number> {
    const [result] = await this.db
      .select({ value: count() })
      .from(donations)
      .where(ownerCondition(donations, owner));
    return result?.value ?? 0;
  }

  async reassignDonor(fromDonorIds: number[], toDonorId: number): Promise<number> {
    if (fromDonorIds.length === 0) return 0;
    const moved = await this.db
      .update(donations)
      .set({ donorId: toDonorId, updatedAt: new Date() })
      .where(inArray(donations.donorId, fromDonorIds))
      .returning({ id: donations.id });
    return moved.length;
  }

  async lastDonationDate(owner: OwnerRef): Promise<string | null> {
    const [result] = await this.db
      .select({ value: max(donations.date) })
      .from(donations)
      .where(ownerCondition(donations, owner));
    return result?.value ?? null;
  }

  async statusCounts(): Promise<Record<DonationStatus, number>> {
    const rows = await this.db
      .select({ status: donations.status, value: count() })
      .from(donations)
      .groupBy(donations.status);

    const counts: Record<DonationStatus, number> = {
      succeeded: 0,
      failed: 0,
      refunded: 0,
      canceled: 0,
      needs_attention: 0,
    };
    for (const row of rows) {
      counts[row.status] = row.value;
    }
    return counts;
  }
}
