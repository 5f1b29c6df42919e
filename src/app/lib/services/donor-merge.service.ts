import { logger } from '@/app/lib/logger';
import { NotFoundError, ValidationError } from '@/app/lib/errors';
import type { Donor, DonorChanges, Repositories, UnitOfWork } from '@/app/lib/repositories/types';
import type { ArchiveService } from '@/app/lib/services/archive.service';
import type { ResolvedServiceOptions } from '@/app/lib/services/service-options';

export const MERGE_FIELDS = ['name', 'email', 'phone', 'address'] as const;
export type MergeField = (typeof MERGE_FIELDS)[number];

/**
 * For each field, the id of the donor whose value the survivor keeps.
 */
export type FieldSelections = Partial<Record<MergeField, number>>;

export interface MergeResult {
  mergedDonor: Donor;
  donationsReassigned: number;
  sponsorshipsReassigned: number;
}

function selectedValues(field: MergeField, source: Donor): DonorChanges {
  switch (field) {
    case 'name':
      return { name: source.name };
    case 'email':
      return { email: source.email };
    case 'phone':
      return { phone: source.phone };
    case 'address':
      // Address moves as one unit
      return {
        addressLine1: source.addressLine1,
        addressLine2: source.addressLine2,
        city: source.city,
        state: source.state,
        zipCode: source.zipCode,
        country: source.country,
      };
  }
}

/**
 * Consolidates duplicate donor records into the first donor in the list.
 */
export class DonorMergeService {
  constructor(
    private readonly uow: UnitOfWork,
    private readonly options: ResolvedServiceOptions,
    private readonly archive: ArchiveService
  ) {}

  async mergeDonors(donorIds: number[], selections: FieldSelections = {}): Promise<MergeResult> {
    const ids = [...new Set(donorIds)];
    const [survivorId] = ids;
    if (survivorId === undefined || ids.length < 2) {
      throw ValidationError.base('At least two different donors are required to merge');
    }

    for (const field of MERGE_FIELDS) {
      const selected = selections[field];
      if (selected !== undefined && !ids.includes(selected)) {
        throw ValidationError.field(field, `must select one of the donors being merged`);
      }
    }

    const result = await this.uow.transaction((repos) => this.mergeIn(repos, ids, survivorId, selections));
    logger.info(
      `Merged donors ${ids.slice(1).join(', ')} into ${survivorId}: ` +
        `${result.donationsReassigned} donations, ${result.sponsorshipsReassigned} sponsorships reassigned`
    );
    return result;
  }

  private async mergeIn(
    repos: Repositories,
    ids: number[],
    survivorId: number,
    selections: FieldSelections
  ): Promise<MergeResult> {
    const donors = new Map<number, Donor>();
    for (const id of ids) {
      const donor = await repos.donors.findById(id, { forUpdate: true });
      if (!donor) {
        throw new NotFoundError('Donor', id);
      }
      if (donor.mergedIntoId !== null) {
        throw ValidationError.base(`Donor ${id} was already merged into donor ${donor.mergedIntoId}`);
      }
      donors.set(id, donor);
    }

    const loserIds = ids.filter((id) => id !== survivorId);
    await this.endCollidingSponsorships(repos, survivorId, loserIds);

    const donationsReassigned = await repos.donations.reassignDonor(loserIds, survivorId);
    const sponsorshipsReassigned = await repos.sponsorships.reassignDonor(loserIds, survivorId);

    // Losers leave the kept set before the survivor can take over one of their emails
    for (const loserId of loserIds) {
      await this.archive.archiveDonorIn(repos, loserId);
      await repos.donors.update(loserId, { mergedIntoId: survivorId });
    }

    let changes: DonorChanges = { archivedAt: null };
    for (const field of MERGE_FIELDS) {
      const source = donors.get(selections[field] ?? survivorId);
      if (source) {
        changes = { ...changes, ...selectedValues(field, source) };
      }
    }
    const mergedDonor = await repos.donors.update(survivorId, changes);

    return { mergedDonor, donationsReassigned, sponsorshipsReassigned };
  }

  /**
   * After reassignment at most one active sponsorship may remain per child and
   * amount. The survivor's own pledges win, then earlier donors in the list;
   * every other duplicate is ended today.
   */
  private async endCollidingSponsorships(
    repos: Repositories,
    survivorId: number,
    loserIds: number[]
  ): Promise<void> {
    const held = new Set<string>();
    const pledgeKey = (childId: number, amount: number) => `${childId}:${amount}`;

    for (const sponsorship of await repos.sponsorships.listBy({ donorId: survivorId })) {
      if (sponsorship.endDate === null) {
        held.add(pledgeKey(sponsorship.childId, sponsorship.monthlyAmount));
      }
    }

    const today = this.options.clock.today();
    for (const loserId of loserIds) {
      for (const sponsorship of await repos.sponsorships.listBy({ donorId: loserId })) {
        if (sponsorship.endDate !== null) continue;
        const key = pledgeKey(sponsorship.childId, sponsorship.monthlyAmount);
        if (held.has(key)) {
          await repos.sponsorships.update(sponsorship.id, { endDate: today });
          logger.info(`Ended sponsorship ${sponsorship.id} of donor ${loserId}: duplicates a surviving pledge`);
        } else {
          held.add(key);
        }
      }
    }
  }
}
