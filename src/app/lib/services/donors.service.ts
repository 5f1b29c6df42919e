import { isAfter } from 'date-fns';
import { logger } from '@/app/lib/logger';
import { NotFoundError, ValidationError } from '@/app/lib/errors';
import type { Donor, DonorChanges, Repositories, UnitOfWork } from '@/app/lib/repositories/types';
import {
  isBlank,
  resolveDonorIdentity,
  type DonorIdentity,
  type DonorIdentityHints,
} from '@/app/lib/utils/donor-identity';
import type { Visibility } from '@/app/lib/utils/visibility';
import type { ResolvedServiceOptions } from '@/app/lib/services/service-options';

export interface FindOrUpdateResult {
  donor: Donor;
  created: boolean;
}

const IDENTITY_FIELDS = [
  'name',
  'email',
  'phone',
  'addressLine1',
  'addressLine2',
  'city',
  'state',
  'zipCode',
  'country',
] as const;

/**
 * Resolved values for the fields the hints actually carried. Email is left
 * out: it is what matched, and the stored spelling is kept.
 */
function hintedChanges(hints: DonorIdentityHints, identity: DonorIdentity): DonorChanges {
  const changes: DonorChanges = {};
  if (!isBlank(hints.name)) changes.name = identity.name;
  if (!isBlank(hints.phone)) changes.phone = identity.phone;
  if (!isBlank(hints.addressLine1)) changes.addressLine1 = identity.addressLine1;
  if (!isBlank(hints.addressLine2)) changes.addressLine2 = identity.addressLine2;
  if (!isBlank(hints.city)) changes.city = identity.city;
  if (!isBlank(hints.state)) changes.state = identity.state;
  if (!isBlank(hints.zipCode)) changes.zipCode = identity.zipCode;
  if (!isBlank(hints.country)) changes.country = identity.country;
  return changes;
}

/**
 * Follows merged_into_id to the donor that absorbed this one.
 */
export async function resolveSurvivingDonor(repos: Repositories, donor: Donor): Promise<Donor> {
  let current = donor;
  const seen = new Set<number>([current.id]);
  while (current.mergedIntoId !== null) {
    const next = await repos.donors.findById(current.mergedIntoId);
    if (!next || seen.has(next.id)) {
      break;
    }
    seen.add(next.id);
    current = next;
  }
  return current;
}

/**
 * Donor directory: identity-based lookup, explicit edits and merge-aware listings.
 */
export class DonorsService {
  constructor(
    private readonly uow: UnitOfWork,
    private readonly options: ResolvedServiceOptions
  ) {}

  async findOrUpdateDonor(hints: DonorIdentityHints, transactionDate?: Date): Promise<FindOrUpdateResult> {
    return this.uow.transaction((repos) =>
      this.findOrUpdateIn(repos, hints, transactionDate ?? this.options.clock.now())
    );
  }

  /**
   * Matches on the resolved email: a kept donor first, then the most recently
   * archived one. Hinted fields are applied only when the transaction is newer
   * than the data already on file, and blank hints never erase stored values.
   */
  async findOrUpdateIn(
    repos: Repositories,
    hints: DonorIdentityHints,
    transactionDate: Date
  ): Promise<FindOrUpdateResult> {
    const identity = resolveDonorIdentity(hints);

    const match =
      (await repos.donors.findKeptByEmail(identity.email)) ??
      (await repos.donors.findArchivedByEmail(identity.email));

    if (!match) {
      const donor = await repos.donors.insert({ ...identity, lastUpdatedAt: transactionDate });
      logger.info(`Created donor ${donor.id} from incoming record`);
      return { donor, created: true };
    }

    const donor = await resolveSurvivingDonor(repos, match);
    if (donor.lastUpdatedAt !== null && !isAfter(transactionDate, donor.lastUpdatedAt)) {
      return { donor, created: false };
    }

    const updated = await repos.donors.update(donor.id, {
      ...hintedChanges(hints, identity),
      lastUpdatedAt: transactionDate,
    });
    return { donor: updated, created: false };
  }

  async createDonor(hints: DonorIdentityHints): Promise<Donor> {
    const identity = resolveDonorIdentity(hints);
    const donor = await this.uow.transaction((repos) => repos.donors.insert(identity));
    logger.info(`Created donor ${donor.id}`);
    return donor;
  }

  /**
   * Applies the given fields on top of the stored ones and re-resolves the
   * whole identity, so fallbacks and normalization hold after the edit.
   */
  async updateDonor(id: number, hints: DonorIdentityHints): Promise<Donor> {
    return this.uow.transaction(async (repos) => {
      const donor = await this.getDonorIn(repos, id);
      if (donor.mergedIntoId !== null) {
        throw ValidationError.base(`Cannot update donor merged into donor ${donor.mergedIntoId}`);
      }

      const combined: DonorIdentityHints = {};
      for (const field of IDENTITY_FIELDS) {
        const hinted = hints[field];
        combined[field] = hinted === undefined ? donor[field] : hinted;
      }
      return repos.donors.update(id, resolveDonorIdentity(combined));
    });
  }

  async getDonor(id: number): Promise<Donor> {
    return this.uow.transaction((repos) => this.getDonorIn(repos, id));
  }

  async listDonors({
    visibility = 'kept',
    limit,
    offset,
  }: { visibility?: Visibility; limit?: number; offset?: number } = {}) {
    return this.uow.transaction((repos) => repos.donors.list({ visibility, limit, offset }));
  }

  async lastDonationDate(id: number): Promise<string | null> {
    return this.uow.transaction(async (repos) => {
      await this.getDonorIn(repos, id);
      return repos.donations.lastDonationDate({ donorId: id });
    });
  }

  async getDonorIn(repos: Repositories, id: number): Promise<Donor> {
    const donor = await repos.donors.findById(id);
    if (!donor) {
      throw new NotFoundError('Donor', id);
    }
    return donor;
  }
}
