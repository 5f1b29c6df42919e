import { logger } from '@/app/lib/logger';
import { MAX_AMOUNT_CENTS } from '@/app/lib/db/schema/enums';
import { ConflictError, NotFoundError, ValidationError } from '@/app/lib/errors';
import type {
  Child,
  Donor,
  OwnerRef,
  Repositories,
  Sponsorship,
  UnitOfWork,
} from '@/app/lib/repositories/types';
import { compareCalendarDates, isCalendarDate } from '@/app/lib/utils/dates';
import type { ArchiveService } from '@/app/lib/services/archive.service';
import { resolveSurvivingDonor } from '@/app/lib/services/donors.service';
import type { ResolvedServiceOptions } from '@/app/lib/services/service-options';

export interface MatchSponsorshipInput {
  donor: Donor;
  child: Child;
  monthlyAmount: number;
  startDate: string;
}

export interface MatchResult {
  sponsorship: Sponsorship;
  created: boolean;
}

export interface CreateSponsorshipInput {
  donorId: number;
  childId: number;
  monthlyAmount: number;
  startDate?: string;
}

export function sponsorshipProjectTitle(child: Pick<Child, 'name'>): string {
  return `Sponsor ${child.name}`;
}

/**
 * Finds or creates recurring pledges. A pledge is identified by donor, child
 * and monthly amount; changing the amount always starts a new sponsorship.
 */
export class SponsorshipsService {
  constructor(
    private readonly uow: UnitOfWork,
    private readonly options: ResolvedServiceOptions,
    private readonly archive: ArchiveService
  ) {}

  /**
   * Reuses the active sponsorship for this donor, child and amount, or creates
   * one. Ended sponsorships are never reused. When a concurrent writer inserts
   * the same pledge first, its row is reused.
   */
  async findOrCreateIn(repos: Repositories, input: MatchSponsorshipInput): Promise<MatchResult> {
    const { donor, child, monthlyAmount } = input;

    const existing = await repos.sponsorships.findActive(donor.id, child.id, monthlyAmount);
    if (existing) {
      logger.debug(`Reusing sponsorship ${existing.id} for donor ${donor.id} and child ${child.id}`);
      return { sponsorship: existing, created: false };
    }

    try {
      const sponsorship = await this.insertIn(repos, input);
      return { sponsorship, created: true };
    } catch (error) {
      if (!(error instanceof ConflictError)) {
        throw error;
      }
      const winner = await repos.sponsorships.findActive(donor.id, child.id, monthlyAmount);
      if (!winner) {
        throw error;
      }
      logger.info(`Sponsorship for donor ${donor.id} and child ${child.id} was created concurrently; reusing ${winner.id}`);
      return { sponsorship: winner, created: false };
    }
  }

  async createSponsorship(input: CreateSponsorshipInput): Promise<Sponsorship> {
    assertPositiveAmount(input.monthlyAmount);
    const startDate = input.startDate ?? this.options.clock.today();
    if (!isCalendarDate(startDate)) {
      throw ValidationError.field('start_date', 'is not a valid date');
    }

    return this.uow.transaction(async (repos) => {
      const found = await repos.donors.findById(input.donorId);
      if (!found) {
        throw new NotFoundError('Donor', input.donorId);
      }
      const donor = await resolveSurvivingDonor(repos, found);
      const child = await repos.children.findById(input.childId);
      if (!child) {
        throw new NotFoundError('Child', input.childId);
      }

      const alreadySponsored = ValidationError.base(
        `${child.name} is already actively sponsored by ${donor.name}`
      );
      if (await repos.sponsorships.findActive(donor.id, child.id, input.monthlyAmount)) {
        throw alreadySponsored;
      }

      try {
        return await this.insertIn(repos, { donor, child, monthlyAmount: input.monthlyAmount, startDate });
      } catch (error) {
        throw error instanceof ConflictError ? alreadySponsored : error;
      }
    });
  }

  async endSponsorship(id: number, endDate?: string): Promise<Sponsorship> {
    return this.uow.transaction(async (repos) => {
      const sponsorship = await this.getSponsorshipIn(repos, id);
      if (sponsorship.endDate !== null) {
        throw ValidationError.base('Sponsorship has already ended');
      }

      const end = endDate ?? this.options.clock.today();
      if (!isCalendarDate(end)) {
        throw ValidationError.field('end_date', 'is not a valid date');
      }
      if (compareCalendarDates(end, sponsorship.startDate) < 0) {
        throw ValidationError.field('end_date', 'must be on or after the start date');
      }

      const ended = await repos.sponsorships.update(id, { endDate: end });
      logger.info(`Ended sponsorship ${id} on ${end}`);
      return ended;
    });
  }

  async getSponsorship(id: number): Promise<Sponsorship> {
    return this.uow.transaction((repos) => this.getSponsorshipIn(repos, id));
  }

  async listSponsorships(owner: OwnerRef): Promise<Sponsorship[]> {
    return this.uow.transaction((repos) => repos.sponsorships.listBy(owner));
  }

  private async getSponsorshipIn(repos: Repositories, id: number): Promise<Sponsorship> {
    const sponsorship = await repos.sponsorships.findById(id);
    if (!sponsorship) {
      throw new NotFoundError('Sponsorship', id);
    }
    return sponsorship;
  }

  /**
   * Provisions the sponsorship's own project, restores the donor and child if
   * archived, then inserts. The provisional project is removed again when the
   * insert loses a race.
   */
  private async insertIn(repos: Repositories, input: MatchSponsorshipInput): Promise<Sponsorship> {
    const donor = await this.archive.restoreDonorIfArchived(repos, input.donor);
    const child = await this.archive.restoreChildIfArchived(repos, input.child);

    const project = await repos.projects.insert({
      title: sponsorshipProjectTitle(child),
      projectType: 'sponsorship',
      system: false,
    });

    try {
      const sponsorship = await repos.sponsorships.insertActive({
        donorId: donor.id,
        childId: child.id,
        projectId: project.id,
        monthlyAmount: input.monthlyAmount,
        startDate: input.startDate,
      });
      logger.info(
        `Created sponsorship ${sponsorship.id}: donor ${donor.id}, child ${child.id}, ${input.monthlyAmount} cents/month`
      );
      return sponsorship;
    } catch (error) {
      if (error instanceof ConflictError) {
        await repos.projects.delete(project.id);
      }
      throw error;
    }
  }
}

function assertPositiveAmount(amount: number): void {
  if (!Number.isInteger(amount) || amount <= 0) {
    throw ValidationError.field('monthly_amount', 'must be a positive whole number of cents');
  }
  if (amount > MAX_AMOUNT_CENTS) {
    throw ValidationError.field('monthly_amount', `must be at most ${MAX_AMOUNT_CENTS} cents`);
  }
}
