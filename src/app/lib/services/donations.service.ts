import { logger } from '@/app/lib/logger';
import {
  DUPLICATE_SUBSCRIPTION_CHILD_MESSAGE,
  NotFoundError,
  ValidationError,
  type FieldErrors,
} from '@/app/lib/errors';
import { MAX_AMOUNT_CENTS, type DonationStatus } from '@/app/lib/db/schema/enums';
import type {
  Donation,
  DonationView,
  Donor,
  Project,
  Repositories,
  UnitOfWork,
} from '@/app/lib/repositories/types';
import { compareCalendarDates, isCalendarDate, type Clock } from '@/app/lib/utils/dates';
import { parseDonationStatus, parsePaymentMethod } from '@/app/lib/utils/donation-status';
import type { DonorIdentityHints } from '@/app/lib/utils/donor-identity';
import type { ArchiveService } from '@/app/lib/services/archive.service';
import { resolveSurvivingDonor, type DonorsService } from '@/app/lib/services/donors.service';
import type { ProjectsService } from '@/app/lib/services/projects.service';
import type { ResolvedServiceOptions } from '@/app/lib/services/service-options';
import type { SponsorshipsService } from '@/app/lib/services/sponsorships.service';

export interface CreateDonationInput {
  /** An existing donor; takes precedence over `donor` */
  donorId?: number | null;
  /** Raw donor attributes, resolved through the donor directory */
  donor?: DonorIdentityHints | null;
  childId?: number | null;
  projectId?: number | null;
  amount: number;
  date?: string | null;
  paymentMethod?: string | null;
  status?: string | null;
  description?: string | null;
  needsAttentionReason?: string | null;
  externalSubscriptionId?: string | null;
  externalInvoiceId?: string | null;
  externalChargeId?: string | null;
  externalCustomerId?: string | null;
}

interface DonationDependencies {
  archive: ArchiveService;
  donors: DonorsService;
  projects: ProjectsService;
  sponsorships: SponsorshipsService;
}

/**
 * Checks the fields every stored donation must satisfy and reports all
 * failures at once.
 */
export function validateDonationFields(
  input: Pick<CreateDonationInput, 'amount' | 'date' | 'paymentMethod' | 'status'>,
  clock: Clock
): { date: string; paymentMethod: ReturnType<typeof parsePaymentMethod>; status: DonationStatus } {
  const errors: FieldErrors = {};
  const collect = <T>(parse: () => T): T | undefined => {
    try {
      return parse();
    } catch (error) {
      if (!(error instanceof ValidationError)) throw error;
      Object.assign(errors, error.errors);
      return undefined;
    }
  };

  if (!Number.isInteger(input.amount) || input.amount <= 0) {
    errors.amount = ['must be a positive whole number of cents'];
  } else if (input.amount > MAX_AMOUNT_CENTS) {
    errors.amount = [`must be at most ${MAX_AMOUNT_CENTS} cents`];
  }

  const date = input.date ?? null;
  if (date === null || date.trim() === '') {
    errors.date = ["can't be blank"];
  } else if (!isCalendarDate(date)) {
    errors.date = ['is not a valid date'];
  } else if (compareCalendarDates(date, clock.today()) > 0) {
    errors.date = ['cannot be in the future'];
  }

  const paymentMethod = collect(() => parsePaymentMethod(input.paymentMethod));
  const status = collect(() => parseDonationStatus(input.status ?? 'succeeded'));

  if (Object.keys(errors).length > 0 || date === null || !paymentMethod || !status) {
    throw new ValidationError(errors);
  }
  return { date, paymentMethod, status };
}

/**
 * The donation pipeline: donor resolution, sponsorship matching, validation,
 * duplicate guard and implicit restore, all in one transaction.
 */
export class DonationsService {
  constructor(
    private readonly uow: UnitOfWork,
    private readonly options: ResolvedServiceOptions,
    private readonly deps: DonationDependencies
  ) {}

  async createDonation(input: CreateDonationInput): Promise<Donation> {
    return this.uow.transaction((repos) => this.createDonationIn(repos, input));
  }

  async createDonationIn(repos: Repositories, input: CreateDonationInput): Promise<Donation> {
    const { date, paymentMethod, status } = validateDonationFields(input, this.options.clock);

    let donor = await this.resolveDonor(repos, input);

    let projectId: number;
    let sponsorshipId: number | null = null;
    let childId: number | null = null;

    if (input.childId !== undefined && input.childId !== null) {
      const child = await repos.children.findById(input.childId);
      if (!child) {
        throw new NotFoundError('Child', input.childId);
      }
      const { sponsorship } = await this.deps.sponsorships.findOrCreateIn(repos, {
        donor,
        child,
        monthlyAmount: input.amount,
        startDate: date,
      });
      projectId = sponsorship.projectId;
      sponsorshipId = sponsorship.id;
      childId = sponsorship.childId;
    } else {
      const project = await this.resolveProject(repos, input.projectId);
      projectId = project.id;
      if (project.projectType === 'sponsorship') {
        // A sponsorship project belongs to exactly one sponsorship
        const [owner] = await repos.sponsorships.listBy({ projectId: project.id });
        if (!owner) {
          throw ValidationError.field('sponsorship', 'must exist for a sponsorship project');
        }
        sponsorshipId = owner.id;
        childId = owner.childId;
      }
    }

    const subscriptionId = input.externalSubscriptionId ?? null;
    if (subscriptionId !== null && childId !== null) {
      if (await repos.donations.existsForSubscriptionChild(subscriptionId, childId)) {
        throw ValidationError.base(DUPLICATE_SUBSCRIPTION_CHILD_MESSAGE);
      }
    }
    // Advisory: the subscription already paid for a different child
    const duplicateSubscriptionDetected =
      subscriptionId !== null &&
      childId !== null &&
      (await repos.donations.list({ view: 'for_subscription', subscriptionId }, { limit: 1 })).totalCount > 0;

    donor = await this.deps.archive.restoreDonorIfArchived(repos, donor);
    const project = await repos.projects.findById(projectId);
    if (project) {
      await this.deps.archive.restoreProjectIfArchived(repos, project);
    }

    const donation = await repos.donations.insert({
      donorId: donor.id,
      projectId,
      sponsorshipId,
      childId,
      amount: input.amount,
      date,
      paymentMethod,
      status,
      description: input.description ?? null,
      needsAttentionReason: status === 'needs_attention' ? (input.needsAttentionReason ?? null) : null,
      externalSubscriptionId: subscriptionId,
      externalInvoiceId: input.externalInvoiceId ?? null,
      externalChargeId: input.externalChargeId ?? null,
      externalCustomerId: input.externalCustomerId ?? null,
      duplicateSubscriptionDetected,
    });

    logger.info(
      `Created donation ${donation.id}: donor ${donor.id}, project ${projectId}, ${donation.amount} cents, ${donation.status}`
    );
    return donation;
  }

  async getDonation(id: number): Promise<Donation> {
    return this.uow.transaction(async (repos) => {
      const donation = await repos.donations.findById(id);
      if (!donation) {
        throw new NotFoundError('Donation', id);
      }
      return donation;
    });
  }

  async listDonations(view: DonationView, pagination: { limit?: number; offset?: number } = {}) {
    return this.uow.transaction((repos) => repos.donations.list(view, pagination));
  }

  async statusSummary(): Promise<Record<DonationStatus, number>> {
    return this.uow.transaction((repos) => repos.donations.statusCounts());
  }

  /**
   * Sets the settlement status directly. The reason is kept only while the
   * donation needs attention.
   */
  async updateDonationStatus(id: number, status: string, reason?: string | null): Promise<Donation> {
    const next = parseDonationStatus(status);
    return this.uow.transaction(async (repos) => {
      const donation = await repos.donations.findById(id);
      if (!donation) {
        throw new NotFoundError('Donation', id);
      }
      const updated = await repos.donations.update(id, {
        status: next,
        needsAttentionReason:
          next === 'needs_attention' ? (reason ?? donation.needsAttentionReason) : null,
      });
      logger.info(`Donation ${id} status ${donation.status} -> ${next}`);
      return updated;
    });
  }

  private async resolveDonor(repos: Repositories, input: CreateDonationInput): Promise<Donor> {
    if (input.donorId !== undefined && input.donorId !== null) {
      const donor = await repos.donors.findById(input.donorId);
      if (!donor) {
        throw new NotFoundError('Donor', input.donorId);
      }
      return resolveSurvivingDonor(repos, donor);
    }
    if (input.donor) {
      const { donor } = await this.deps.donors.findOrUpdateIn(repos, input.donor, this.options.clock.now());
      return donor;
    }
    throw ValidationError.field('donor', "can't be blank");
  }

  private async resolveProject(repos: Repositories, projectId: number | null | undefined): Promise<Project> {
    if (projectId === undefined || projectId === null) {
      return this.deps.projects.generalFundIn(repos);
    }
    return this.deps.projects.getProjectIn(repos, projectId);
  }
}
