import { logger } from '@/app/lib/logger';
import { ValidationError } from '@/app/lib/errors';
import { MAX_AMOUNT_CENTS } from '@/app/lib/db/schema/enums';
import type { Donation, ExternalDonationKey, Repositories, UnitOfWork } from '@/app/lib/repositories/types';
import { isCalendarDate, parseCalendarDate } from '@/app/lib/utils/dates';
import { mapProviderStatus } from '@/app/lib/utils/donation-status';
import type { DonorIdentityHints } from '@/app/lib/utils/donor-identity';
import { validateDonationFields, type DonationsService } from '@/app/lib/services/donations.service';
import type { DonorsService } from '@/app/lib/services/donors.service';
import type { ProjectsService } from '@/app/lib/services/projects.service';
import type { ResolvedServiceOptions } from '@/app/lib/services/service-options';

/**
 * One pre-parsed payment from an external provider. Several records may share
 * an invoice, e.g. one charge covering two sponsored children.
 */
export interface PaymentRecord {
  amountCents: number;
  date: string;
  donor: DonorIdentityHints;
  childId?: number | null;
  projectId?: number | null;
  paymentMethod: string;
  /** Raw provider status; mapped onto a settlement status */
  status?: string | null;
  description?: string | null;
  externalSubscriptionId?: string | null;
  externalInvoiceId?: string | null;
  externalChargeId?: string | null;
  externalCustomerId?: string | null;
  /** Invoice total when the invoice covers more than this record */
  invoiceTotalCents?: number | null;
}

export interface ImportPaymentResult {
  donation: Donation;
  created: boolean;
}

export interface ImportBatchResult {
  succeededCount: number;
  failedCount: number;
  needsAttentionCount: number;
  updatedCount: number;
  errors: Array<{ index: number; message: string }>;
}

interface PaymentImportDependencies {
  donations: DonationsService;
  donors: DonorsService;
  projects: ProjectsService;
}

/**
 * Idempotent ingestion of provider payments. Re-importing a record updates the
 * donation it produced the first time instead of adding another.
 */
export class PaymentImportService {
  constructor(
    private readonly uow: UnitOfWork,
    private readonly options: ResolvedServiceOptions,
    private readonly deps: PaymentImportDependencies
  ) {}

  async importPayment(record: PaymentRecord): Promise<ImportPaymentResult> {
    const externalInvoiceId = record.externalInvoiceId ?? null;
    const externalChargeId = record.externalChargeId ?? null;
    if (externalInvoiceId === null && externalChargeId === null) {
      throw ValidationError.base('Payment record needs an invoice id or a charge id');
    }
    if (!isCalendarDate(record.date)) {
      throw ValidationError.field('date', 'is not a valid date');
    }
    if (Math.max(record.amountCents, record.invoiceTotalCents ?? 0) > MAX_AMOUNT_CENTS) {
      throw ValidationError.field('amount', `must be at most ${MAX_AMOUNT_CENTS} cents`);
    }

    return this.uow.transaction((repos) =>
      this.importIn(repos, record, externalInvoiceId, externalChargeId)
    );
  }

  /**
   * Imports each record in its own transaction. A failing record is counted
   * and reported; the rest still import.
   */
  async importBatch(records: PaymentRecord[]): Promise<ImportBatchResult> {
    const result: ImportBatchResult = {
      succeededCount: 0,
      failedCount: 0,
      needsAttentionCount: 0,
      updatedCount: 0,
      errors: [],
    };

    for (const [index, record] of records.entries()) {
      try {
        const { donation, created } = await this.importPayment(record);
        if (!created) {
          result.updatedCount += 1;
        } else if (donation.status === 'succeeded') {
          result.succeededCount += 1;
        } else if (donation.status === 'failed') {
          result.failedCount += 1;
        } else {
          result.needsAttentionCount += 1;
        }
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        logger.warn(`Payment record ${index} was not imported: ${message}`);
        result.errors.push({ index, message });
      }
    }

    logger.info(
      `Imported ${records.length} payment records: ${result.succeededCount} succeeded, ${result.failedCount} failed, ` +
        `${result.needsAttentionCount} need attention, ${result.updatedCount} updated, ${result.errors.length} errors`
    );
    return result;
  }

  private async importIn(
    repos: Repositories,
    record: PaymentRecord,
    externalInvoiceId: string | null,
    externalChargeId: string | null
  ): Promise<ImportPaymentResult> {
    const { status, reason } = mapProviderStatus(record.status);

    if (externalInvoiceId !== null) {
      await repos.invoices.insertIfAbsent({
        externalInvoiceId,
        externalChargeId,
        externalCustomerId: record.externalCustomerId ?? null,
        externalSubscriptionId: record.externalSubscriptionId ?? null,
        totalAmount: record.invoiceTotalCents ?? record.amountCents,
        invoiceDate: record.date,
      });
    }

    const { donor } = await this.deps.donors.findOrUpdateIn(
      repos,
      record.donor,
      parseCalendarDate(record.date)
    );

    const childId = record.childId ?? null;
    let projectId: number | null = null;
    let target: ExternalDonationKey['target'];
    if (childId !== null) {
      target = { childId };
    } else {
      projectId = record.projectId ?? (await this.deps.projects.generalFundIn(repos)).id;
      target = await this.projectTarget(repos, projectId);
    }

    const existing = await repos.donations.findByExternalKey({
      externalInvoiceId,
      externalChargeId,
      target,
    });

    if (existing) {
      const fields = validateDonationFields(
        { amount: record.amountCents, date: record.date, paymentMethod: record.paymentMethod, status },
        this.options.clock
      );
      const donation = await repos.donations.update(existing.id, {
        amount: record.amountCents,
        date: fields.date,
        status: fields.status,
        needsAttentionReason: reason,
      });
      logger.info(`Updated imported donation ${donation.id} (${externalInvoiceId ?? externalChargeId})`);
      return { donation, created: false };
    }

    const donation = await this.deps.donations.createDonationIn(repos, {
      donorId: donor.id,
      childId,
      projectId,
      amount: record.amountCents,
      date: record.date,
      paymentMethod: record.paymentMethod,
      status,
      needsAttentionReason: reason,
      description: record.description ?? null,
      externalSubscriptionId: record.externalSubscriptionId ?? null,
      externalInvoiceId,
      externalChargeId,
      externalCustomerId: record.externalCustomerId ?? null,
    });
    return { donation, created: true };
  }

  /**
   * Donations sharing an invoice are told apart by child, or by project without
   * one. A sponsorship project stands for its sponsorship's child, which is what
   * the stored donation carries.
   */
  private async projectTarget(repos: Repositories, projectId: number): Promise<ExternalDonationKey['target']> {
    const project = await repos.projects.findById(projectId);
    if (project?.projectType === 'sponsorship') {
      const [owner] = await repos.sponsorships.listBy({ projectId });
      if (owner) {
        return { childId: owner.childId };
      }
    }
    return { projectId };
  }
}
