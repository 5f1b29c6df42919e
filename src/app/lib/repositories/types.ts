import type { InferInsertModel, InferSelectModel } from 'drizzle-orm';
import type {
  children,
  donations,
  donors,
  invoices,
  projects,
  sponsorships,
} from '@/app/lib/db/schema';
import type { DonationStatus, ProjectType } from '@/app/lib/db/schema/enums';
import type { Visibility } from '@/app/lib/utils/visibility';

export type Donor = InferSelectModel<typeof donors>;
export type NewDonor = InferInsertModel<typeof donors>;
export type Child = InferSelectModel<typeof children>;
export type NewChild = InferInsertModel<typeof children>;
export type Project = InferSelectModel<typeof projects>;
export type NewProject = InferInsertModel<typeof projects>;
export type Sponsorship = InferSelectModel<typeof sponsorships>;
export type NewSponsorship = InferInsertModel<typeof sponsorships>;
export type Donation = InferSelectModel<typeof donations>;
export type NewDonation = InferInsertModel<typeof donations>;
export type Invoice = InferSelectModel<typeof invoices>;
export type NewInvoice = InferInsertModel<typeof invoices>;

type Changes<T> = Partial<Omit<T, 'id' | 'createdAt' | 'updatedAt'>>;

export type DonorChanges = Changes<NewDonor>;
export type ChildChanges = Changes<NewChild>;
export type ProjectChanges = Changes<NewProject>;
export type SponsorshipChanges = Changes<NewSponsorship>;
export type DonationChanges = Changes<NewDonation>;

/**
 * The entity that owns a sponsorship or donation.
 */
export type OwnerRef = { donorId: number } | { childId: number } | { projectId: number };

export interface ListOptions {
  visibility: Visibility;
  limit?: number;
  offset?: number;
}

export interface FindOptions {
  /** Lock the row until the surrounding transaction ends */
  forUpdate?: boolean;
}

/**
 * The review-queue views over donations.
 */
export type DonationView =
  | { view: 'all' }
  | { view: 'pending_review' }
  | { view: 'active' }
  | { view: 'for_subscription'; subscriptionId: string };

/**
 * Identifies an imported donation. Donations sharing an invoice are told
 * apart by child, or by project when no child is involved.
 */
export interface ExternalDonationKey {
  externalInvoiceId: string | null;
  externalChargeId: string | null;
  target: { childId: number } | { projectId: number };
}

export interface DonorRepository {
  findById(id: number, options?: FindOptions): Promise<Donor | undefined>;
  findByIds(ids: number[]): Promise<Donor[]>;
  /** Case-insensitive match among donors that are not archived */
  findKeptByEmail(email: string): Promise<Donor | undefined>;
  /** Most recently archived donor with this email, case-insensitively */
  findArchivedByEmail(email: string): Promise<Donor | undefined>;
  /** Merged-away donors are never listed */
  list(options: ListOptions): Promise<{ donors: Donor[]; totalCount: number }>;
  insert(values: NewDonor): Promise<Donor>;
  update(id: number, changes: DonorChanges): Promise<Donor>;
  delete(id: number): Promise<void>;
}

export interface ChildRepository {
  findById(id: number, options?: FindOptions): Promise<Child | undefined>;
  list(options: ListOptions): Promise<{ children: Child[]; totalCount: number }>;
  insert(values: NewChild): Promise<Child>;
  update(id: number, changes: ChildChanges): Promise<Child>;
  delete(id: number): Promise<void>;
}

export interface ProjectRepository {
  findById(id: number, options?: FindOptions): Promise<Project | undefined>;
  findSystemProject(title: string, projectType: ProjectType): Promise<Project | undefined>;
  list(options: ListOptions): Promise<{ projects: Project[]; totalCount: number }>;
  insert(values: NewProject): Promise<Project>;
  update(id: number, changes: ProjectChanges): Promise<Project>;
  delete(id: number): Promise<void>;
}

export interface SponsorshipRepository {
  findById(id: number): Promise<Sponsorship | undefined>;
  findActive(donorId: number, childId: number, monthlyAmount: number): Promise<Sponsorship | undefined>;
  /**
   * Inserts an active sponsorship. Throws ConflictError when another active
   * sponsorship already holds the same donor, child and amount.
   */
  insertActive(values: NewSponsorship): Promise<Sponsorship>;
  update(id: number, changes: SponsorshipChanges): Promise<Sponsorship>;
  listBy(owner: OwnerRef): Promise<Sponsorship[]>;
  countBy(owner: OwnerRef, options?: { activeOnly?: boolean }): Promise<number>;
  reassignDonor(fromDonorIds: number[], toDonorId: number): Promise<number>;
}

export interface DonationRepository {
  findById(id: number): Promise<Donation | undefined>;
  findByExternalKey(key: ExternalDonationKey): Promise<Donation | undefined>;
  existsForSubscriptionChild(subscriptionId: string, childId: number): Promise<boolean>;
  insert(values: NewDonation): Promise<Donation>;
  update(id: number, changes: DonationChanges): Promise<Donation>;
  list(
    view: DonationView,
    options?: { limit?: number; offset?: number }
  ): Promise<{ donations: Donation[]; totalCount: number }>;
  countBy(owner: OwnerRef): Promise<number>;
  reassignDonor(fromDonorIds: number[], toDonorId: number): Promise<number>;
  lastDonationDate(owner: OwnerRef): Promise<string | null>;
  statusCounts(): Promise<Record<DonationStatus, number>>;
}

export interface InvoiceRepository {
  findByExternalId(externalInvoiceId: string): Promise<Invoice | undefined>;
  /** Inserts the invoice unless one with the same external id exists, and returns the stored row */
  insertIfAbsent(values: NewInvoice): Promise<Invoice>;
}

export interface Repositories {
  donors: DonorRepository;
  children: ChildRepository;
  projects: ProjectRepository;
  sponsorships: SponsorshipRepository;
  donations: DonationRepository;
  invoices: InvoiceRepository;
}

/**
 * Runs a unit of work atomically. Everything written through the supplied
 * repositories commits together or not at all.
 */
export interface UnitOfWork {
  transaction<T>(work: (repos: Repositories) => Promise<T>): Promise<T>;
}
