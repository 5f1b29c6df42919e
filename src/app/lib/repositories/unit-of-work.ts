import type { Database, DbExecutor } from '@/app/lib/db';
import { DrizzleChildRepository } from '@/app/lib/repositories/child.repository';
import { DrizzleDonationRepository } from '@/app/lib/repositories/donation.repository';
import { DrizzleDonorRepository } from '@/app/lib/repositories/donor.repository';
import { DrizzleInvoiceRepository } from '@/app/lib/repositories/invoice.repository';
import { DrizzleProjectRepository } from '@/app/lib/repositories/project.repository';
import { DrizzleSponsorshipRepository } from '@/app/lib/repositories/sponsorship.repository';
import type { Repositories, UnitOfWork } from '@/app/lib/repositories/types';

export function createRepositories(db: DbExecutor): Repositories {
  return {
    donors: new DrizzleDonorRepository(db),
    children: new DrizzleChildRepository(db),
    projects: new DrizzleProjectRepository(db),
    sponsorships: new DrizzleSponsorshipRepository(db),
    donations: new DrizzleDonationRepository(db),
    invoices: new DrizzleInvoiceRepository(db),
  };
}

/**
 * Runs each unit of work inside `db.transaction`. A thrown error rolls the
 * whole transaction back.
 */
export class DrizzleUnitOfWork implements UnitOfWork {
  constructor(private readonly db: Database) {}

  transaction<T>(work: (repos: Repositories) => Promise<T>): Promise<T> {
    return this.db.transaction((tx) => work(createRepositories(tx)));
  }
}
