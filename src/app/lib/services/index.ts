import type { UnitOfWork } from '@/app/lib/repositories/types';
import { ArchiveService } from '@/app/lib/services/archive.service';
import { ChildrenService } from '@/app/lib/services/children.service';
import { DonationsService } from '@/app/lib/services/donations.service';
import { DonorMergeService } from '@/app/lib/services/donor-merge.service';
import { DonorsService } from '@/app/lib/services/donors.service';
import { PaymentImportService } from '@/app/lib/services/payment-import.service';
import { ProjectsService } from '@/app/lib/services/projects.service';
import { resolveServiceOptions, type ServiceOptions } from '@/app/lib/services/service-options';
import { SponsorshipsService } from '@/app/lib/services/sponsorships.service';

/**
 * Creates and returns all service instances
 * This function is called once at startup and the result is shared by every
 * tRPC request through the context
 */
export const createServices = (uow: UnitOfWork, serviceOptions: ServiceOptions = {}) => {
  const options = resolveServiceOptions(serviceOptions);

  const archive = new ArchiveService(uow, options);
  const projects = new ProjectsService(uow, options);
  const children = new ChildrenService(uow);
  const donors = new DonorsService(uow, options);
  const sponsorships = new SponsorshipsService(uow, options, archive);
  const donations = new DonationsService(uow, options, { archive, donors, projects, sponsorships });

  return {
    // Catalog
    projects,
    children,
    donors,

    // Donation pipeline
    sponsorships,
    donations,
    imports: new PaymentImportService(uow, options, { donations, donors, projects }),

    // Lifecycle
    archive,
    donorMerge: new DonorMergeService(uow, options, archive),
  };
};

export type Services = ReturnType<typeof createServices>;
