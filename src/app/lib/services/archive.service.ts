import { logger } from '@/app/lib/logger';
import { EMAIL_TAKEN_MESSAGE, NotFoundError, ValidationError } from '@/app/lib/errors';
import type { Child, Donor, OwnerRef, Project, Repositories, UnitOfWork } from '@/app/lib/repositories/types';
import type { ResolvedServiceOptions } from '@/app/lib/services/service-options';

export const ARCHIVABLE_ENTITIES = ['donor', 'child', 'project'] as const;
export type ArchivableEntity = (typeof ARCHIVABLE_ENTITIES)[number];
export type ArchivableRecord = Donor | Child | Project;

/**
 * How the cascade guard reads and writes one kind of soft-deletable record.
 */
interface EntityGateway<T extends { id: number; archivedAt: Date | null }> {
  label: ArchivableEntity;
  resource: string;
  find(repos: Repositories, id: number, forUpdate: boolean): Promise<T | undefined>;
  setArchivedAt(repos: Repositories, id: number, archivedAt: Date | null): Promise<T>;
  owner(id: number): OwnerRef;
  countDonations(repos: Repositories, id: number): Promise<number>;
  remove(repos: Repositories, id: number): Promise<void>;
  beforeRestore?(repos: Repositories, record: T): Promise<void>;
  beforeDelete?(record: T): void;
}

const donorGateway: EntityGateway<Donor> = {
  label: 'donor',
  resource: 'Donor',
  find: (repos, id, forUpdate) => repos.donors.findById(id, { forUpdate }),
  setArchivedAt: (repos, id, archivedAt) => repos.donors.update(id, { archivedAt }),
  owner: (id) => ({ donorId: id }),
  countDonations: (repos, id) => repos.donations.countBy({ donorId: id }),
  remove: (repos, id) => repos.donors.delete(id),
  async beforeRestore(repos, donor) {
    if (donor.mergedIntoId !== null) {
      throw ValidationError.base(`Cannot restore donor merged into donor ${donor.mergedIntoId}`);
    }
    const holder = await repos.donors.findKeptByEmail(donor.email);
    if (holder && holder.id !== donor.id) {
      throw ValidationError.field('email', EMAIL_TAKEN_MESSAGE);
    }
  },
};

const childGateway: EntityGateway<Child> = {
  label: 'child',
  resource: 'Child',
  find: (repos, id, forUpdate) => repos.children.findById(id, { forUpdate }),
  setArchivedAt: (repos, id, archivedAt) => repos.children.update(id, { archivedAt }),
  owner: (id) => ({ childId: id }),
  countDonations: (repos, id) => repos.donations.countBy({ childId: id }),
  remove: (repos, id) => repos.children.delete(id),
};

const projectGateway: EntityGateway<Project> = {
  label: 'project',
  resource: 'Project',
  find: (repos, id, forUpdate) => repos.projects.findById(id, { forUpdate }),
  setArchivedAt: (repos, id, archivedAt) => repos.projects.update(id, { archivedAt }),
  owner: (id) => ({ projectId: id }),
  countDonations: (repos, id) => repos.donations.countBy({ projectId: id }),
  remove: (repos, id) => repos.projects.delete(id),
  beforeDelete(project) {
    if (project.system) {
      throw ValidationError.base('Cannot delete system projects');
    }
  },
};

/**
 * Archive, restore and hard delete for donors, children and projects, plus the
 * implicit restore used when new work attaches to an archived record.
 */
export class ArchiveService {
  constructor(
    private readonly uow: UnitOfWork,
    private readonly options: ResolvedServiceOptions
  ) {}

  async archive(entityType: ArchivableEntity, id: number): Promise<ArchivableRecord> {
    return this.uow.transaction<ArchivableRecord>((repos) => this.archiveIn(repos, entityType, id));
  }

  async restore(entityType: ArchivableEntity, id: number): Promise<ArchivableRecord> {
    return this.uow.transaction<ArchivableRecord>((repos) => {
      switch (entityType) {
        case 'donor':
          return this.restoreWith(donorGateway, repos, id);
        case 'child':
          return this.restoreWith(childGateway, repos, id);
        case 'project':
          return this.restoreWith(projectGateway, repos, id);
      }
    });
  }

  async hardDelete(entityType: ArchivableEntity, id: number): Promise<void> {
    await this.uow.transaction((repos) => {
      switch (entityType) {
        case 'donor':
          return this.deleteWith(donorGateway, repos, id);
        case 'child':
          return this.deleteWith(childGateway, repos, id);
        case 'project':
          return this.deleteWith(projectGateway, repos, id);
      }
    });
  }

  archiveIn(repos: Repositories, entityType: ArchivableEntity, id: number): Promise<ArchivableRecord> {
    switch (entityType) {
      case 'donor':
        return this.archiveDonorIn(repos, id);
      case 'child':
        return this.archiveWith(childGateway, repos, id);
      case 'project':
        return this.archiveWith(projectGateway, repos, id);
    }
  }

  archiveDonorIn(repos: Repositories, id: number): Promise<Donor> {
    return this.archiveWith(donorGateway, repos, id);
  }

  restoreDonorIfArchived(repos: Repositories, donor: Donor): Promise<Donor> {
    return this.restoreIfArchived(donorGateway, repos, donor);
  }

  restoreChildIfArchived(repos: Repositories, child: Child): Promise<Child> {
    return this.restoreIfArchived(childGateway, repos, child);
  }

  restoreProjectIfArchived(repos: Repositories, project: Project): Promise<Project> {
    return this.restoreIfArchived(projectGateway, repos, project);
  }

  private async load<T extends { id: number; archivedAt: Date | null }>(
    gateway: EntityGateway<T>,
    repos: Repositories,
    id: number,
    forUpdate = false
  ): Promise<T> {
    const record = await gateway.find(repos, id, forUpdate);
    if (!record) {
      throw new NotFoundError(gateway.resource, id);
    }
    return record;
  }

  private async archiveWith<T extends { id: number; archivedAt: Date | null }>(
    gateway: EntityGateway<T>,
    repos: Repositories,
    id: number
  ): Promise<T> {
    // Row lock keeps a concurrent sponsorship insert from slipping past the check
    const record = await this.load(gateway, repos, id, true);
    if (record.archivedAt !== null) {
      return record;
    }

    const active = await repos.sponsorships.countBy(gateway.owner(id), { activeOnly: true });
    if (active > 0) {
      throw ValidationError.base(`Cannot archive ${gateway.label} with active sponsorships`);
    }

    const archived = await gateway.setArchivedAt(repos, id, this.options.clock.now());
    logger.info(`Archived ${gateway.label} ${id}`);
    return archived;
  }

  private async restoreWith<T extends { id: number; archivedAt: Date | null }>(
    gateway: EntityGateway<T>,
    repos: Repositories,
    id: number
  ): Promise<T> {
    const record = await this.load(gateway, repos, id);
    if (gateway.beforeRestore) {
      await gateway.beforeRestore(repos, record);
    }
    if (record.archivedAt === null) {
      return record;
    }
    const restored = await gateway.setArchivedAt(repos, id, null);
    logger.info(`Restored ${gateway.label} ${id}`);
    return restored;
  }

  private async restoreIfArchived<T extends { id: number; archivedAt: Date | null }>(
    gateway: EntityGateway<T>,
    repos: Repositories,
    record: T
  ): Promise<T> {
    // Decide on the locked row: a concurrent archive either commits first or waits for us
    const current = await this.load(gateway, repos, record.id, true);
    if (current.archivedAt === null) {
      return current;
    }
    if (gateway.beforeRestore) {
      await gateway.beforeRestore(repos, current);
    }
    const restored = await gateway.setArchivedAt(repos, current.id, null);
    logger.info(`Implicitly restored ${gateway.label} ${current.id}`);
    return restored;
  }

  private async deleteWith<T extends { id: number; archivedAt: Date | null }>(
    gateway: EntityGateway<T>,
    repos: Repositories,
    id: number
  ): Promise<void> {
    const record = await this.load(gateway, repos, id, true);
    gateway.beforeDelete?.(record);

    const donations = await gateway.countDonations(repos, id);
    const sponsorships = await repos.sponsorships.countBy(gateway.owner(id));
    if (donations > 0 || sponsorships > 0) {
      throw ValidationError.base(`Cannot delete ${gateway.label} with existing donations or sponsorships`);
    }

    await gateway.remove(repos, id);
    logger.info(`Deleted ${gateway.label} ${id}`);
  }
}
