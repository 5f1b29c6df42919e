import { logger } from '@/app/lib/logger';
import { NotFoundError, ValidationError } from '@/app/lib/errors';
import type { ProjectType } from '@/app/lib/db/schema/enums';
import type { Project, ProjectChanges, Repositories, UnitOfWork } from '@/app/lib/repositories/types';
import { isBlank } from '@/app/lib/utils/donor-identity';
import type { Visibility } from '@/app/lib/utils/visibility';
import type { ResolvedServiceOptions } from '@/app/lib/services/service-options';

export interface ProjectInput {
  title: string;
  description?: string | null;
  projectType?: Exclude<ProjectType, 'sponsorship'>;
}

export interface ListProjectsInput {
  visibility?: Visibility;
  limit?: number;
  offset?: number;
}

/**
 * Service for general and campaign projects. Sponsorship projects are only
 * ever provisioned by the sponsorship matcher.
 */
export class ProjectsService {
  constructor(
    private readonly uow: UnitOfWork,
    private readonly options: ResolvedServiceOptions
  ) {}

  async createProject(input: ProjectInput): Promise<Project> {
    if (isBlank(input.title)) {
      throw ValidationError.field('title', "can't be blank");
    }
    const project = await this.uow.transaction((repos) =>
      repos.projects.insert({
        title: input.title.trim(),
        description: input.description ?? null,
        projectType: input.projectType ?? 'general',
        system: false,
      })
    );
    logger.info(`Created project ${project.id} (${project.projectType})`);
    return project;
  }

  /**
   * System projects are read-only
   */
  async updateProject(id: number, input: Partial<ProjectInput>): Promise<Project> {
    return this.uow.transaction(async (repos) => {
      const project = await this.getProjectIn(repos, id);
      if (project.system) {
        throw ValidationError.base('Cannot update system projects');
      }

      const changes: ProjectChanges = {};
      if (input.title !== undefined) {
        if (isBlank(input.title)) {
          throw ValidationError.field('title', "can't be blank");
        }
        changes.title = input.title.trim();
      }
      if (input.description !== undefined) changes.description = input.description;
      if (input.projectType !== undefined) {
        if (project.projectType === 'sponsorship') {
          throw ValidationError.field('project_type', 'cannot change on a sponsorship project');
        }
        changes.projectType = input.projectType;
      }

      return repos.projects.update(id, changes);
    });
  }

  async getProject(id: number): Promise<Project> {
    return this.uow.transaction((repos) => this.getProjectIn(repos, id));
  }

  async listProjects({ visibility = 'kept', limit, offset }: ListProjectsInput = {}) {
    return this.uow.transaction((repos) => repos.projects.list({ visibility, limit, offset }));
  }

  async getGeneralFundProject(): Promise<Project> {
    return this.uow.transaction((repos) => this.generalFundIn(repos));
  }

  async getProjectIn(repos: Repositories, id: number): Promise<Project> {
    const project = await repos.projects.findById(id);
    if (!project) {
      throw new NotFoundError('Project', id);
    }
    return project;
  }

  /**
   * Finds or creates the system project that takes donations with no other destination.
   */
  async generalFundIn(repos: Repositories): Promise<Project> {
    const title = this.options.generalFundTitle;
    const existing = await repos.projects.findSystemProject(title, 'general');
    if (existing) {
      return existing;
    }
    const created = await repos.projects.insert({ title, projectType: 'general', system: true });
    logger.info(`Created general fund project ${created.id}`);
    return created;
  }
}
