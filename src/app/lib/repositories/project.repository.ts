import { and, asc, count, eq } from 'drizzle-orm';
import type { DbExecutor } from '@/app/lib/db';
import { projects } from '@/app/lib/db/schema';
import type { ProjectType } from '@/app/lib/db/schema/enums';
import { NotFoundError } from '@/app/lib/errors';
import { visibilityCondition } from '@/app/lib/repositories/conditions';
import type {
  FindOptions,
  ListOptions,
  NewProject,
  Project,
  ProjectChanges,
  ProjectRepository,
} from '@/app/lib/repositories/types';

export class DrizzleProjectRepository implements ProjectRepository {
  constructor(private readonly db: DbExecutor) {}

  async findById(id: number, options: FindOptions = {}): Promise<Project | undefined> {
    const query = this.db.select().from(projects).where(eq(projects.id, id)).limit(1);
    const [project] = options.forUpdate ? await query.for('update') : await query;
    return project;
  }

  async findSystemProject(title: string, projectType: ProjectType): Promise<Project | undefined> {
    const [project] = await this.db
      .select()
      .from(projects)
      .where(and(eq(projects.title, title), eq(projects.projectType, projectType), eq(projects.system, true)))
      .orderBy(asc(projects.id))
      .limit(1);
    return project;
  }

  async list({ visibility, limit, offset }: ListOptions): Promise<{ projects: Project[]; totalCount: number }> {
    const where = visibilityCondition(projects.archivedAt, visibility);

    let query = this.db.select().from(projects).where(where).orderBy(asc(projects.title), asc(projects.id)).$dynamic();
    if (limit !== undefined) query = query.limit(limit);
    if (offset !== undefined) query = query.offset(offset);

    const rows = await query;
    const [total] = await this.db.select({ value: count() }).from(projects).where(where);
    return { projects: rows, totalCount: total?.value ?? 0 };
  }

  async insert(values: NewProject): Promise<Project> {
    const [project] = await this.db.insert(projects).values(values).returning();
    return project;
  }

  async update(id: number, changes: ProjectChanges): Promise<Project> {
    const [project] = await this.db
      .update(projects)
      .set({ ...changes, updatedAt: new Date() })
      .where(eq(projects.id, id))
      .returning();
    if (!project) {
      throw new NotFoundError('Project', id);
    }
    return project;
  }

  async delete(id: number): Promise<void> {
    await this.db.delete(projects).where(eq(projects.id, id));
  }
}
