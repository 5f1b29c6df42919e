import { NotFoundError, ValidationError } from '@/app/lib/errors';
import type { ChildGender } from '@/app/lib/db/schema/enums';
import type { Child, ChildChanges, Repositories, UnitOfWork } from '@/app/lib/repositories/types';
import { isBlank } from '@/app/lib/utils/donor-identity';
import type { Visibility } from '@/app/lib/utils/visibility';

export interface ChildInput {
  name: string;
  gender?: ChildGender | null;
}

export class ChildrenService {
  constructor(private readonly uow: UnitOfWork) {}

  async createChild(input: ChildInput): Promise<Child> {
    if (isBlank(input.name)) {
      throw ValidationError.field('name', "can't be blank");
    }
    return this.uow.transaction((repos) =>
      repos.children.insert({ name: input.name.trim(), gender: input.gender ?? null })
    );
  }

  async updateChild(id: number, input: Partial<ChildInput>): Promise<Child> {
    return this.uow.transaction(async (repos) => {
      await this.getChildIn(repos, id);

      const changes: ChildChanges = {};
      if (input.name !== undefined) {
        if (isBlank(input.name)) {
          throw ValidationError.field('name', "can't be blank");
        }
        changes.name = input.name.trim();
      }
      if (input.gender !== undefined) changes.gender = input.gender;

      return repos.children.update(id, changes);
    });
  }

  async getChild(id: number): Promise<Child> {
    return this.uow.transaction((repos) => this.getChildIn(repos, id));
  }

  async listChildren({
    visibility = 'kept',
    limit,
    offset,
  }: { visibility?: Visibility; limit?: number; offset?: number } = {}) {
    return this.uow.transaction((repos) => repos.children.list({ visibility, limit, offset }));
  }

  async getChildIn(repos: Repositories, id: number): Promise<Child> {
    const child = await repos.children.findById(id);
    if (!child) {
      throw new NotFoundError('Child', id);
    }
    return child;
  }
}
