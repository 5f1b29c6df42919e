import { eq, isNotNull, isNull, type SQL } from 'drizzle-orm';
import type { AnyPgColumn } from 'drizzle-orm/pg-core';
import type { Visibility } from '@/app/lib/utils/visibility';
import type { OwnerRef } from '@/app/lib/repositories/types';

/**
 * SQL counterpart of isVisible(). `with_archived` adds no condition.
 */
export function visibilityCondition(archivedAt: AnyPgColumn, visibility: Visibility): SQL | undefined {
  switch (visibility) {
    case 'kept':
      return isNull(archivedAt);
    case 'archived_only':
      return isNotNull(archivedAt);
    case 'with_archived':
      return undefined;
  }
}

interface OwnedTable {
  donorId: AnyPgColumn;
  childId: AnyPgColumn;
  projectId: AnyPgColumn;
}

export function ownerCondition(table: OwnedTable, owner: OwnerRef): SQL {
  if ('donorId' in owner) return eq(table.donorId, owner.donorId);
  if ('childId' in owner) return eq(table.childId, owner.childId);
  return eq(table.projectId, owner.projectId);
}
