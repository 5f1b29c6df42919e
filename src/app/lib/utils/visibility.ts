/**
 * Which soft-deleted rows a listing includes. Every listing takes one
 * explicitly; there is no implicit default scope.
 */
export const VISIBILITIES = ['kept', 'with_archived', 'archived_only'] as const;
export type Visibility = (typeof VISIBILITIES)[number];

export interface SoftDeletable {
  archivedAt: Date | null;
}

export function isArchived(record: SoftDeletable): boolean {
  return record.archivedAt !== null;
}

export function isVisible(record: SoftDeletable, visibility: Visibility): boolean {
  switch (visibility) {
    case 'kept':
      return record.archivedAt === null;
    case 'archived_only':
      return record.archivedAt !== null;
    case 'with_archived':
      return true;
  }
}

/**
 * Donor variant: donors merged into another donor never show up, whatever the visibility.
 */
export function isDonorVisible(
  donor: SoftDeletable & { mergedIntoId: number | null },
  visibility: Visibility
): boolean {
  return donor.mergedIntoId === null && isVisible(donor, visibility);
}
