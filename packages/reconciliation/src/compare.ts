import type { ScrapedPosting } from '@boardwatch/source-sdk';

/**
 * Fields that decide whether a posting changed. URLs, requirements, salary,
 * remote metadata and rawData never count as a change.
 */
export const COMPARED_FIELDS = ['title', 'team', 'location', 'employmentType', 'description'] as const;

export type ComparedField = (typeof COMPARED_FIELDS)[number];

type Comparable = Pick<ScrapedPosting, ComparedField>;

export function changedFields(previous: Comparable, current: Comparable): ComparedField[] {
  // Absent and empty are the same value.
  return COMPARED_FIELDS.filter((field) => (previous[field] ?? '') !== (current[field] ?? ''));
}

export function hasChanged(previous: Comparable, current: Comparable): boolean {
  return changedFields(previous, current).length > 0;
}
