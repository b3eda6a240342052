import { z } from 'zod';
import type { Posting } from './types.js';

export const sourceKindSchema = z.enum(['greenhouse', 'lever', 'ashby', 'workday']);

export const postingStatusSchema = z.enum(['new', 'active', 'updated', 'closed']);

/**
 * Company identifiers end up inside job ids, so ':' and whitespace are out.
 */
export const companyIdSchema = z.string().regex(/^[a-z0-9][a-z0-9_-]*$/, 'company id must match [a-z0-9][a-z0-9_-]*');

const isoTimestamp = z.string().datetime({ offset: true });

export const postingRecordSchema = z
  .object({
    jobId: z.string().min(1),
    source: sourceKindSchema,
    company: z.string().min(1),
    companyName: z.string().min(1),
    externalId: z.string().min(1),
    title: z.string().min(1),
    team: z.string().optional(),
    location: z.string().optional(),
    employmentType: z.string().optional(),
    description: z.string().optional(),
    requirements: z.array(z.string()).optional(),
    jobUrl: z.string().min(1),
    applyUrl: z.string().optional(),
    sourceUrl: z.string().min(1),
    salaryRange: z.string().optional(),
    remotePolicy: z.string().optional(),
    experienceLevel: z.string().optional(),
    firstSeen: isoTimestamp,
    lastSeen: isoTimestamp,
    updatedAt: isoTimestamp.optional(),
    status: postingStatusSchema,
    rawData: z.record(z.string(), z.unknown()).optional(),
  })
  .refine((record) => Date.parse(record.firstSeen) <= Date.parse(record.lastSeen), {
    message: 'firstSeen must not be after lastSeen',
    path: ['firstSeen'],
  });

/**
 * Serialized posting: dates as ISO strings. Undefined fields drop out when
 * the record is written as JSON.
 */
export type PostingRecord = z.infer<typeof postingRecordSchema>;

export interface ValidatePostingRecordsOptions {
  onInvalid?: (issues: z.ZodIssue[], record: unknown) => void;
}

export function validatePostingRecords(records: unknown[], options?: ValidatePostingRecordsOptions): PostingRecord[] {
  const valid: PostingRecord[] = [];

  for (const record of records) {
    const result = postingRecordSchema.safeParse(record);
    if (result.success) {
      valid.push(result.data);
    } else {
      options?.onInvalid?.(result.error.issues, record);
    }
  }

  return valid;
}

export function toPostingRecord(posting: Posting): PostingRecord {
  return {
    jobId: posting.jobId,
    source: posting.source,
    company: posting.company,
    companyName: posting.companyName,
    externalId: posting.externalId,
    title: posting.title,
    team: posting.team,
    location: posting.location,
    employmentType: posting.employmentType,
    description: posting.description,
    requirements: posting.requirements ? [...posting.requirements] : undefined,
    jobUrl: posting.jobUrl,
    applyUrl: posting.applyUrl,
    sourceUrl: posting.sourceUrl,
    salaryRange: posting.salaryRange,
    remotePolicy: posting.remotePolicy,
    experienceLevel: posting.experienceLevel,
    firstSeen: posting.firstSeen.toISOString(),
    lastSeen: posting.lastSeen.toISOString(),
    updatedAt: posting.updatedAt?.toISOString(),
    status: posting.status,
    rawData: posting.rawData,
  };
}

export function fromPostingRecord(record: PostingRecord): Posting {
  return {
    ...record,
    requirements: record.requirements ? [...record.requirements] : undefined,
    firstSeen: new Date(record.firstSeen),
    lastSeen: new Date(record.lastSeen),
    updatedAt: record.updatedAt ? new Date(record.updatedAt) : undefined,
  };
}
