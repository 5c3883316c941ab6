import { z } from 'zod';
import { BACKEND_KINDS, JOB_STATUSES } from '@reelqueue/shared';

export const limitSchema = z.preprocess(
  (val) => (val === undefined || val === null || val === '' ? 50 : val),
  z.coerce
    .number()
    .int()
    .min(1, 'limit must be at least 1')
    .max(200, 'limit must be at most 200'),
);

export const backendSchema = z.enum(BACKEND_KINDS);

export const jobIdSchema = z.coerce
  .number()
  .int()
  .positive('id must be a positive integer')
  .max(2_147_483_647, 'id is out of range');

export const getJobsQuerySchema = z.object({
  limit: limitSchema,
  status: z.enum(JOB_STATUSES).optional(),
  backend: backendSchema.optional(),
});

export type GetJobsQuery = z.infer<typeof getJobsQuerySchema>;

export const submitJobBodySchema = z.object({
  backend: backendSchema,
  source_path: z.string().trim().min(1, 'source_path must be a non-empty string'),
  params: z.record(z.unknown()).default({}),
});

export type SubmitJobBody = z.infer<typeof submitJobBodySchema>;
