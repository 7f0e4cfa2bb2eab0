import { z } from 'zod';
import { ACTIVITY_TYPES, LEAD_STATUSES, offerItemSchema } from '../../domain/entities.js';

const optionalText = z.string().trim().min(1).nullable().default(null);
const isoDate = z.string().refine((value) => !Number.isNaN(Date.parse(value)), 'Expected an ISO date');
const calendarDay = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected YYYY-MM-DD')
  .refine((value) => !Number.isNaN(Date.parse(value)), 'Expected a valid date');
const page = z.coerce.number().int().min(1).default(1);
const pageSize = z.coerce.number().int().min(1).max(100).default(20);

/** Optimistic concurrency token a caller may send with any mutation. */
export const versionSchema = z.object({
  version: z.number().int().min(1).optional(),
});

export const leadInputSchema = z.object({
  company_name: z.string().trim().min(1),
  company_id: optionalText,
  contact_name: optionalText,
  email: z.string().email().nullable().default(null),
  phone: optionalText,
  owner_user_id: optionalText,
  notes: optionalText,
  lead_source: optionalText,
  next_follow_up_date: calendarDay.nullable().default(null),
});
export type LeadInput = z.infer<typeof leadInputSchema>;

export const leadPatchSchema = leadInputSchema.partial().merge(versionSchema);
export type LeadPatch = z.infer<typeof leadPatchSchema>;

export const leadListQuerySchema = z.object({
  page,
  page_size: pageSize,
  status: z.enum(LEAD_STATUSES).optional(),
  owner_user_id: z.string().min(1).optional(),
  q: z.string().trim().min(1).optional(),
  /** `followup`: open leads whose follow-up date has come. `stale`: leads with a sent offer gone quiet. */
  due: z.enum(['followup', 'stale']).optional(),
});
export type LeadListQuery = z.infer<typeof leadListQuerySchema>;

export const activityInputSchema = z.object({
  type: z.enum(ACTIVITY_TYPES),
  content: optionalText,
});
export type ActivityInput = z.infer<typeof activityInputSchema>;

export const markLostSchema = versionSchema.extend({
  reason: z.string().trim().min(1).nullable().default(null),
});

export const offerInputSchema = z.object({
  items: z.array(offerItemSchema).min(1),
  notes: optionalText,
  valid_until: isoDate.nullable().default(null),
});
export type OfferInput = z.infer<typeof offerInputSchema>;

export const offerPatchSchema = offerInputSchema.partial().merge(versionSchema);
export type OfferPatch = z.infer<typeof offerPatchSchema>;

export const sendOfferSchema = versionSchema.extend({
  valid_until: isoDate.optional(),
});

export const offerDecisionSchema = versionSchema.extend({
  status: z.enum(['accepted', 'rejected']),
});
export type OfferDecision = z.infer<typeof offerDecisionSchema>['status'];

export const scheduleInputSchema = versionSchema.extend({
  scheduled_date: isoDate,
  technician_id: z.string().min(1),
  deadline_at: isoDate.optional(),
});
export type ScheduleInput = z.infer<typeof scheduleInputSchema>;

export const undoneJobsQuerySchema = z.object({
  page,
  page_size: pageSize,
  company_id: z.string().min(1).optional(),
  technician_id: z.string().min(1).optional(),
  q: z.string().trim().min(1).optional(),
});
export type UndoneJobsQuery = z.infer<typeof undoneJobsQuerySchema>;
