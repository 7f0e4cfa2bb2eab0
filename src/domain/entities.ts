import { z } from 'zod';

export const LEAD_STATUSES = ['new', 'contacted', 'qualified', 'lost', 'converted'] as const;
export const OFFER_STATUSES = ['draft', 'sent', 'accepted', 'rejected', 'expired'] as const;
export const INSTALLATION_STATUSES = ['pending', 'scheduled', 'in_progress', 'done', 'undone'] as const;

export type LeadStatus = (typeof LEAD_STATUSES)[number];
export type OfferStatus = (typeof OFFER_STATUSES)[number];
export type InstallationStatus = (typeof INSTALLATION_STATUSES)[number];

export const SEARCHABLE_ENTITY_TYPES = ['lead', 'offer', 'installation', 'document'] as const;
export type SearchableEntityType = (typeof SEARCHABLE_ENTITY_TYPES)[number];

export const DOC_LEVELS = ['doc_category', 'doc_subcategory', 'doc_subsubcategory', 'document'] as const;
export type DocLevel = (typeof DOC_LEVELS)[number];

export type EntityType =
  | SearchableEntityType
  | 'lead_activity'
  | 'notification'
  | 'technician'
  | 'company'
  | 'doc_category'
  | 'doc_subcategory'
  | 'doc_subsubcategory';

export function isSearchable(entityType: EntityType): entityType is SearchableEntityType {
  return (SEARCHABLE_ENTITY_TYPES as readonly string[]).includes(entityType);
}

/** Columns every relational row carries. */
const rowBase = {
  id: z.string().min(1),
  version: z.number().int().min(1),
  created_at: z.string(),
  updated_at: z.string(),
  deleted_at: z.string().nullable().default(null),
};

export const storedRecordSchema = z.object(rowBase).passthrough();
export type StoredRecord = z.infer<typeof storedRecordSchema>;

export const leadSchema = z.object({
  ...rowBase,
  company_id: z.string().nullable(),
  company_name: z.string(),
  contact_name: z.string().nullable(),
  email: z.string().nullable(),
  phone: z.string().nullable(),
  owner_user_id: z.string().nullable(),
  status: z.enum(LEAD_STATUSES),
  notes: z.string().nullable(),
  loss_reason: z.string().nullable(),
  lead_source: z.string().nullable(),
  next_follow_up_date: z.string().nullable().default(null),
});
export type Lead = z.infer<typeof leadSchema>;

export const ACTIVITY_TYPES = [
  'note',
  'call',
  'email_out',
  'email_in',
  'meeting',
  'demo',
  'offer_sent',
  'status_change',
  'field_change',
  'task_completed',
] as const;
export type ActivityType = (typeof ACTIVITY_TYPES)[number];

/** Append-only history entry of a lead. Never projected into the index. */
export const leadActivitySchema = z.object({
  ...rowBase,
  lead_id: z.string(),
  type: z.enum(ACTIVITY_TYPES),
  content: z.string().nullable(),
  author_id: z.string().nullable(),
});
export type LeadActivity = z.infer<typeof leadActivitySchema>;

export const offerItemSchema = z.object({
  description: z.string().min(1),
  quantity: z.number().positive(),
  unit_price: z.number().min(0),
});
export type OfferItem = z.infer<typeof offerItemSchema>;

/** Searchable text of an offer's line items, stored beside them as `item_text`. */
export function describeItems(items: OfferItem[]): string {
  return items.map((item) => item.description).join(' ');
}

export const offerSchema = z.object({
  ...rowBase,
  lead_id: z.string(),
  amount: z.number(),
  items: z.array(offerItemSchema),
  status: z.enum(OFFER_STATUSES),
  valid_until: z.string().nullable(),
  sent_at: z.string().nullable(),
  decided_at: z.string().nullable(),
  notes: z.string().nullable(),
});
export type Offer = z.infer<typeof offerSchema>;

export const installationSchema = z.object({
  ...rowBase,
  lead_id: z.string(),
  offer_id: z.string(),
  company_id: z.string().nullable(),
  scheduled_date: z.string().nullable(),
  technician_id: z.string().nullable(),
  deadline_at: z.string().nullable(),
  status: z.enum(INSTALLATION_STATUSES),
  started_at: z.string().nullable(),
  finished_at: z.string().nullable(),
  notes: z.string().nullable(),
});
export type Installation = z.infer<typeof installationSchema>;

export const technicianSchema = z.object({
  ...rowBase,
  name: z.string(),
  is_active: z.boolean(),
  availability: z.record(z.unknown()).nullable().default(null),
});
export type Technician = z.infer<typeof technicianSchema>;

export const companySchema = z.object({
  ...rowBase,
  name: z.string(),
  contact_user_id: z.string().nullable(),
});
export type Company = z.infer<typeof companySchema>;

export const sourceRefSchema = z.object({
  entity_type: z.string(),
  id: z.string(),
  version: z.number().int(),
});
export type SourceRef = z.infer<typeof sourceRefSchema>;

export const NOTIFICATION_KINDS = [
  'lead_contacted',
  'lead_lost',
  'offer_sent',
  'offer_rejected',
  'offer_expired',
  'installation_scheduled',
  'installation_done',
  'installation_undone',
  'lead_follow_up_due',
  'offer_stale',
] as const;
export type NotificationKind = (typeof NOTIFICATION_KINDS)[number];

export const notificationSchema = z.object({
  ...rowBase,
  recipient_id: z.string(),
  kind: z.enum(NOTIFICATION_KINDS),
  message: z.string(),
  source: sourceRefSchema,
  is_read: z.boolean(),
});
export type Notification = z.infer<typeof notificationSchema>;

export const docCategorySchema = z.object({
  ...rowBase,
  name: z.string(),
});
export const docSubcategorySchema = docCategorySchema.extend({ category_id: z.string() });
export const docSubsubcategorySchema = docCategorySchema.extend({ subcategory_id: z.string() });
export const docStepSchema = z.object({
  ...rowBase,
  subsubcategory_id: z.string(),
  title: z.string(),
  description: z.string().nullable(),
  solution: z.string().nullable(),
  image_path: z.string().nullable(),
  status: z.string().nullable(),
});
export type DocCategory = z.infer<typeof docCategorySchema>;
export type DocSubcategory = z.infer<typeof docSubcategorySchema>;
export type DocSubsubcategory = z.infer<typeof docSubsubcategorySchema>;
export type DocStep = z.infer<typeof docStepSchema>;

/**
 * Derived copy of a searchable record as stored in the full-text index.
 * `version` is the relational version it was built from.
 */
export const searchProjectionSchema = z.object({
  entity_type: z.enum(SEARCHABLE_ENTITY_TYPES),
  id: z.string(),
  version: z.number().int(),
  title: z.string(),
  body: z.string(),
  status: z.string().nullable(),
  owner_id: z.string().nullable(),
  company_id: z.string().nullable(),
  created_at: z.string(),
  updated_at: z.string(),
  deleted: z.boolean(),
});
export type SearchProjection = z.infer<typeof searchProjectionSchema>;

export interface Page<T> {
  items: T[];
  total: number;
  page: number;
  pageSize: number;
}
