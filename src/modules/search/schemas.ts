import { z } from 'zod';
import { SEARCHABLE_ENTITY_TYPES } from '../../domain/entities.js';

const day = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected YYYY-MM-DD');

export const searchFiltersSchema = z.object({
  query: z.string().trim().default(''),
  entity_types: z.array(z.enum(SEARCHABLE_ENTITY_TYPES)).default([]),
  status: z.array(z.string().min(1)).default([]),
  owner_id: z.string().min(1).optional(),
  company_id: z.string().min(1).optional(),
  date_from: day.optional(),
  date_to: day.optional(),
  keywords_operator: z.enum(['and', 'or', 'any']).default('or'),
  page: z.coerce.number().int().min(1).default(1),
  page_size: z.coerce.number().int().min(1).max(100).default(20),
});
export type SearchFilters = z.infer<typeof searchFiltersSchema>;

export const simpleSearchSchema = z.object({
  query: z.string().trim().min(1),
  page: z.coerce.number().int().min(1).default(1),
  page_size: z.coerce.number().int().min(1).max(100).default(20),
});
export type SimpleSearch = z.infer<typeof simpleSearchSchema>;
