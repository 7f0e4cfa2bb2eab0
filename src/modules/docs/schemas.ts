import { z } from 'zod';

export const DOC_LEVEL_NAMES = ['categories', 'subcategories', 'subsubcategories', 'steps'] as const;
export type DocLevelName = (typeof DOC_LEVEL_NAMES)[number];

const name = z.string().trim().min(1).max(200);
const parentId = z.string().min(1);
const optionalText = z.string().nullable().default(null);

export const DOC_INPUT_SCHEMAS = {
  categories: z.object({ name }),
  subcategories: z.object({ name, category_id: parentId }),
  subsubcategories: z.object({ name, subcategory_id: parentId }),
  steps: z.object({
    subsubcategory_id: parentId,
    title: name,
    description: optionalText,
    solution: optionalText,
    image_path: optionalText,
    status: z.string().min(1).nullable().default('active'),
  }),
} satisfies Record<DocLevelName, z.ZodTypeAny>;

/** Editable fields per level. The parent reference is fixed at creation. */
export const DOC_PATCH_SCHEMAS = {
  categories: DOC_INPUT_SCHEMAS.categories.partial().strict(),
  subcategories: DOC_INPUT_SCHEMAS.subcategories.omit({ category_id: true }).partial().strict(),
  subsubcategories: DOC_INPUT_SCHEMAS.subsubcategories.omit({ subcategory_id: true }).partial().strict(),
  steps: DOC_INPUT_SCHEMAS.steps.omit({ subsubcategory_id: true }).partial().strict(),
} satisfies Record<DocLevelName, z.ZodTypeAny>;

/** Unknown keys pass through so the hierarchy can refuse parent changes by name. */
export const docPatchSchema = z
  .object({
    version: z.number().int().min(1).optional(),
  })
  .passthrough();
