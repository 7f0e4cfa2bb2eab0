export { DocsHierarchy } from './hierarchy.js';
export type { DocNode } from './hierarchy.js';
export { DOC_INPUT_SCHEMAS, DOC_LEVEL_NAMES, DOC_PATCH_SCHEMAS, docPatchSchema } from './schemas.js';
export type { DocLevelName } from './schemas.js';
