export { METADATA_PROMPT } from './metadata';
export { EXTRACTION_PROMPT } from './extraction';
export { REFINEMENT_PROMPT } from './refinement';
export { DEDUPLICATION_PROMPT } from './deduplication';
