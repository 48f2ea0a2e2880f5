export const PROJECT_REPOSITORY = 'PROJECT_REPOSITORY';

/** Blob store prefix for consultation rules (RC) files */
export const RC_STORAGE_PREFIX = 'rc';

/** RC context characters appended to a section's search query */
export const RC_QUERY_CHARS = 1000;
