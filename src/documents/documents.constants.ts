export const SOURCE_DOCUMENT_REPOSITORY = 'SOURCE_DOCUMENT_REPOSITORY';
