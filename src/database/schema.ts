import {
  mysqlTable,
  varchar,
  timestamp,
  text,
  mediumtext,
  int,
  boolean,
  mysqlEnum,
  json,
  index,
  uniqueIndex,
} from 'drizzle-orm/mysql-core';

/**
 * Reference memoirs uploaded to the blob store
 */
export const sourceDocuments = mysqlTable('source_documents', {
  id: varchar('id', { length: 36 }).primaryKey(),
  filename: varchar('filename', { length: 500 }).notNull(),
  storagePath: varchar('storage_path', { length: 1000 }).notNull(),
  client: varchar('client', { length: 255 }),
  year: int('year'),
  parsed: boolean('parsed').notNull().default(false),
  indexed: boolean('indexed').notNull().default(false),
  createdAt: timestamp('created_at').notNull().defaultNow(),
});

export type SourceDocument = typeof sourceDocuments.$inferSelect;
export type NewSourceDocument = typeof sourceDocuments.$inferInsert;

/**
 * Sliding-window chunks of a document's cleaned text.
 * Vectors live in Qdrant; `embedded` mirrors whether the chunk's point exists.
 */
export const chunks = mysqlTable(
  'chunks',
  {
    id: varchar('id', { length: 36 }).primaryKey(),
    documentId: varchar('document_id', { length: 36 })
      .notNull()
      .references(() => sourceDocuments.id, { onDelete: 'cascade' }),
    content: text('content').notNull(),
    chunkIndex: int('chunk_index').notNull(),
    charStart: int('char_start').notNull(),
    charEnd: int('char_end').notNull(),
    tokens: int('tokens').notNull().default(0),
    metadata: json('metadata').$type<Record<string, unknown>>().notNull(),
    embedded: boolean('embedded').notNull().default(false),
    createdAt: timestamp('created_at').notNull().defaultNow(),
  },
  (table) => [
    index('idx_document_id').on(table.documentId),
    uniqueIndex('uq_document_chunk').on(table.documentId, table.chunkIndex),
  ],
);

export type ChunkRow = typeof chunks.$inferSelect;
export type NewChunkRow = typeof chunks.$inferInsert;

/**
 * Tender projects a memoir is being drafted for
 */
export const projects = mysqlTable('projects', {
  id: varchar('id', { length: 36 }).primaryKey(),
  name: varchar('name', { length: 255 }).notNull(),
  rcStoragePath: varchar('rc_storage_path', { length: 1000 }),
  rcContext: mediumtext('rc_context'),
  status: mysqlEnum('status', ['draft', 'in_progress', 'completed'])
    .notNull()
    .default('draft'),
  createdAt: timestamp('created_at').notNull().defaultNow(),
});

export type Project = typeof projects.$inferSelect;
export type NewProject = typeof projects.$inferInsert;

/**
 * Drafted memoir sections (markdown)
 */
export const sections = mysqlTable(
  'sections',
  {
    id: varchar('id', { length: 36 }).primaryKey(),
    projectId: varchar('project_id', { length: 36 })
      .notNull()
      .references(() => projects.id, { onDelete: 'cascade' }),
    sectionType: varchar('section_type', { length: 64 }).notNull(),
    title: varchar('title', { length: 500 }).notNull(),
    content: mediumtext('content').notNull(),
    orderNum: int('order_num').notNull(),
    inputTokens: int('input_tokens').notNull().default(0),
    outputTokens: int('output_tokens').notNull().default(0),
    createdAt: timestamp('created_at').notNull().defaultNow(),
  },
  (table) => [index('idx_project_id').on(table.projectId)],
);

export type Section = typeof sections.$inferSelect;
export type NewSection = typeof sections.$inferInsert;
