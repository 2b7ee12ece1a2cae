import { pgTable, uuid, varchar, text, timestamp, index } from 'drizzle-orm/pg-core';
import type { SessionStatus } from '../types/session.types.js';

/**
 * Collage sessions table - one upload/process workflow per row
 */
export const collageSessions = pgTable('collage_sessions', {
  id: uuid('id').primaryKey().defaultRandom(),
  ownerId: varchar('owner_id', { length: 255 }).notNull(),
  /** Conversation references carried through from the chat front end */
  channelId: varchar('channel_id', { length: 255 }),
  threadRef: varchar('thread_ref', { length: 255 }),
  status: varchar('status', { length: 50 }).$type<SessionStatus>().notNull().default('awaiting_image1'),
  image1Path: text('image1_path'),
  image2Path: text('image2_path'),
  outputPath: text('output_path'),
  backgroundName: varchar('background_name', { length: 255 }),
  overlayColor: varchar('overlay_color', { length: 50 }),
  errorMessage: text('error_message'),
  createdAt: timestamp('created_at').notNull().defaultNow(),
  updatedAt: timestamp('updated_at').notNull().defaultNow(),
}, (table) => ({
  ownerIdIdx: index('idx_collage_sessions_owner_id').on(table.ownerId),
  ownerStatusIdx: index('idx_collage_sessions_owner_status').on(table.ownerId, table.status),
}));

export type CollageSession = typeof collageSessions.$inferSelect;
export type NewCollageSession = typeof collageSessions.$inferInsert;
