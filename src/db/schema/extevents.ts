import {
  pgTable,
  uuid,
  text,
  boolean,
  timestamp,
  index,
  type AnyPgColumn,
} from 'drizzle-orm/pg-core';
import { teachers } from './people';

/**
 * external_event_sources: Calendars imported onto a teacher's timeline.
 */
export const externalEventSources = pgTable('external_event_sources', {
  id:          uuid('id').primaryKey().defaultRandom(),
  teacherId:   uuid('teacher_id').references(() => teachers.id, { onDelete: 'cascade' }).notNull(),
  provider:    text('provider').notNull(),          // 'google', 'ics', ...
  url:         text('url').notNull(),
  isActive:    boolean('is_active').notNull().default(true),
  lastUpdate:  timestamp('last_update', { withTimezone: true }),
  createdAt:   timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  updatedAt:   timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
}, (t) => ({
  idx_external_event_sources_teacher: index('idx_external_event_sources_teacher').on(t.teacherId),
}));


/**
 * external_events: The live event batch of a source.
 * parentId links an instance of a recurring series to the series rule.
 */
export const externalEvents = pgTable('external_events', {
  id:          uuid('id').primaryKey().defaultRandom(),
  sourceId:    uuid('source_id').references(() => externalEventSources.id, { onDelete: 'cascade' }).notNull(),
  teacherId:   uuid('teacher_id').references(() => teachers.id, { onDelete: 'cascade' }).notNull(),
  parentId:    uuid('parent_id').references((): AnyPgColumn => externalEvents.id, { onDelete: 'cascade' }),
  uid:         text('uid').notNull(),               // provider-side identifier
  description: text('description'),
  start:       timestamp('start', { withTimezone: true }).notNull(),
  end:         timestamp('end', { withTimezone: true }).notNull(),
  createdAt:   timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
}, (t) => ({
  idx_external_events_source: index('idx_external_events_source').on(t.sourceId),
  idx_external_events_parent: index('idx_external_events_parent').on(t.parentId),
}));
