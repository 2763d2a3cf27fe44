import {
  pgTable,
  uuid,
  text,
  integer,
  boolean,
  timestamp,
  index,
} from 'drizzle-orm/pg-core';
import { teachers } from './people';
import { LESSON_TYPE_KEYS } from '../../lib/lessons/registry';

// ─────────────────────────────────────────────────────────────────────────────
// LESSONS
// ─────────────────────────────────────────────────────────────────────────────

/**
 * lessons: Concrete lessons customers can buy or join.
 * lessonType is a key of the lesson type registry; duration and capacity come
 * from there. hostId is set for hosted sessions (master classes, happy hours).
 */
export const lessons = pgTable('lessons', {
  id:          uuid('id').primaryKey().defaultRandom(),
  lessonType:  text('lesson_type', { enum: LESSON_TYPE_KEYS }).notNull(),
  name:        text('name').notNull(),
  hostId:      uuid('host_id').references(() => teachers.id),
  createdAt:   timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
}, (t) => ({
  idx_lessons_type: index('idx_lessons_type').on(t.lessonType),
}));


// ─────────────────────────────────────────────────────────────────────────────
// WORKING HOURS & TIMELINE
// ─────────────────────────────────────────────────────────────────────────────

/**
 * working_hours: Recurring weekly availability of a teacher.
 * weekday: 0=Sun, 1=Mon ... 6=Sat (JS convention)
 * Several rows may share a weekday; resolution picks the oldest one.
 */
export const workingHours = pgTable('working_hours', {
  id:          uuid('id').primaryKey().defaultRandom(),
  teacherId:   uuid('teacher_id').references(() => teachers.id, { onDelete: 'cascade' }).notNull(),
  weekday:     integer('weekday').notNull(),       // 0-6
  startTime:   text('start_time').notNull(),       // "HH:MM" 24hr
  endTime:     text('end_time').notNull(),         // "HH:MM" 24hr
  createdAt:   timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  updatedAt:   timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
}, (t) => ({
  idx_working_hours_teacher_weekday: index('idx_working_hours_teacher_weekday').on(t.teacherId, t.weekday),
}));


/**
 * timeline_entries: Bookings on a teacher's calendar.
 * One entry holds up to lesson-type capacity classes (group lessons).
 */
export const timelineEntries = pgTable('timeline_entries', {
  id:          uuid('id').primaryKey().defaultRandom(),
  teacherId:   uuid('teacher_id').references(() => teachers.id, { onDelete: 'cascade' }).notNull(),
  lessonType:  text('lesson_type', { enum: LESSON_TYPE_KEYS }).notNull(),
  lessonId:    uuid('lesson_id').references(() => lessons.id).notNull(),

  start:       timestamp('start', { withTimezone: true }).notNull(),
  end:         timestamp('end', { withTimezone: true }).notNull(),

  allowOverlap:             boolean('allow_overlap').notNull().default(true),
  allowBesidesWorkingHours: boolean('allow_besides_working_hours').notNull().default(false),

  createdAt:   timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  updatedAt:   timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
}, (t) => ({
  idx_timeline_entries_teacher_start: index('idx_timeline_entries_teacher_start').on(t.teacherId, t.start),
  idx_timeline_entries_lesson_type: index('idx_timeline_entries_lesson_type').on(t.lessonType),
}));
