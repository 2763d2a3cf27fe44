import type { InferInsertModel, InferSelectModel } from 'drizzle-orm'
import type { lessons, teachers, timelineEntries, workingHours } from '../../db/schema'
import type { LessonType, LessonTypeKey } from '../lessons/registry'

// ── Drizzle inferred types ─────────────────────────────────────────────────

export type Teacher = InferSelectModel<typeof teachers>
export type Lesson = InferSelectModel<typeof lessons>
export type WorkingHours = InferSelectModel<typeof workingHours>
export type TimelineEntry = InferSelectModel<typeof timelineEntries>
export type NewTimelineEntry = InferInsertModel<typeof timelineEntries>

// ── Lesson references ──────────────────────────────────────────────────────

export interface LessonRef {
  lessonType: LessonTypeKey
  lessonId: string
}

export interface LessonDetails {
  id: string
  name: string
  type: LessonType
  hostId: string | null
}

// ── Request shapes ─────────────────────────────────────────────────────────

export interface WorkingHoursInput {
  teacherId: string
  weekday: number // 0=Sun, 6=Sat
  startTime: string // "HH:MM"
  endTime: string
}

/**
 * A timeline entry that is not stored yet. `end` defaults to the start plus
 * the lesson type's duration.
 */
export interface TimelineEntryDraft {
  teacherId: string
  lessonId: string
  start: Date
  end?: Date
  allowOverlap?: boolean
  allowBesidesWorkingHours?: boolean
}

export type EntryCandidate =
  | { kind: 'existing'; entryId: string }
  | { kind: 'draft'; draft: TimelineEntryDraft }

export interface FreeSlotOptions {
  granularityMinutes?: number
  lessonType?: LessonTypeKey
}
