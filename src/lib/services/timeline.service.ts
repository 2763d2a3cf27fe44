import { db, type Executor } from '../../db'
import { auditLog, classes, teachers, timelineEntries } from '../../db/schema'
import { and, asc, count, eq, gt, lt, ne } from 'drizzle-orm'
import { DomainError, NotFoundError } from '../errors'
import { lessonTypes, type LessonTypeKey } from '../lessons/registry'
import { isEntryFree, isFittingWorkingHours, type EntryState } from '../scheduling/rules'
import { config } from '../config'
import { addMinutes, calendarDateOf, type TimeWindow } from '../time'
import { getLessonOrThrow } from './catalog.service'
import { resolveWorkingHours } from './working-hours.service'
import type { NewTimelineEntry, Teacher, TimelineEntry, TimelineEntryDraft } from '../types/timeline.types'

export class EntryConflictError extends DomainError {
  constructor(readonly reason: 'outside_working_hours' | 'overlaps_other_entry', detail: string) {
    super(`Timeline entry does not fit (${reason}): ${detail}`)
  }
}

// ── Locking ────────────────────────────────────────────────────────────────

/**
 * Takes the teacher row lock for the rest of the transaction. Every write to
 * a teacher's timeline goes through here first, so overlap checks that read
 * the timeline cannot race each other.
 */
export async function lockTeacher(tx: Executor, teacherId: string): Promise<Teacher> {
  const rows = await tx
    .select()
    .from(teachers)
    .where(eq(teachers.id, teacherId))
    .limit(1)
    .for('update')

  if (rows.length === 0) throw new NotFoundError('Teacher', teacherId)
  return rows[0]
}

// ── Reads ──────────────────────────────────────────────────────────────────

export async function getEntryOrThrow(entryId: string, executor: Executor = db): Promise<TimelineEntry> {
  const rows = await executor
    .select()
    .from(timelineEntries)
    .where(eq(timelineEntries.id, entryId))
    .limit(1)

  if (rows.length === 0) throw new NotFoundError('Timeline entry', entryId)
  return rows[0]
}

/** Entries of a teacher intersecting the window, earliest first */
export async function listEntries(
  teacherId: string,
  window: TimeWindow,
  options: { lessonType?: LessonTypeKey; excludeEntryId?: string } = {},
  executor: Executor = db
): Promise<TimelineEntry[]> {
  const filters = [
    eq(timelineEntries.teacherId, teacherId),
    lt(timelineEntries.start, window.end),
    gt(timelineEntries.end, window.start),
  ]
  if (options.lessonType) filters.push(eq(timelineEntries.lessonType, options.lessonType))
  if (options.excludeEntryId) filters.push(ne(timelineEntries.id, options.excludeEntryId))

  return executor
    .select()
    .from(timelineEntries)
    .where(and(...filters))
    .orderBy(asc(timelineEntries.start), asc(timelineEntries.id))
}

export async function countAttachedClasses(entryId: string, executor: Executor = db): Promise<number> {
  const [row] = await executor
    .select({ value: count() })
    .from(classes)
    .where(eq(classes.timelineEntryId, entryId))

  return row?.value ?? 0
}

export async function isFree(entry: TimelineEntry, executor: Executor = db): Promise<boolean> {
  const attached = await countAttachedClasses(entry.id, executor)
  return isEntryFree(lessonTypes.get(entry.lessonType), attached)
}

export async function isEntryFittingWorkingHours(
  entry: Pick<TimelineEntry, 'teacherId' | 'start' | 'end'>,
  executor: Executor = db
): Promise<boolean> {
  const date = calendarDateOf(entry.start, config.utcOffset)
  const hours = await resolveWorkingHours(entry.teacherId, date, executor)
  return isFittingWorkingHours(entry, hours)
}

// ── Drafts ─────────────────────────────────────────────────────────────────

/**
 * Turns a draft into insertable values. The lesson decides the entry's type
 * and, unless the draft says otherwise, its length.
 */
export async function buildEntryValues(
  draft: TimelineEntryDraft,
  executor: Executor = db
): Promise<NewTimelineEntry & EntryState> {
  const lesson = await getLessonOrThrow(draft.lessonId, executor)
  const type = lessonTypes.get(lesson.lessonType)
  const end = draft.end ?? addMinutes(draft.start, type.durationMinutes)

  if (end <= draft.start) {
    throw new Error(`Timeline entry must end after it starts (${draft.start.toISOString()})`)
  }

  return {
    teacherId: draft.teacherId,
    lessonType: lesson.lessonType,
    lessonId: lesson.id,
    start: draft.start,
    end,
    allowOverlap: draft.allowOverlap ?? true,
    allowBesidesWorkingHours: draft.allowBesidesWorkingHours ?? false,
  }
}

// ── Planning hosted sessions ───────────────────────────────────────────────

/**
 * Puts an entry on a teacher's timeline without any class attached, e.g. a
 * master class customers join later.
 */
export async function planEntry(draft: TimelineEntryDraft, actorId?: string): Promise<TimelineEntry> {
  return db.transaction(async (tx) => {
    await lockTeacher(tx, draft.teacherId)
    const values = await buildEntryValues(draft, tx)

    if (!values.allowBesidesWorkingHours && !(await isEntryFittingWorkingHours(values, tx))) {
      throw new EntryConflictError('outside_working_hours', `${values.start.toISOString()} is outside working hours`)
    }

    if (!values.allowOverlap) {
      const clashes = await listEntries(values.teacherId, values, {}, tx)
      if (clashes.length > 0) {
        throw new EntryConflictError('overlaps_other_entry', `overlaps entry ${clashes[0].id}`)
      }
    }

    const [entry] = await tx.insert(timelineEntries).values(values).returning()

    await tx.insert(auditLog).values({
      actorId,
      action: 'TIMELINE_ENTRY_PLANNED',
      entityType: 'timeline_entry',
      entityId: entry.id,
      payload: { teacherId: entry.teacherId, lessonId: entry.lessonId, start: entry.start.toISOString() },
    })

    return entry
  })
}
