import { db, type Executor } from '../../db'
import { auditLog, classes, customers, timelineEntries } from '../../db/schema'
import { and, eq, isNull, sql, type SQL } from 'drizzle-orm'
import { z } from 'zod'
import { config } from '../config'
import { CannotBeScheduledError, CannotBeUnscheduledError, NotFoundError } from '../errors'
import { lessonTypes, type LessonType } from '../lessons/registry'
import { evaluateScheduling, type EntryState, type SchedulingVerdict } from '../scheduling/rules'
import { calendarDateOf } from '../time'
import { getLessonOrThrow } from './catalog.service'
import {
  buildEntryValues,
  countAttachedClasses,
  getEntryOrThrow,
  listEntries,
  lockTeacher,
} from './timeline.service'
import { resolveWorkingHours } from './working-hours.service'
import type { BuySingleClassRequest, LessonClass } from '../types/market.types'
import type { EntryCandidate, NewTimelineEntry, TimelineEntry } from '../types/timeline.types'

const buySingleClassSchema = z.object({
  customerId: z.string().uuid(),
  lessonId: z.string().uuid(),
  buyPriceCents: z.number().int().nonnegative(),
})

// ── Persistence ────────────────────────────────────────────────────────────

type ClassChanges = Partial<Pick<LessonClass, 'timelineEntryId' | 'active' | 'buyPriceCents'>>

/**
 * The single write path for classes: isScheduled is derived from the entry
 * reference on every save, whoever attached or detached the entry. A change
 * that leaves the reference alone re-derives the flag from the stored one.
 */
export async function saveClasses(
  executor: Executor,
  where: SQL,
  changes: ClassChanges
): Promise<LessonClass[]> {
  return executor
    .update(classes)
    .set({
      ...changes,
      isScheduled: changes.timelineEntryId === undefined
        ? sql`${classes.timelineEntryId} is not null`
        : changes.timelineEntryId !== null,
      updatedAt: new Date(),
    })
    .where(where)
    .returning()
}

export async function saveClass(
  executor: Executor,
  classId: string,
  changes: ClassChanges
): Promise<LessonClass> {
  const [saved] = await saveClasses(executor, eq(classes.id, classId), changes)
  if (!saved) throw new NotFoundError('Class', classId)
  return saved
}

export async function getClassOrThrow(
  classId: string,
  executor: Executor = db,
  options: { lock?: boolean } = {}
): Promise<LessonClass> {
  const query = executor
    .select()
    .from(classes)
    .where(eq(classes.id, classId))
    .limit(1)

  const rows = options.lock ? await query.for('update') : await query
  if (rows.length === 0) throw new NotFoundError('Class', classId)
  return rows[0]
}

// ── Purchase ───────────────────────────────────────────────────────────────

export async function buySingleClass(
  data: BuySingleClassRequest,
  actorId?: string
): Promise<LessonClass> {
  const input = buySingleClassSchema.parse(data)

  return db.transaction(async (tx) => {
    const customerRows = await tx
      .select({ id: customers.id })
      .from(customers)
      .where(eq(customers.id, input.customerId))
      .limit(1)
    if (customerRows.length === 0) throw new NotFoundError('Customer', input.customerId)

    const lesson = await getLessonOrThrow(input.lessonId, tx)

    const [lessonClass] = await tx
      .insert(classes)
      .values({
        customerId: input.customerId,
        lessonType: lesson.lessonType,
        lessonId: lesson.id,
        buyPriceCents: input.buyPriceCents,
        buySource: 'single',
      })
      .returning()

    await tx.insert(auditLog).values({
      actorId,
      action: 'CLASS_BOUGHT',
      entityType: 'class',
      entityId: lessonClass.id,
      payload: { customerId: input.customerId, lessonId: lesson.id, buySource: 'single' },
    })

    return lessonClass
  })
}

// ── Scheduling rules ───────────────────────────────────────────────────────

type ResolvedCandidate =
  | { kind: 'existing'; entry: TimelineEntry }
  | { kind: 'draft'; values: NewTimelineEntry & EntryState }

async function resolveCandidate(candidate: EntryCandidate, executor: Executor): Promise<ResolvedCandidate> {
  if (candidate.kind === 'existing') {
    return { kind: 'existing', entry: await getEntryOrThrow(candidate.entryId, executor) }
  }

  return { kind: 'draft', values: await buildEntryValues(candidate.draft, executor) }
}

function candidateState(candidate: ResolvedCandidate): EntryState & { teacherId: string } {
  return candidate.kind === 'existing' ? candidate.entry : candidate.values
}

async function judge(
  lessonClass: LessonClass,
  candidate: ResolvedCandidate,
  executor: Executor
): Promise<{ verdict: SchedulingVerdict; entryType: LessonType }> {
  const entry = candidateState(candidate)
  const entryType = lessonTypes.get(entry.lessonType)
  const entryId = candidate.kind === 'existing' ? candidate.entry.id : undefined

  const attachedClasses = entryId ? await countAttachedClasses(entryId, executor) : 0
  const workingHours = await resolveWorkingHours(
    entry.teacherId,
    calendarDateOf(entry.start, config.utcOffset),
    executor
  )
  const overlapping = entry.allowOverlap
    ? []
    : await listEntries(entry.teacherId, entry, { excludeEntryId: entryId }, executor)

  const verdict = evaluateScheduling({
    lessonClass,
    entry,
    entryType,
    attachedClasses,
    workingHours,
    overlappingEntries: overlapping.length,
  })

  return { verdict, entryType }
}

export async function canBeScheduled(
  classId: string,
  candidate: EntryCandidate,
  executor: Executor = db
): Promise<boolean> {
  const lessonClass = await getClassOrThrow(classId, executor)
  const resolved = await resolveCandidate(candidate, executor)
  const { verdict } = await judge(lessonClass, resolved, executor)
  return verdict.ok
}

// ── Transitions ────────────────────────────────────────────────────────────

async function assignWith(
  tx: Executor,
  classId: string,
  candidate: EntryCandidate,
  actorId: string | undefined
): Promise<LessonClass> {
  const lessonClass = await getClassOrThrow(classId, tx, { lock: true })
  const unlocked = await resolveCandidate(candidate, tx)

  await lockTeacher(tx, candidateState(unlocked).teacherId)

  // The entry may have been removed while we waited for the lock
  const resolved: ResolvedCandidate = unlocked.kind === 'existing'
    ? { kind: 'existing', entry: await getEntryOrThrow(unlocked.entry.id, tx) }
    : unlocked

  const { verdict } = await judge(lessonClass, resolved, tx)
  if (!verdict.ok) {
    console.warn(`[Scheduling] Refused class ${classId}: ${verdict.reason}`)
    throw new CannotBeScheduledError(verdict.reason, verdict.detail)
  }

  // Entry first, then the class pointing at it
  const [entry] = resolved.kind === 'draft'
    ? await tx.insert(timelineEntries).values(resolved.values).returning()
    : await tx
      .update(timelineEntries)
      .set({ updatedAt: new Date() })
      .where(eq(timelineEntries.id, resolved.entry.id))
      .returning()

  const scheduled = await saveClass(tx, classId, { timelineEntryId: entry.id })

  await tx.insert(auditLog).values({
    actorId,
    action: 'CLASS_SCHEDULED',
    entityType: 'class',
    entityId: classId,
    payload: {
      timelineEntryId: entry.id,
      teacherId: entry.teacherId,
      start: entry.start.toISOString(),
      newEntry: resolved.kind === 'draft',
    },
  })

  return scheduled
}

/**
 * Puts a class on a timeline entry. A draft entry is stored as part of the
 * same transaction, so callers can build the entry and schedule in one step.
 */
export async function assignEntry(
  classId: string,
  candidate: EntryCandidate,
  actorId?: string
): Promise<LessonClass> {
  return db.transaction(async (tx) => assignWith(tx, classId, candidate, actorId))
}

export interface ScheduleOptions {
  allowOverlap?: boolean
  /** Meant for back-office corrections */
  allowBesidesWorkingHours?: boolean
  actorId?: string
}

/**
 * Schedules a lesson type that does not need a planned entry: a new entry is
 * created for the teacher at `start`.
 */
export async function scheduleWithoutEntry(
  classId: string,
  teacherId: string,
  start: Date,
  options: ScheduleOptions = {}
): Promise<LessonClass> {
  const { allowOverlap = true, allowBesidesWorkingHours = false, actorId } = options

  return db.transaction(async (tx) => {
    const lessonClass = await getClassOrThrow(classId, tx)
    const type = lessonTypes.get(lessonClass.lessonType)

    if (type.timelineEntryRequired()) {
      throw new CannotBeScheduledError(
        'timeline_entry_required',
        `lesson type '${type.key}' requires a planned timeline entry`
      )
    }

    return assignWith(tx, classId, {
      kind: 'draft',
      draft: {
        teacherId,
        lessonId: lessonClass.lessonId,
        start,
        allowOverlap,
        allowBesidesWorkingHours,
      },
    }, actorId)
  })
}

/**
 * Takes a class off its entry. The entry stays while other classes hold it or
 * while its lesson type needs a planned entry; an entry made just for this
 * class is removed.
 */
export async function unschedule(classId: string, actorId?: string): Promise<LessonClass> {
  return db.transaction(async (tx) => {
    const lessonClass = await getClassOrThrow(classId, tx, { lock: true })
    const entryId = lessonClass.timelineEntryId
    if (entryId === null) throw new CannotBeUnscheduledError(classId)

    const entry = await getEntryOrThrow(entryId, tx)
    await lockTeacher(tx, entry.teacherId)

    const unscheduled = await saveClass(tx, classId, { timelineEntryId: null })

    const remaining = await countAttachedClasses(entryId, tx)
    const keepEntry = remaining > 0 || lessonTypes.get(entry.lessonType).timelineEntryRequired()

    if (keepEntry) {
      await tx
        .update(timelineEntries)
        .set({ updatedAt: new Date() })
        .where(eq(timelineEntries.id, entryId))
    } else {
      await tx.delete(timelineEntries).where(eq(timelineEntries.id, entryId))
    }

    await tx.insert(auditLog).values({
      actorId,
      action: 'CLASS_UNSCHEDULED',
      entityType: 'class',
      entityId: classId,
      payload: { timelineEntryId: entryId, entryDeleted: !keepEntry },
    })

    return unscheduled
  })
}

// ── Listings ───────────────────────────────────────────────────────────────

/**
 * Lesson types a customer still has unscheduled, active classes of, in
 * display order. Types without a sort order are left out.
 */
export async function boughtLessonTypes(customerId: string): Promise<LessonType[]> {
  const rows = await db
    .selectDistinct({ lessonType: classes.lessonType })
    .from(classes)
    .where(
      and(
        eq(classes.customerId, customerId),
        eq(classes.active, true),
        isNull(classes.timelineEntryId)
      )
    )

  return lessonTypes.listed(rows.map(row => row.lessonType))
}

export async function listClasses(customerId: string): Promise<LessonClass[]> {
  return db
    .select()
    .from(classes)
    .where(eq(classes.customerId, customerId))
    .orderBy(classes.buyTime, classes.id)
}
