import { db, type Executor } from '../../db'
import { auditLog, teachers, workingHours } from '../../db/schema'
import { and, asc, eq } from 'drizzle-orm'
import { z } from 'zod'
import { config } from '../config'
import { NotFoundError } from '../errors'
import { atTimeOfDay, isTimeOfDay, minutesOfDay, weekdayOf, type TimeWindow } from '../time'
import type { WorkingHours, WorkingHoursInput } from '../types/timeline.types'

const timeOfDay = z.string().refine(isTimeOfDay, 'expected HH:MM (24h)')

const workingHoursSchema = z
  .object({
    teacherId: z.string().uuid(),
    weekday: z.number().int().min(0).max(6),
    startTime: timeOfDay,
    endTime: timeOfDay,
  })
  // Runs even when a time failed its own check; those are already reported
  .refine(value =>
    !isTimeOfDay(value.startTime) ||
    !isTimeOfDay(value.endTime) ||
    minutesOfDay(value.startTime) < minutesOfDay(value.endTime), {
    message: 'startTime must be before endTime',
    path: ['endTime'],
  })

// ── Resolution ─────────────────────────────────────────────────────────────

/**
 * The template covering `date` for a teacher, or null when the teacher does
 * not work that weekday. Several templates on one weekday resolve to the
 * oldest (then lowest id).
 */
export async function findTemplateForDate(
  teacherId: string,
  date: string,
  executor: Executor = db
): Promise<WorkingHours | null> {
  const rows = await executor
    .select()
    .from(workingHours)
    .where(
      and(
        eq(workingHours.teacherId, teacherId),
        eq(workingHours.weekday, weekdayOf(date))
      )
    )
    .orderBy(asc(workingHours.createdAt), asc(workingHours.id))
    .limit(1)

  return rows[0] ?? null
}

export async function resolveWorkingHours(
  teacherId: string,
  date: string,
  executor: Executor = db
): Promise<TimeWindow | null> {
  const template = await findTemplateForDate(teacherId, date, executor)
  if (!template) return null

  return {
    start: atTimeOfDay(date, template.startTime, config.utcOffset),
    end: atTimeOfDay(date, template.endTime, config.utcOffset),
  }
}

// ── Teacher configuration ──────────────────────────────────────────────────

export async function listWorkingHours(teacherId: string): Promise<WorkingHours[]> {
  return db
    .select()
    .from(workingHours)
    .where(eq(workingHours.teacherId, teacherId))
    .orderBy(asc(workingHours.weekday), asc(workingHours.startTime))
}

export async function createWorkingHours(
  input: WorkingHoursInput,
  actorId?: string
): Promise<WorkingHours> {
  const data = workingHoursSchema.parse(input)

  return db.transaction(async (tx) => {
    const teacherRows = await tx
      .select({ id: teachers.id })
      .from(teachers)
      .where(eq(teachers.id, data.teacherId))
      .limit(1)
    if (teacherRows.length === 0) throw new NotFoundError('Teacher', data.teacherId)

    const [template] = await tx.insert(workingHours).values(data).returning()

    await tx.insert(auditLog).values({
      actorId,
      action: 'WORKING_HOURS_CREATED',
      entityType: 'working_hours',
      entityId: template.id,
      payload: { teacherId: data.teacherId, weekday: data.weekday, startTime: data.startTime, endTime: data.endTime },
    })

    return template
  })
}

export async function updateWorkingHours(
  id: string,
  changes: Partial<Omit<WorkingHoursInput, 'teacherId'>>,
  actorId?: string
): Promise<WorkingHours> {
  return db.transaction(async (tx) => {
    const existing = await tx
      .select()
      .from(workingHours)
      .where(eq(workingHours.id, id))
      .limit(1)
      .for('update')
    if (existing.length === 0) throw new NotFoundError('Working hours', id)

    const data = workingHoursSchema.parse({ ...existing[0], ...changes })

    const [updated] = await tx
      .update(workingHours)
      .set({
        weekday: data.weekday,
        startTime: data.startTime,
        endTime: data.endTime,
        updatedAt: new Date(),
      })
      .where(eq(workingHours.id, id))
      .returning()

    await tx.insert(auditLog).values({
      actorId,
      action: 'WORKING_HOURS_UPDATED',
      entityType: 'working_hours',
      entityId: id,
      payload: { ...changes },
    })

    return updated
  })
}

export async function deleteWorkingHours(id: string, actorId?: string): Promise<void> {
  await db.transaction(async (tx) => {
    const deleted = await tx
      .delete(workingHours)
      .where(eq(workingHours.id, id))
      .returning({ id: workingHours.id, teacherId: workingHours.teacherId })
    if (deleted.length === 0) throw new NotFoundError('Working hours', id)

    await tx.insert(auditLog).values({
      actorId,
      action: 'WORKING_HOURS_DELETED',
      entityType: 'working_hours',
      entityId: id,
      payload: { teacherId: deleted[0].teacherId },
    })
  })
}
