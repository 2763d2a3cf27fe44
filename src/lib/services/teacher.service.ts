import { db } from '../../db'
import { teachers, workingHours } from '../../db/schema'
import { and, asc, eq, inArray } from 'drizzle-orm'
import { config } from '../config'
import { NotFoundError } from '../errors'
import { addDays, calendarDateOf } from '../time'
import { findFreeSlots } from './slots.service'
import type { FreeSlotOptions, Teacher } from '../types/timeline.types'

export async function getTeacherOrThrow(teacherId: string): Promise<Teacher> {
  const rows = await db
    .select()
    .from(teachers)
    .where(eq(teachers.id, teacherId))
    .limit(1)

  if (rows.length === 0) throw new NotFoundError('Teacher', teacherId)
  return rows[0]
}

/**
 * Active teachers with at least one free slot on `date`. Each teacher is
 * judged on their own timeline only.
 */
export async function findFreeTeachers(
  date: string,
  options: FreeSlotOptions = {}
): Promise<Teacher[]> {
  const candidates = await db
    .select()
    .from(teachers)
    .where(
      and(
        eq(teachers.isActive, true),
        inArray(teachers.id, db.select({ id: workingHours.teacherId }).from(workingHours))
      )
    )
    .orderBy(asc(teachers.lastName), asc(teachers.firstName), asc(teachers.id))

  const slots = await Promise.all(
    candidates.map(teacher => findFreeSlots(teacher.id, date, options))
  )

  return candidates.filter((_, index) => {
    const teacherSlots = slots[index]
    return teacherSlots !== null && !teacherSlots.isEmpty()
  })
}

/**
 * Calendar dates customers may plan lessons on, starting with the day of
 * `now` on the school's clock.
 */
export function* datesForPlanning(
  now: Date,
  days: number = config.planningHorizonDays
): Generator<string> {
  const first = calendarDateOf(now, config.utcOffset)
  for (let offset = 0; offset < days; offset++) {
    yield addDays(first, offset)
  }
}
