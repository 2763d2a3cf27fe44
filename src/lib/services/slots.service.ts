import { db, type Executor } from '../../db'
import { config } from '../config'
import { lessonTypes, type LessonTypeKey } from '../lessons/registry'
import { isEntryFree } from '../scheduling/rules'
import { computeFreeSlots, SlotList } from '../scheduling/slots'
import { addMinutes, dayWindow } from '../time'
import { countAttachedClasses, listEntries } from './timeline.service'
import { resolveWorkingHours } from './working-hours.service'
import type { FreeSlotOptions } from '../types/timeline.types'

/**
 * Bookable start times of a teacher on `date`.
 *
 * Returns null when the teacher has no working hours that weekday, and an
 * empty list when they work but everything is taken. With a lesson type, a
 * slot is as long as that lesson and only entries of the same type block it.
 * Hosted lesson types can only be joined, so for them the slots are the
 * teacher's open sessions (see findOpenSessions).
 * Nothing is cached; every call reads the timeline again.
 */
export async function findFreeSlots(
  teacherId: string,
  date: string,
  options: FreeSlotOptions = {},
  executor: Executor = db
): Promise<SlotList | null> {
  const window = await resolveWorkingHours(teacherId, date, executor)
  if (!window) return null

  if (options.lessonType && lessonTypes.get(options.lessonType).timelineEntryRequired()) {
    return findOpenSessions(teacherId, date, options.lessonType, executor)
  }

  const granularityMinutes = options.granularityMinutes ?? config.slotGranularityMinutes
  const slotMinutes = options.lessonType
    ? lessonTypes.get(options.lessonType).durationMinutes
    : granularityMinutes

  // The last slot starts before the window end but may run past it
  const reach = { start: window.start, end: addMinutes(window.end, slotMinutes) }
  const entries = await listEntries(teacherId, reach, { lessonType: options.lessonType }, executor)

  const slots = computeFreeSlots(window, entries, {
    granularityMinutes,
    slotMinutes,
    lessonType: options.lessonType,
  })

  return new SlotList(slots, config.utcOffset)
}

/**
 * Start times of a teacher's hosted sessions of `lessonType` on `date` that
 * still have a free seat. Always a list: no sessions means an empty one.
 */
export async function findOpenSessions(
  teacherId: string,
  date: string,
  lessonType: LessonTypeKey,
  executor: Executor = db
): Promise<SlotList> {
  const type = lessonTypes.get(lessonType)
  const day = dayWindow(date, config.utcOffset)
  const entries = await listEntries(teacherId, day, { lessonType }, executor)

  const open: Date[] = []
  for (const entry of entries) {
    // Sessions carried over from the previous day are not bookable on this one
    if (entry.start < day.start) continue
    const attached = await countAttachedClasses(entry.id, executor)
    if (isEntryFree(type, attached)) open.push(entry.start)
  }

  return new SlotList(open, config.utcOffset)
}
