import type { SchedulingRejection } from '../errors'
import type { LessonType, LessonTypeKey } from '../lessons/registry'
import { contains, type TimeWindow } from '../time'

export interface ClassState {
  lessonType: LessonTypeKey
  timelineEntryId: string | null
  isScheduled: boolean
  /** Disabled entitlements (e.g. of a disabled subscription) cannot be used */
  active: boolean
}

export interface EntryState extends TimeWindow {
  lessonType: LessonTypeKey
  allowOverlap: boolean
  allowBesidesWorkingHours: boolean
}

export interface SchedulingFacts {
  lessonClass: ClassState
  entry: EntryState
  entryType: LessonType
  /** Classes already attached to the entry; 0 for an entry not stored yet */
  attachedClasses: number
  workingHours: TimeWindow | null
  /** Other entries of the same teacher overlapping this one */
  overlappingEntries: number
}

export type SchedulingVerdict =
  | { ok: true }
  | { ok: false; reason: SchedulingRejection; detail: string }

export function isEntryFree(entryType: LessonType, attachedClasses: number): boolean {
  return attachedClasses < entryType.capacity
}

export function isFittingWorkingHours(entry: TimeWindow, workingHours: TimeWindow | null): boolean {
  return workingHours !== null && contains(workingHours, entry)
}

/**
 * Decides whether a class may take a seat on a timeline entry. Checks run in
 * a fixed order and the first failure wins.
 */
export function evaluateScheduling(facts: SchedulingFacts): SchedulingVerdict {
  const { lessonClass, entry, entryType } = facts

  if (!lessonClass.active) {
    return { ok: false, reason: 'inactive', detail: 'class is disabled' }
  }

  if (lessonClass.isScheduled || lessonClass.timelineEntryId !== null) {
    return { ok: false, reason: 'already_scheduled', detail: 'class already has a timeline entry' }
  }

  if (!isEntryFree(entryType, facts.attachedClasses)) {
    return {
      ok: false,
      reason: 'entry_not_free',
      detail: `entry holds ${facts.attachedClasses} of ${entryType.capacity} classes`,
    }
  }

  if (lessonClass.lessonType !== entry.lessonType) {
    return {
      ok: false,
      reason: 'lesson_type_mismatch',
      detail: `class is '${lessonClass.lessonType}', entry is '${entry.lessonType}'`,
    }
  }

  if (!entry.allowBesidesWorkingHours && !isFittingWorkingHours(entry, facts.workingHours)) {
    return {
      ok: false,
      reason: 'outside_working_hours',
      detail: `${entry.start.toISOString()}–${entry.end.toISOString()} is outside the teacher's working hours`,
    }
  }

  if (!entry.allowOverlap && facts.overlappingEntries > 0) {
    return {
      ok: false,
      reason: 'overlaps_other_entry',
      detail: `entry overlaps ${facts.overlappingEntries} other entries of the teacher`,
    }
  }

  return { ok: true }
}
