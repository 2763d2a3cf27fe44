export class DomainError extends Error {
  constructor(message: string) {
    super(message)
    this.name = new.target.name
  }
}

export class NotFoundError extends DomainError {
  constructor(readonly entity: string, readonly entityId: string) {
    super(`${entity} not found: ${entityId}`)
  }
}

/** Why a class cannot be placed on a timeline entry. */
export type SchedulingRejection =
  | 'inactive'
  | 'already_scheduled'
  | 'entry_not_free'
  | 'lesson_type_mismatch'
  | 'outside_working_hours'
  | 'overlaps_other_entry'
  | 'timeline_entry_required'

export class CannotBeScheduledError extends DomainError {
  constructor(readonly reason: SchedulingRejection, detail: string) {
    super(`Class cannot be scheduled (${reason}): ${detail}`)
  }
}

export class CannotBeUnscheduledError extends DomainError {
  constructor(readonly classId: string) {
    super(`Class ${classId} has no timeline entry to remove`)
  }
}
