export { config, loadConfig, type AppConfig } from './lib/config'
export {
  DomainError,
  NotFoundError,
  CannotBeScheduledError,
  CannotBeUnscheduledError,
  type SchedulingRejection,
} from './lib/errors'
export {
  LESSON_TYPE_KEYS,
  LessonType,
  LessonTypeRegistry,
  lessonTypes,
  isLessonTypeKey,
  type LessonTypeKey,
  type LessonTypeOptions,
} from './lib/lessons/registry'
export { computeFreeSlots, enumerateSlotStarts, SlotList, type BusyEntry } from './lib/scheduling/slots'
export { evaluateScheduling, type SchedulingFacts, type SchedulingVerdict } from './lib/scheduling/rules'
export { isSafe } from './lib/extevents/safety'
export type { ExternalCalendarProvider } from './lib/extevents/provider.interface'
export { getNotificationChannel, type NotificationChannel, type UnsafeCalendarUpdateEvent } from './lib/notifications'

export * from './lib/services/working-hours.service'
export * from './lib/services/catalog.service'
export * from './lib/services/timeline.service'
export * from './lib/services/slots.service'
export * from './lib/services/teacher.service'
export * from './lib/services/class.service'
export * from './lib/services/subscription.service'
export * from './lib/services/extevents.service'

export type * from './lib/types/timeline.types'
export type * from './lib/types/market.types'
export type * from './lib/types/extevents.types'
export type { TimeWindow } from './lib/time'
