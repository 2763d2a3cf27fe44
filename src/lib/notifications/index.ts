import { AuditLogChannel } from './audit-log.channel'
import type { NotificationChannel } from './channel.interface'

export type { NotificationChannel, UnsafeCalendarUpdateEvent } from './channel.interface'

/**
 * Access the configured notification channel.
 */
export function getNotificationChannel(): NotificationChannel {
  return new AuditLogChannel()
}
