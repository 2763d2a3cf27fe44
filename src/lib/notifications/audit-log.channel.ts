import { db } from '../../db'
import { auditLog } from '../../db/schema'
import type { NotificationChannel, UnsafeCalendarUpdateEvent } from './channel.interface'

/**
 * Default channel: records signals as critical audit log rows for the back
 * office to pick up.
 */
export class AuditLogChannel implements NotificationChannel {
  readonly channelId = 'audit-log'

  async unsafeCalendarUpdate(event: UnsafeCalendarUpdateEvent): Promise<void> {
    await db.insert(auditLog).values({
      action: 'UNSAFE_CALENDAR_UPDATE',
      entityType: 'external_event_source',
      entityId: event.sourceId,
      severity: 'critical',
      payload: {
        teacherId: event.teacherId,
        storedCount: event.storedCount,
        fetchedCount: event.fetchedCount,
        detectedAt: event.detectedAt.toISOString(),
      },
    })
  }
}
