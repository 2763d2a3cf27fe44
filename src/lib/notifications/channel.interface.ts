export interface UnsafeCalendarUpdateEvent {
  sourceId: string
  teacherId: string
  storedCount: number
  fetchedCount: number
  detectedAt: Date
}

/**
 * Where core signals go. Delivery (mail, chat, pager) belongs to the
 * implementation.
 */
export interface NotificationChannel {
  readonly channelId: string
  unsafeCalendarUpdate(event: UnsafeCalendarUpdateEvent): Promise<void>
}
