import type { InferSelectModel } from 'drizzle-orm'
import type { externalEvents, externalEventSources } from '../../db/schema'

export type ExternalEventSource = InferSelectModel<typeof externalEventSources>
export type ExternalEvent = InferSelectModel<typeof externalEvents>

/**
 * An event fetched from upstream, not stored yet. Instances of a recurring
 * series point at the series rule through parentUid.
 */
export interface ExternalEventDraft {
  uid: string
  parentUid?: string
  description?: string
  start: Date
  end: Date
}

export type SourceUpdateResult =
  | { status: 'updated'; sourceId: string; previousCount: number; eventCount: number }
  | { status: 'unsafe'; sourceId: string; previousCount: number; fetchedCount: number }
  | { status: 'skipped'; sourceId: string; reason: 'inactive' }
