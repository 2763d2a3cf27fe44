import { db } from '../../db'
import { auditLog, externalEvents, externalEventSources } from '../../db/schema'
import { asc, eq } from 'drizzle-orm'
import { NotFoundError } from '../errors'
import { isSafe } from '../extevents/safety'
import type { ExternalCalendarProvider } from '../extevents/provider.interface'
import { getNotificationChannel, type NotificationChannel } from '../notifications'
import { describeFailure, toErrorMessage } from '../runtime'
import type {
  ExternalEventDraft,
  ExternalEventSource,
  SourceUpdateResult,
} from '../types/extevents.types'

export interface SourceUpdateOptions {
  provider: ExternalCalendarProvider
  notifications?: NotificationChannel
  now?: Date
}

// ── Draft validation ───────────────────────────────────────────────────────

function splitBySeries(drafts: ExternalEventDraft[]): {
  parents: ExternalEventDraft[]
  children: ExternalEventDraft[]
} {
  const seen = new Set<string>()
  for (const draft of drafts) {
    if (seen.has(draft.uid)) throw new Error(`Duplicate external event uid '${draft.uid}'`)
    seen.add(draft.uid)
    if (draft.end <= draft.start) throw new Error(`External event '${draft.uid}' ends before it starts`)
  }

  const parents = drafts.filter(draft => !draft.parentUid)
  const parentUids = new Set(parents.map(parent => parent.uid))
  const children = drafts.filter(draft => draft.parentUid)

  for (const child of children) {
    if (!child.parentUid || !parentUids.has(child.parentUid)) {
      throw new Error(`External event '${child.uid}' points at unknown series '${child.parentUid}'`)
    }
  }

  return { parents, children }
}

// ── Sync ───────────────────────────────────────────────────────────────────

/**
 * Replaces the stored events of a source with what the provider holds now.
 *
 * The replacement is refused when it would drop too many events at once (see
 * isSafe); the stored batch then stays as it is and the notification channel
 * hears about it. Refusal is a normal outcome, not an error.
 */
export async function updateEventSource(
  sourceId: string,
  options: SourceUpdateOptions
): Promise<SourceUpdateResult> {
  const { provider, notifications = getNotificationChannel(), now = new Date() } = options

  const source = await getSourceOrThrow(sourceId)
  if (!source.isActive) return { status: 'skipped', sourceId, reason: 'inactive' }
  if (source.provider !== provider.providerId) {
    throw new Error(`Source ${sourceId} belongs to '${source.provider}', not '${provider.providerId}'`)
  }

  let drafts: ExternalEventDraft[]
  try {
    drafts = await provider.fetchEvents(source)
  } catch (error) {
    console.error(`[ExtEvents] Fetch failed for source ${sourceId}:`, describeFailure(error, provider.providerId))
    throw error
  }
  const { parents, children } = splitBySeries(drafts)

  const result = await db.transaction(async (tx): Promise<SourceUpdateResult> => {
    await tx
      .select({ id: externalEventSources.id })
      .from(externalEventSources)
      .where(eq(externalEventSources.id, sourceId))
      .for('update')

    const stored = await tx
      .select({ id: externalEvents.id, parentId: externalEvents.parentId })
      .from(externalEvents)
      .where(eq(externalEvents.sourceId, sourceId))

    if (!isSafe(stored, drafts)) {
      return { status: 'unsafe', sourceId, previousCount: stored.length, fetchedCount: drafts.length }
    }

    await tx.delete(externalEvents).where(eq(externalEvents.sourceId, sourceId))

    const parentIds = new Map<string, string>()
    if (parents.length > 0) {
      const inserted = await tx
        .insert(externalEvents)
        .values(parents.map(draft => ({
          sourceId,
          teacherId: source.teacherId,
          uid: draft.uid,
          description: draft.description,
          start: draft.start,
          end: draft.end,
        })))
        .returning({ id: externalEvents.id, uid: externalEvents.uid })
      for (const row of inserted) parentIds.set(row.uid, row.id)
    }

    if (children.length > 0) {
      await tx.insert(externalEvents).values(children.map(draft => ({
        sourceId,
        teacherId: source.teacherId,
        parentId: draft.parentUid ? parentIds.get(draft.parentUid) : undefined,
        uid: draft.uid,
        description: draft.description,
        start: draft.start,
        end: draft.end,
      })))
    }

    await tx
      .update(externalEventSources)
      .set({ lastUpdate: now, updatedAt: now })
      .where(eq(externalEventSources.id, sourceId))

    await tx.insert(auditLog).values({
      action: 'CALENDAR_SYNCED',
      entityType: 'external_event_source',
      entityId: sourceId,
      payload: { previousCount: stored.length, eventCount: drafts.length },
    })

    return { status: 'updated', sourceId, previousCount: stored.length, eventCount: drafts.length }
  })

  if (result.status === 'unsafe') {
    console.warn(
      `[ExtEvents] Refused update of source ${sourceId}: ` +
      `${result.fetchedCount} fetched events would replace ${result.previousCount}`
    )
    await notifications.unsafeCalendarUpdate({
      sourceId,
      teacherId: source.teacherId,
      storedCount: result.previousCount,
      fetchedCount: result.fetchedCount,
      detectedAt: now,
    })
  }

  return result
}

export type SyncRunResult =
  | SourceUpdateResult
  | { status: 'failed'; sourceId: string; error: string }

/**
 * Runs updateEventSource for every active source whose provider is known.
 * A failing source is reported in the results and does not stop the others.
 */
export async function syncActiveSources(
  providers: readonly ExternalCalendarProvider[],
  options: Omit<SourceUpdateOptions, 'provider'> = {}
): Promise<SyncRunResult[]> {
  const byId = new Map(providers.map(provider => [provider.providerId, provider]))
  const sources = await db
    .select()
    .from(externalEventSources)
    .where(eq(externalEventSources.isActive, true))
    .orderBy(asc(externalEventSources.createdAt), asc(externalEventSources.id))

  const results: SyncRunResult[] = []
  for (const source of sources) {
    const provider = byId.get(source.provider)
    if (!provider) {
      console.warn(`[ExtEvents] No provider '${source.provider}' for source ${source.id}`)
      results.push({ status: 'failed', sourceId: source.id, error: `unknown provider '${source.provider}'` })
      continue
    }

    try {
      results.push(await updateEventSource(source.id, { ...options, provider }))
    } catch (error) {
      console.error(`[ExtEvents] Sync failed for source ${source.id}:`, toErrorMessage(error))
      results.push({ status: 'failed', sourceId: source.id, error: toErrorMessage(error) })
    }
  }

  return results
}

// ── Helpers ────────────────────────────────────────────────────────────────

export async function getSourceOrThrow(sourceId: string): Promise<ExternalEventSource> {
  const rows = await db
    .select()
    .from(externalEventSources)
    .where(eq(externalEventSources.id, sourceId))
    .limit(1)

  if (rows.length === 0) throw new NotFoundError('External event source', sourceId)
  return rows[0]
}
