import { describe, it, expect, beforeEach, vi } from 'vitest'

vi.mock('../../../db', async () => {
  const { createTestDb } = await import('../../../test/db')
  return createTestDb()
})

import { db } from '../../../db'
import { auditLog, externalEvents, externalEventSources } from '../../../db/schema'
import { eq } from 'drizzle-orm'
import { resetTestDb } from '../../../test/db'
import { addExternalEvent, at, createEventSource, createTeacher } from '../../../test/fixtures'
import type { ExternalCalendarProvider } from '../../extevents/provider.interface'
import type { NotificationChannel, UnsafeCalendarUpdateEvent } from '../../notifications'
import type { ExternalEventDraft } from '../../types/extevents.types'
import { getSourceOrThrow, syncActiveSources, updateEventSource } from '../extevents.service'

const NOW = at('2024-07-15T06:00:00Z')

function draft(uid: string, parentUid?: string): ExternalEventDraft {
  return { uid, parentUid, start: at('2024-07-16T09:00:00Z'), end: at('2024-07-16T10:00:00Z') }
}

function fakeProvider(drafts: ExternalEventDraft[] | Error, providerId = 'fake'): ExternalCalendarProvider {
  return {
    providerId,
    fetchEvents: vi.fn(async () => {
      if (drafts instanceof Error) throw drafts
      return drafts
    }),
  }
}

function fakeChannel() {
  const unsafeCalendarUpdate = vi.fn(async (_event: UnsafeCalendarUpdateEvent) => {})
  const channel: NotificationChannel = { channelId: 'test', unsafeCalendarUpdate }
  return { channel, unsafeCalendarUpdate }
}

async function sourceWithEvents(standalone: number) {
  const teacher = await createTeacher()
  const source = await createEventSource(teacher.id)
  for (let i = 0; i < standalone; i++) await addExternalEvent(source)
  return { teacher, source }
}

const storedEvents = (sourceId: string) =>
  db.select().from(externalEvents).where(eq(externalEvents.sourceId, sourceId))

describe('updateEventSource', () => {
  beforeEach(() => resetTestDb(db))

  it('replaces stored events and stamps the source', async () => {
    const { source } = await sourceWithEvents(10)
    const { channel, unsafeCalendarUpdate } = fakeChannel()
    const drafts = Array.from({ length: 8 }, (_, i) => draft(`new-${i}`))

    const result = await updateEventSource(source.id, { provider: fakeProvider(drafts), notifications: channel, now: NOW })

    expect(result).toEqual({ status: 'updated', sourceId: source.id, previousCount: 10, eventCount: 8 })
    const events = await storedEvents(source.id)
    expect(events.map(event => event.uid).sort()).toEqual(drafts.map(d => d.uid).sort())
    expect((await getSourceOrThrow(source.id)).lastUpdate).toEqual(NOW)
    expect(unsafeCalendarUpdate).not.toHaveBeenCalled()
  })

  it('stores series parents before their instances', async () => {
    const { source } = await sourceWithEvents(0)
    const drafts = [draft('weekly-1', 'weekly'), draft('weekly'), draft('weekly-2', 'weekly'), draft('one-off')]

    await updateEventSource(source.id, { provider: fakeProvider(drafts), notifications: fakeChannel().channel, now: NOW })

    const events = await storedEvents(source.id)
    const parent = events.find(event => event.uid === 'weekly')
    expect(parent?.parentId).toBeNull()
    expect(events.filter(event => event.parentId === parent?.id).map(event => event.uid).sort())
      .toEqual(['weekly-1', 'weekly-2'])
    expect(events.find(event => event.uid === 'one-off')?.parentId).toBeNull()
  })

  it('refuses an empty batch and notifies', async () => {
    const { teacher, source } = await sourceWithEvents(10)
    const { channel, unsafeCalendarUpdate } = fakeChannel()

    const result = await updateEventSource(source.id, { provider: fakeProvider([]), notifications: channel, now: NOW })

    expect(result).toEqual({ status: 'unsafe', sourceId: source.id, previousCount: 10, fetchedCount: 0 })
    expect(await storedEvents(source.id)).toHaveLength(10)
    expect((await getSourceOrThrow(source.id)).lastUpdate).toBeNull()
    expect(unsafeCalendarUpdate).toHaveBeenCalledTimes(1)
    expect(unsafeCalendarUpdate).toHaveBeenCalledWith({
      sourceId: source.id,
      teacherId: teacher.id,
      storedCount: 10,
      fetchedCount: 0,
      detectedAt: NOW,
    })
  })

  it('refuses a batch that loses most standalone events', async () => {
    const { source } = await sourceWithEvents(10)
    const { channel } = fakeChannel()
    const drafts = [draft('a'), draft('b'), draft('c')]

    const result = await updateEventSource(source.id, { provider: fakeProvider(drafts), notifications: channel, now: NOW })

    expect(result.status).toBe('unsafe')
    expect((await storedEvents(source.id)).map(event => event.uid)).not.toContain('a')
  })

  it('accepts a collapsed recurring series', async () => {
    const { source } = await sourceWithEvents(2)
    const series = await addExternalEvent(source)
    for (let i = 0; i < 9; i++) await addExternalEvent(source, series.id)

    // 12 stored, 3 of them standalone
    const result = await updateEventSource(source.id, {
      provider: fakeProvider([draft('a'), draft('b')]),
      notifications: fakeChannel().channel,
      now: NOW,
    })

    expect(result).toEqual({ status: 'updated', sourceId: source.id, previousCount: 12, eventCount: 2 })
  })

  it('records unsafe updates in the audit log by default', async () => {
    const { source } = await sourceWithEvents(4)

    await updateEventSource(source.id, { provider: fakeProvider([]), now: NOW })

    const [row] = await db.select().from(auditLog).where(eq(auditLog.action, 'UNSAFE_CALENDAR_UPDATE'))
    expect(row).toMatchObject({ entityId: source.id, severity: 'critical' })
    expect(row.payload).toMatchObject({ storedCount: 4, fetchedCount: 0, detectedAt: NOW.toISOString() })
  })

  it('skips inactive sources without calling the provider', async () => {
    const { source } = await sourceWithEvents(1)
    await db.update(externalEventSources).set({ isActive: false }).where(eq(externalEventSources.id, source.id))
    const provider = fakeProvider([])

    const result = await updateEventSource(source.id, { provider, notifications: fakeChannel().channel })

    expect(result).toEqual({ status: 'skipped', sourceId: source.id, reason: 'inactive' })
    expect(provider.fetchEvents).not.toHaveBeenCalled()
  })

  it('rejects malformed batches before touching the store', async () => {
    const { source } = await sourceWithEvents(1)
    const options = { notifications: fakeChannel().channel, now: NOW }

    await expect(updateEventSource(source.id, { ...options, provider: fakeProvider([draft('a'), draft('a')]) }))
      .rejects.toThrow("Duplicate external event uid 'a'")
    await expect(updateEventSource(source.id, { ...options, provider: fakeProvider([draft('x', 'missing')]) }))
      .rejects.toThrow("External event 'x' points at unknown series 'missing'")
    expect(await storedEvents(source.id)).toHaveLength(1)
  })

  it('propagates provider failures', async () => {
    const { source } = await sourceWithEvents(1)
    const provider = fakeProvider(new Error('connect ECONNREFUSED'))

    await expect(updateEventSource(source.id, { provider, notifications: fakeChannel().channel }))
      .rejects.toThrow('connect ECONNREFUSED')
  })
})

describe('syncActiveSources', () => {
  beforeEach(() => resetTestDb(db))

  it('reports each source and carries on after a failure', async () => {
    const teacher = await createTeacher()
    const good = await createEventSource(teacher.id, 'fake')
    const orphan = await createEventSource(teacher.id, 'elsewhere')
    const inactive = await createEventSource(teacher.id, 'fake')
    await db.update(externalEventSources).set({ isActive: false }).where(eq(externalEventSources.id, inactive.id))

    const results = await syncActiveSources([fakeProvider([draft('a')])], {
      notifications: fakeChannel().channel,
      now: NOW,
    })

    expect(results).toEqual([
      { status: 'updated', sourceId: good.id, previousCount: 0, eventCount: 1 },
      { status: 'failed', sourceId: orphan.id, error: "unknown provider 'elsewhere'" },
    ])
  })
})
