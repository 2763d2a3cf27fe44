import type { LessonTypeKey } from '../lessons/registry'
import { addMinutes, formatTimeOfDay, overlaps, type TimeWindow } from '../time'

export interface BusyEntry extends TimeWindow {
  lessonType: LessonTypeKey
}

export interface SlotComputation {
  granularityMinutes: number
  /** Length checked against busy entries; defaults to the granularity */
  slotMinutes?: number
  /** When set, only entries of this lesson type block a slot */
  lessonType?: LessonTypeKey
}

function assertPositiveMinutes(value: number, label: string): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`${label} must be a positive whole number of minutes, got ${value}`)
  }
}

/**
 * Every slot start from the window start, one per step, while the start is
 * still inside the window. The last slot may run past the window end.
 */
export function enumerateSlotStarts(window: TimeWindow, granularityMinutes: number): Date[] {
  assertPositiveMinutes(granularityMinutes, 'Slot granularity')

  const starts: Date[] = []
  for (let cursor = window.start; cursor < window.end; cursor = addMinutes(cursor, granularityMinutes)) {
    starts.push(cursor)
  }
  return starts
}

export function computeFreeSlots(
  window: TimeWindow,
  entries: readonly BusyEntry[],
  options: SlotComputation
): Date[] {
  const slotMinutes = options.slotMinutes ?? options.granularityMinutes
  assertPositiveMinutes(slotMinutes, 'Slot length')

  const blocking = options.lessonType
    ? entries.filter(entry => entry.lessonType === options.lessonType)
    : entries

  return enumerateSlotStarts(window, options.granularityMinutes).filter(start => {
    const slot = { start, end: addMinutes(start, slotMinutes) }
    return !blocking.some(entry => overlaps(slot, entry))
  })
}

/**
 * Free slot starts of one teacher on one day, in chronological order.
 */
export class SlotList implements Iterable<Date> {
  private readonly slots: readonly Date[]

  constructor(slots: readonly Date[], private readonly utcOffset: string) {
    this.slots = [...slots].sort((a, b) => a.getTime() - b.getTime())
  }

  get length(): number {
    return this.slots.length
  }

  isEmpty(): boolean {
    return this.slots.length === 0
  }

  at(index: number): Date | undefined {
    return this.slots.at(index)
  }

  [Symbol.iterator](): Iterator<Date> {
    return this.slots[Symbol.iterator]()
  }

  toArray(): Date[] {
    return [...this.slots]
  }

  /** "HH:MM" labels on the school's wall clock */
  toTimeList(): string[] {
    return this.slots.map(slot => formatTimeOfDay(slot, this.utcOffset))
  }

  toTimeMap(): Map<string, Date> {
    return new Map(this.slots.map(slot => [formatTimeOfDay(slot, this.utcOffset), slot]))
  }
}
