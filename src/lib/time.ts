// Calendar helpers. Dates travel as "YYYY-MM-DD", times of day as "HH:MM",
// both read on the school's wall clock (a fixed UTC offset such as "+11:00").

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/
const TIME_PATTERN = /^([01]\d|2[0-3]):([0-5]\d)$/
const MINUTE_MS = 60 * 1000

export interface TimeWindow {
  start: Date
  end: Date
}

export function isCalendarDate(value: string): boolean {
  const match = DATE_PATTERN.exec(value)
  if (!match) return false
  const parsed = new Date(`${value}T00:00:00Z`)
  return !Number.isNaN(parsed.getTime()) && parsed.toISOString().startsWith(value)
}

export function isTimeOfDay(value: string): boolean {
  return TIME_PATTERN.test(value)
}

function assertCalendarDate(date: string): void {
  if (!isCalendarDate(date)) throw new Error(`Invalid date '${date}', expected YYYY-MM-DD`)
}

export function minutesOfDay(time: string): number {
  const match = TIME_PATTERN.exec(time)
  if (!match) throw new Error(`Invalid time '${time}', expected HH:MM`)
  return Number(match[1]) * 60 + Number(match[2])
}

export function offsetMinutes(utcOffset: string): number {
  const sign = utcOffset.startsWith('-') ? -1 : 1
  return sign * minutesOfDay(utcOffset.slice(1))
}

/** 0 = Sunday … 6 = Saturday */
export function weekdayOf(date: string): number {
  assertCalendarDate(date)
  return new Date(`${date}T00:00:00Z`).getUTCDay()
}

export function atTimeOfDay(date: string, time: string, utcOffset: string): Date {
  assertCalendarDate(date)
  minutesOfDay(time)
  return new Date(`${date}T${time}:00${utcOffset}`)
}

export function dayWindow(date: string, utcOffset: string): TimeWindow {
  const start = atTimeOfDay(date, '00:00', utcOffset)
  return { start, end: addMinutes(start, 24 * 60) }
}

export function addMinutes(date: Date, minutes: number): Date {
  return new Date(date.getTime() + minutes * MINUTE_MS)
}

export function addDays(date: string, days: number): string {
  assertCalendarDate(date)
  const next = new Date(`${date}T00:00:00Z`)
  next.setUTCDate(next.getUTCDate() + days)
  return next.toISOString().slice(0, 10)
}

/** Half-open intervals: touching ends do not overlap */
export function overlaps(a: TimeWindow, b: TimeWindow): boolean {
  return a.start < b.end && b.start < a.end
}

export function contains(outer: TimeWindow, inner: TimeWindow): boolean {
  return inner.start >= outer.start && inner.end <= outer.end
}

function wallClock(instant: Date, utcOffset: string): Date {
  return addMinutes(instant, offsetMinutes(utcOffset))
}

export function formatTimeOfDay(instant: Date, utcOffset: string): string {
  const local = wallClock(instant, utcOffset)
  const hours = String(local.getUTCHours()).padStart(2, '0')
  const minutes = String(local.getUTCMinutes()).padStart(2, '0')
  return `${hours}:${minutes}`
}

export function calendarDateOf(instant: Date, utcOffset: string): string {
  return wallClock(instant, utcOffset).toISOString().slice(0, 10)
}
