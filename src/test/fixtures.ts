import { db } from '../db'
import {
  customers,
  externalEvents,
  externalEventSources,
  lessons,
  productLessons,
  products,
  teachers,
  timelineEntries,
  workingHours,
} from '../db/schema'
import type { LessonTypeKey } from '../lib/lessons/registry'

let sequence = 0
const next = () => ++sequence

export const at = (iso: string) => new Date(iso)

export async function createTeacher(overrides: { firstName?: string; lastName?: string; isActive?: boolean } = {}) {
  const n = next()
  const [teacher] = await db
    .insert(teachers)
    .values({
      firstName: overrides.firstName ?? 'Teacher',
      lastName: overrides.lastName ?? `No${String(n).padStart(3, '0')}`,
      email: `teacher${n}@example.test`,
      isActive: overrides.isActive ?? true,
    })
    .returning()
  return teacher
}

export async function createCustomer() {
  const n = next()
  const [customer] = await db
    .insert(customers)
    .values({ firstName: 'Customer', lastName: `No${n}`, email: `customer${n}@example.test` })
    .returning()
  return customer
}

export async function createLesson(lessonType: LessonTypeKey, hostId?: string) {
  const [lesson] = await db
    .insert(lessons)
    .values({ lessonType, name: `${lessonType} lesson ${next()}`, hostId })
    .returning()
  return lesson
}

export async function addWorkingHours(
  teacherId: string,
  weekday: number,
  startTime: string,
  endTime: string,
  createdAt?: Date
) {
  const [template] = await db
    .insert(workingHours)
    .values({ teacherId, weekday, startTime, endTime, createdAt })
    .returning()
  return template
}

export async function addEntry(
  teacherId: string,
  lesson: { id: string; lessonType: LessonTypeKey },
  start: string,
  end: string,
  flags: { allowOverlap?: boolean; allowBesidesWorkingHours?: boolean } = {}
) {
  const [entry] = await db
    .insert(timelineEntries)
    .values({
      teacherId,
      lessonType: lesson.lessonType,
      lessonId: lesson.id,
      start: at(start),
      end: at(end),
      ...flags,
    })
    .returning()
  return entry
}

export async function createProduct(lessonIds: string[], isActive = true) {
  const [product] = await db
    .insert(products)
    .values({ name: `Product ${next()}`, isActive })
    .returning()

  for (const lessonId of lessonIds) {
    await db.insert(productLessons).values({ productId: product.id, lessonId })
  }
  return product
}

export async function createEventSource(teacherId: string, provider = 'fake') {
  const [source] = await db
    .insert(externalEventSources)
    .values({ teacherId, provider, url: `https://calendar.example.test/${next()}.ics` })
    .returning()
  return source
}

export async function addExternalEvent(
  source: { id: string; teacherId: string },
  parentId?: string
) {
  const n = next()
  const [event] = await db
    .insert(externalEvents)
    .values({
      sourceId: source.id,
      teacherId: source.teacherId,
      parentId,
      uid: `stored-${n}`,
      start: at('2024-07-15T09:00:00Z'),
      end: at('2024-07-15T10:00:00Z'),
    })
    .returning()
  return event
}
