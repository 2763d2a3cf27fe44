import { NotFoundError } from '../errors'

export const LESSON_TYPE_KEYS = ['ordinary', 'paired', 'master_class', 'happy_hour'] as const

export type LessonTypeKey = (typeof LESSON_TYPE_KEYS)[number]

export interface LessonTypeOptions {
  key: LessonTypeKey
  name: string
  internalName: string
  durationMinutes: number
  /** Number of classes one timeline entry of this type can hold */
  capacity: number
  requiresTimelineEntry: boolean
  sortOrder: number | null
}

/**
 * A kind of lesson the school sells.
 *
 * Lessons that require a timeline entry are hosted sessions (master classes,
 * happy hours): a teacher plans the entry first and customers join it. The
 * others get a fresh entry when a customer schedules them.
 */
export class LessonType {
  readonly key: LessonTypeKey
  readonly name: string
  readonly internalName: string
  readonly durationMinutes: number
  readonly capacity: number
  private readonly requiresTimelineEntry: boolean
  private readonly order: number | null

  constructor(options: LessonTypeOptions) {
    if (options.durationMinutes <= 0) {
      throw new Error(`Lesson type '${options.key}' needs a positive duration`)
    }
    if (options.capacity < 1) {
      throw new Error(`Lesson type '${options.key}' needs room for at least one class`)
    }
    this.key = options.key
    this.name = options.name
    this.internalName = options.internalName
    this.durationMinutes = options.durationMinutes
    this.capacity = options.capacity
    this.requiresTimelineEntry = options.requiresTimelineEntry
    this.order = options.sortOrder
  }

  timelineEntryRequired(): boolean {
    return this.requiresTimelineEntry
  }

  /** null keeps the type out of customer-facing listings */
  sortOrder(): number | null {
    return this.order
  }
}

export class LessonTypeRegistry {
  private readonly types = new Map<LessonTypeKey, LessonType>()

  constructor(types: Iterable<LessonType>) {
    for (const type of types) {
      if (this.types.has(type.key)) {
        throw new Error(`Lesson type '${type.key}' is registered twice`)
      }
      this.types.set(type.key, type)
    }
  }

  find(key: string): LessonType | undefined {
    return isLessonTypeKey(key) ? this.types.get(key) : undefined
  }

  get(key: string): LessonType {
    const type = this.find(key)
    if (!type) throw new NotFoundError('Lesson type', key)
    return type
  }

  all(): LessonType[] {
    return [...this.types.values()]
  }

  /** Types that appear in listings, in their display order */
  listed(keys?: Iterable<string>): LessonType[] {
    const pool = keys ? [...new Set(keys)].map(key => this.get(key)) : this.all()
    return pool
      .flatMap(type => {
        const order = type.sortOrder()
        return order === null ? [] : [{ type, order }]
      })
      .sort((a, b) => a.order - b.order)
      .map(({ type }) => type)
  }
}

export function isLessonTypeKey(value: string): value is LessonTypeKey {
  return LESSON_TYPE_KEYS.some(key => key === value)
}

export const lessonTypes = new LessonTypeRegistry([
  new LessonType({
    key: 'ordinary',
    name: 'Single lesson',
    internalName: 'Ordinary lesson',
    durationMinutes: 30,
    capacity: 1,
    requiresTimelineEntry: false,
    sortOrder: 10,
  }),
  new LessonType({
    key: 'paired',
    name: 'Lesson with a partner',
    internalName: 'Paired lesson',
    durationMinutes: 30,
    capacity: 2,
    requiresTimelineEntry: false,
    sortOrder: 20,
  }),
  new LessonType({
    key: 'master_class',
    name: 'Master class',
    internalName: 'Master class',
    durationMinutes: 30,
    capacity: 10,
    requiresTimelineEntry: true,
    sortOrder: 30,
  }),
  new LessonType({
    key: 'happy_hour',
    name: 'Happy hour',
    internalName: 'Happy hour',
    durationMinutes: 60,
    capacity: 20,
    requiresTimelineEntry: true,
    sortOrder: null,
  }),
])
