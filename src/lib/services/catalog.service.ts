import { db, type Executor } from '../../db'
import { lessons, productLessons, products } from '../../db/schema'
import { asc, eq } from 'drizzle-orm'
import { NotFoundError } from '../errors'
import { lessonTypes } from '../lessons/registry'
import type { ProductUnit, Product } from '../types/market.types'
import type { Lesson, LessonDetails, LessonRef } from '../types/timeline.types'

// ── Lessons ────────────────────────────────────────────────────────────────

export async function getLessonOrThrow(lessonId: string, executor: Executor = db): Promise<Lesson> {
  const rows = await executor
    .select()
    .from(lessons)
    .where(eq(lessons.id, lessonId))
    .limit(1)

  if (rows.length === 0) throw new NotFoundError('Lesson', lessonId)
  return rows[0]
}

export async function resolveLesson(ref: LessonRef, executor: Executor = db): Promise<LessonDetails> {
  const lesson = await getLessonOrThrow(ref.lessonId, executor)
  if (lesson.lessonType !== ref.lessonType) {
    throw new Error(`Lesson ${lesson.id} is '${lesson.lessonType}', referenced as '${ref.lessonType}'`)
  }

  return {
    id: lesson.id,
    name: lesson.name,
    type: lessonTypes.get(lesson.lessonType),
    hostId: lesson.hostId,
  }
}

// ── Products ───────────────────────────────────────────────────────────────

export async function getProductOrThrow(productId: string, executor: Executor = db): Promise<Product> {
  const rows = await executor
    .select()
    .from(products)
    .where(eq(products.id, productId))
    .limit(1)

  if (rows.length === 0) throw new NotFoundError('Product', productId)
  return rows[0]
}

/**
 * Lesson units granted by a product, grouped by lesson type in registry
 * order and then in the order they were added to the product.
 */
export async function getProductUnits(productId: string, executor: Executor = db): Promise<ProductUnit[]> {
  const rows = await executor
    .select({ lessonId: lessons.id, lessonType: lessons.lessonType })
    .from(productLessons)
    .innerJoin(lessons, eq(productLessons.lessonId, lessons.id))
    .where(eq(productLessons.productId, productId))
    .orderBy(asc(productLessons.createdAt), asc(productLessons.id))

  const typeOrder = lessonTypes.all().map(type => type.key)
  return rows
    .map((row, position) => ({ row, position }))
    .sort((a, b) =>
      typeOrder.indexOf(a.row.lessonType) - typeOrder.indexOf(b.row.lessonType) ||
      a.position - b.position
    )
    .map(({ row }) => row)
}
