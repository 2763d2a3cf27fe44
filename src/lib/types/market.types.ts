import type { InferSelectModel } from 'drizzle-orm'
import type { classes, customers, products, subscriptions } from '../../db/schema'
import type { LessonTypeKey } from '../lessons/registry'

// ── Drizzle inferred types ─────────────────────────────────────────────────

export type Customer = InferSelectModel<typeof customers>
export type Product = InferSelectModel<typeof products>
export type Subscription = InferSelectModel<typeof subscriptions>
export type LessonClass = InferSelectModel<typeof classes>
export type BuySource = LessonClass['buySource']

// ── Catalog ────────────────────────────────────────────────────────────────

/** One lesson a product grants; a product lists one unit per lesson */
export interface ProductUnit {
  lessonId: string
  lessonType: LessonTypeKey
}

// ── Request shapes ─────────────────────────────────────────────────────────

export interface BuySingleClassRequest {
  customerId: string
  lessonId: string
  buyPriceCents: number
}

export interface CreateSubscriptionRequest {
  customerId: string
  productId: string
  buyPriceCents: number
  active?: boolean
}

export interface UpdateSubscriptionRequest {
  active?: boolean
  buyPriceCents?: number
}
