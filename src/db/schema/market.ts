import {
  pgTable,
  uuid,
  text,
  integer,
  boolean,
  timestamp,
  index,
  uniqueIndex,
} from 'drizzle-orm/pg-core';
import { customers } from './people';
import { lessons, timelineEntries } from './timeline';
import { LESSON_TYPE_KEYS } from '../../lib/lessons/registry';

// ─────────────────────────────────────────────────────────────────────────────
// PRODUCTS
// ─────────────────────────────────────────────────────────────────────────────

/**
 * products: Subscription bundles.
 */
export const products = pgTable('products', {
  id:          uuid('id').primaryKey().defaultRandom(),
  name:        text('name').notNull(),
  description: text('description'),
  isActive:    boolean('is_active').notNull().default(true),
  createdAt:   timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  updatedAt:   timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
});


/**
 * product_lessons: One row per lesson unit a product grants.
 * A product granting five ordinary lessons has five rows.
 */
export const productLessons = pgTable('product_lessons', {
  id:          uuid('id').primaryKey().defaultRandom(),
  productId:   uuid('product_id').references(() => products.id, { onDelete: 'cascade' }).notNull(),
  lessonId:    uuid('lesson_id').references(() => lessons.id).notNull(),
  createdAt:   timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
}, (t) => ({
  idx_product_lessons_product_id: index('idx_product_lessons_product_id').on(t.productId),
}));


// ─────────────────────────────────────────────────────────────────────────────
// PURCHASES
// ─────────────────────────────────────────────────────────────────────────────

/**
 * subscriptions: Bought product bundles.
 * Toggling `active` is mirrored onto every class the subscription produced.
 */
export const subscriptions = pgTable('subscriptions', {
  id:            uuid('id').primaryKey().defaultRandom(),
  customerId:    uuid('customer_id').references(() => customers.id).notNull(),
  productId:     uuid('product_id').references(() => products.id).notNull(),
  buyPriceCents: integer('buy_price_cents').notNull(),  // integer cents
  active:        boolean('active').notNull().default(true),
  buyTime:       timestamp('buy_time', { withTimezone: true }).notNull().defaultNow(),
  createdAt:     timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  updatedAt:     timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
}, (t) => ({
  idx_subscriptions_customer_id: index('idx_subscriptions_customer_id').on(t.customerId),
}));


export const BUY_SOURCES = ['single', 'subscription'] as const;

/**
 * classes: Single bought lessons, the unit a customer schedules.
 * isScheduled mirrors `timelineEntryId IS NOT NULL`; it is recomputed on
 * every write (see saveClass).
 */
export const classes = pgTable('classes', {
  id:              uuid('id').primaryKey().defaultRandom(),
  customerId:      uuid('customer_id').references(() => customers.id).notNull(),

  lessonType:      text('lesson_type', { enum: LESSON_TYPE_KEYS }).notNull(),
  lessonId:        uuid('lesson_id').references(() => lessons.id).notNull(),

  buyPriceCents:   integer('buy_price_cents').notNull(),
  buySource:       text('buy_source', { enum: BUY_SOURCES }).notNull().default('single'),
  subscriptionId:  uuid('subscription_id').references(() => subscriptions.id, { onDelete: 'cascade' }),

  timelineEntryId: uuid('timeline_entry_id').references(() => timelineEntries.id),
  isScheduled:     boolean('is_scheduled').notNull().default(false),
  active:          boolean('active').notNull().default(true),

  buyTime:         timestamp('buy_time', { withTimezone: true }).notNull().defaultNow(),
  createdAt:       timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  updatedAt:       timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
}, (t) => ({
  idx_classes_customer_id: index('idx_classes_customer_id').on(t.customerId),
  idx_classes_subscription_id: index('idx_classes_subscription_id').on(t.subscriptionId),
  idx_classes_timeline_entry_id: index('idx_classes_timeline_entry_id').on(t.timelineEntryId),
}));
