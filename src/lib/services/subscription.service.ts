import { db, type Executor } from '../../db'
import { auditLog, classes, customers, subscriptions } from '../../db/schema'
import { eq } from 'drizzle-orm'
import { z } from 'zod'
import { NotFoundError } from '../errors'
import { getProductOrThrow, getProductUnits } from './catalog.service'
import { saveClasses } from './class.service'
import type {
  CreateSubscriptionRequest,
  LessonClass,
  Subscription,
  UpdateSubscriptionRequest,
} from '../types/market.types'

const createSubscriptionSchema = z.object({
  customerId: z.string().uuid(),
  productId: z.string().uuid(),
  buyPriceCents: z.number().int().nonnegative(),
  active: z.boolean().default(true),
})

const updateSubscriptionSchema = z.object({
  active: z.boolean().optional(),
  buyPriceCents: z.number().int().nonnegative().optional(),
})

export interface SubscriptionWithClasses {
  subscription: Subscription
  classes: LessonClass[]
}

// ── Purchase ───────────────────────────────────────────────────────────────

/**
 * Stores a bought subscription and hands the customer one class per lesson
 * unit of the product. Provisioning happens here and nowhere else, so later
 * updates never add classes.
 */
export async function createSubscription(
  data: CreateSubscriptionRequest,
  actorId?: string
): Promise<SubscriptionWithClasses> {
  const input = createSubscriptionSchema.parse(data)

  return db.transaction(async (tx) => {
    const customerRows = await tx
      .select({ id: customers.id })
      .from(customers)
      .where(eq(customers.id, input.customerId))
      .limit(1)
    if (customerRows.length === 0) throw new NotFoundError('Customer', input.customerId)

    const product = await getProductOrThrow(input.productId, tx)
    if (!product.isActive) throw new Error(`Product ${product.id} is not on sale`)

    const [subscription] = await tx
      .insert(subscriptions)
      .values({
        customerId: input.customerId,
        productId: product.id,
        buyPriceCents: input.buyPriceCents,
        active: input.active,
      })
      .returning()

    const units = await getProductUnits(product.id, tx)
    const provisioned = units.length === 0
      ? []
      : await tx
        .insert(classes)
        .values(
          units.map(unit => ({
            customerId: subscription.customerId,
            lessonType: unit.lessonType,
            lessonId: unit.lessonId,
            buyPriceCents: subscription.buyPriceCents,
            buySource: 'subscription' as const,
            subscriptionId: subscription.id,
            active: subscription.active,
          }))
        )
        .returning()

    await tx.insert(auditLog).values({
      actorId,
      action: 'SUBSCRIPTION_CREATED',
      entityType: 'subscription',
      entityId: subscription.id,
      payload: {
        customerId: subscription.customerId,
        productId: product.id,
        classCount: provisioned.length,
      },
    })

    console.info(`[Market] Subscription ${subscription.id} provisioned ${provisioned.length} classes`)

    return { subscription, classes: provisioned }
  })
}

// ── Update ─────────────────────────────────────────────────────────────────

/**
 * Updates a subscription. A change of `active` against the stored row is
 * mirrored onto every class the subscription produced, and only onto those.
 */
export async function updateSubscription(
  subscriptionId: string,
  data: UpdateSubscriptionRequest,
  actorId?: string
): Promise<Subscription> {
  const changes = updateSubscriptionSchema.parse(data)

  return db.transaction(async (tx) => {
    const stored = await getSubscriptionOrThrow(subscriptionId, tx, { lock: true })

    const [updated] = await tx
      .update(subscriptions)
      .set({ ...changes, updatedAt: new Date() })
      .where(eq(subscriptions.id, subscriptionId))
      .returning()

    if (updated.active !== stored.active) {
      await cascadeActive(tx, updated)

      await tx.insert(auditLog).values({
        actorId,
        action: updated.active ? 'SUBSCRIPTION_ENABLED' : 'SUBSCRIPTION_DISABLED',
        entityType: 'subscription',
        entityId: subscriptionId,
        payload: { from: stored.active, to: updated.active },
        severity: updated.active ? 'info' : 'warning',
      })
    }

    return updated
  })
}

export async function enableSubscription(subscriptionId: string, actorId?: string): Promise<Subscription> {
  return updateSubscription(subscriptionId, { active: true }, actorId)
}

export async function disableSubscription(subscriptionId: string, actorId?: string): Promise<Subscription> {
  return updateSubscription(subscriptionId, { active: false }, actorId)
}

async function cascadeActive(tx: Executor, subscription: Subscription): Promise<void> {
  const touched = await saveClasses(tx, eq(classes.subscriptionId, subscription.id), {
    active: subscription.active,
  })

  console.info(
    `[Market] Subscription ${subscription.id} ${subscription.active ? 'enabled' : 'disabled'}, ${touched.length} classes follow`
  )
}

// ── Helpers ────────────────────────────────────────────────────────────────

export async function getSubscriptionOrThrow(
  subscriptionId: string,
  executor: Executor = db,
  options: { lock?: boolean } = {}
): Promise<Subscription> {
  const query = executor
    .select()
    .from(subscriptions)
    .where(eq(subscriptions.id, subscriptionId))
    .limit(1)

  const rows = options.lock ? await query.for('update') : await query
  if (rows.length === 0) throw new NotFoundError('Subscription', subscriptionId)
  return rows[0]
}

export async function listSubscriptionClasses(subscriptionId: string): Promise<LessonClass[]> {
  return db
    .select()
    .from(classes)
    .where(eq(classes.subscriptionId, subscriptionId))
    .orderBy(classes.createdAt, classes.id)
}
