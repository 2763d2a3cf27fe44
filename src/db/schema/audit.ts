import {
  pgTable,
  uuid,
  text,
  timestamp,
  jsonb,
  index,
} from 'drizzle-orm/pg-core';
import { sql } from 'drizzle-orm';

/**
 * audit_log: Append-only trail of every state change. NO updatedAt.
 */
export const auditLog = pgTable('audit_log', {
  id:            uuid('id').primaryKey().defaultRandom(),
  actorId:       uuid('actor_id'),                  // NULL for system events

  action:        text('action').notNull(),          // 'CLASS_SCHEDULED', 'UNSAFE_CALENDAR_UPDATE', etc.
  entityType:    text('entity_type').notNull(),
  entityId:      uuid('entity_id'),
  payload:       jsonb('payload').$type<Record<string, unknown>>().default(sql`'{}'`),

  severity: text('severity', {
    enum: ['info', 'warning', 'critical'],
  }).notNull().default('info'),

  createdAt:     timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
}, (t) => ({
  idx_audit_log_entity: index('idx_audit_log_entity').on(t.entityType, t.entityId),
  idx_audit_log_action: index('idx_audit_log_action').on(t.action),
  idx_audit_log_created_at: index('idx_audit_log_created_at').on(t.createdAt),
}));
