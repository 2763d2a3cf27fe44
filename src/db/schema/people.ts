import {
    pgTable,
    uuid,
    text,
    timestamp,
    boolean,
    index,
} from 'drizzle-orm/pg-core';

export const CUSTOMER_LEVELS = ['A1', 'A2', 'A3', 'B1', 'B2', 'B3', 'C1', 'C2', 'C3'] as const;

// ─────────────────────────────────────────────
// TEACHERS
// Own their working hours and timeline entries.
// ─────────────────────────────────────────────
export const teachers = pgTable('teachers', {
    id: uuid('id').primaryKey().defaultRandom(),

    firstName: text('first_name').notNull(),
    lastName: text('last_name').notNull(),
    email: text('email').notNull().unique(),

    isActive: boolean('is_active').notNull().default(true),

    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
}, (table) => ({
    idx_teachers_active: index('idx_teachers_active').on(table.isActive),
}));

// ─────────────────────────────────────────────
// CUSTOMERS
// Own their classes and subscriptions.
// Identity lives in the account system: userId is TEXT, not a foreign key,
// and stays NULL for customers without an account.
// ─────────────────────────────────────────────
export const customers = pgTable('customers', {
    id: uuid('id').primaryKey().defaultRandom(),
    userId: text('user_id').unique(),

    firstName: text('first_name').notNull(),
    lastName: text('last_name').notNull(),
    email: text('email').notNull(),

    startingLevel: text('starting_level', { enum: CUSTOMER_LEVELS }).notNull().default('A1'),
    currentLevel: text('current_level', { enum: CUSTOMER_LEVELS }).notNull().default('A1'),

    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
}, (table) => ({
    idx_customers_email: index('idx_customers_email').on(table.email),
    idx_customers_current_level: index('idx_customers_current_level').on(table.currentLevel),
}));
