import 'dotenv/config'
import { z } from 'zod'

const UTC_OFFSET = /^[+-](0\d|1[0-4]):[0-5]\d$/

const envSchema = z.object({
  DATABASE_URL: z.string().trim().min(1).optional(),
  // Offset of the school's wall clock; working hours and slot labels are read in it
  SCHOOL_UTC_OFFSET: z.string().trim().regex(UTC_OFFSET, 'expected +HH:MM or -HH:MM').default('+00:00'),
  SLOT_GRANULARITY_MINUTES: z.coerce.number().int().positive().max(24 * 60).default(30),
  PLANNING_HORIZON_DAYS: z.coerce.number().int().positive().max(366).default(7),
})

export type AppConfig = {
  databaseUrl: string | undefined
  utcOffset: string
  slotGranularityMinutes: number
  planningHorizonDays: number
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env)
  if (!parsed.success) {
    const details = parsed.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ')
    throw new Error(`Invalid environment configuration: ${details}`)
  }

  return {
    databaseUrl: parsed.data.DATABASE_URL,
    utcOffset: parsed.data.SCHOOL_UTC_OFFSET,
    slotGranularityMinutes: parsed.data.SLOT_GRANULARITY_MINUTES,
    planningHorizonDays: parsed.data.PLANNING_HORIZON_DAYS,
  }
}

export const config = loadConfig()
