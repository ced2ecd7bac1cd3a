import { z } from 'zod'

const nonEmpty = z.string().trim().min(1)

export const checkRankingBodySchema = z.object({
  domain: nonEmpty.max(253),
  keyword: nonEmpty.max(200),
  locations: z.array(nonEmpty).min(1).max(50),
})

export const createMonitorBodySchema = z.object({
  domain: nonEmpty.max(253),
  keywords: z.array(nonEmpty.max(200)).min(1).max(50),
  locations: z.array(nonEmpty).min(1).max(50),
})

export const reportParamsSchema = z.object({
  monitorId: z.string().regex(/^[A-Za-z0-9-]{1,64}$/, 'monitorId must be 1-64 letters, digits or dashes'),
})

export const usageQuerySchema = z.object({
  days: z.coerce.number().int().min(1).max(90).default(1),
})
