import type { Queryable } from './queryable.js'
import type {
  CreateUsageRecordInput,
  UsageRecord,
  UsageRecordsStore,
  UsageSummary,
} from './types.js'

type UsageRecordRow = {
  id: string
  credential_id: string
  endpoint: string
  latency_ms: number
  status_code: number
  created_at: Date | string
}

type CountRow = { count: number }

type TotalsRow = {
  total_calls: number
  average_latency_ms: number
}

type EndpointRow = {
  endpoint: string
  calls: number
}

const TOP_ENDPOINTS_LIMIT = 10

const toDate = (value: Date | string): Date =>
  value instanceof Date ? value : new Date(value)

const mapUsageRecord = (row: UsageRecordRow): UsageRecord => ({
  id: String(row.id),
  credentialId: String(row.credential_id),
  endpoint: row.endpoint,
  latencyMs: row.latency_ms,
  statusCode: row.status_code,
  createdAt: toDate(row.created_at),
})

/**
 * Append-only. Timestamps come from the database clock so that every
 * gateway instance measures windows the same way.
 */
export class UsageRecordsRepository implements UsageRecordsStore {
  constructor(private readonly db: Queryable) {}

  async create(input: CreateUsageRecordInput): Promise<UsageRecord> {
    const result = await this.db.query<UsageRecordRow>(
      `
      INSERT INTO usage_records (credential_id, endpoint, latency_ms, status_code)
      VALUES ($1, $2, $3, $4)
      RETURNING id, credential_id, endpoint, latency_ms, status_code, created_at
      `,
      [input.credentialId, input.endpoint, input.latencyMs, input.statusCode]
    )

    return mapUsageRecord(result.rows[0])
  }

  async countSince(credentialId: string, windowHours: number): Promise<number> {
    const result = await this.db.query<CountRow>(
      `
      SELECT COUNT(*)::int AS count
      FROM usage_records
      WHERE credential_id = $1
        AND created_at >= NOW() - make_interval(hours => $2::int)
      `,
      [credentialId, windowHours]
    )

    return result.rows[0]?.count ?? 0
  }

  async summarize(credentialId: string, windowHours: number): Promise<UsageSummary> {
    const totals = await this.db.query<TotalsRow>(
      `
      SELECT COUNT(*)::int AS total_calls,
             COALESCE(AVG(latency_ms), 0)::float8 AS average_latency_ms
      FROM usage_records
      WHERE credential_id = $1
        AND created_at >= NOW() - make_interval(hours => $2::int)
      `,
      [credentialId, windowHours]
    )

    const endpoints = await this.db.query<EndpointRow>(
      `
      SELECT endpoint, COUNT(*)::int AS calls
      FROM usage_records
      WHERE credential_id = $1
        AND created_at >= NOW() - make_interval(hours => $2::int)
      GROUP BY endpoint
      ORDER BY calls DESC, endpoint ASC
      LIMIT $3
      `,
      [credentialId, windowHours, TOP_ENDPOINTS_LIMIT]
    )

    return {
      totalCalls: totals.rows[0]?.total_calls ?? 0,
      averageLatencyMs: Math.round((totals.rows[0]?.average_latency_ms ?? 0) * 100) / 100,
      byEndpoint: endpoints.rows.map((row) => ({ endpoint: row.endpoint, calls: row.calls })),
    }
  }
}
