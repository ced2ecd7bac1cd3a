import { ConflictError } from '../../errors.js'
import { PlanTier, parsePlanTier } from '../../types/plan.js'
import { UNIQUE_VIOLATION, isPgErrorCode, type Queryable } from './queryable.js'
import type {
  CreateCredentialInput,
  CredentialMatch,
  CredentialRecord,
  CredentialsStore,
} from './types.js'

type CredentialRow = {
  id: string
  account_id: string
  key_prefix: string
  plan_tier: string
  active: boolean
  created_at: Date | string
}

type CredentialMatchRow = CredentialRow & {
  account_active: boolean
}

const CREDENTIAL_COLUMNS = 'id, account_id, key_prefix, plan_tier, active, created_at'

const toDate = (value: Date | string): Date =>
  value instanceof Date ? value : new Date(value)

const mapCredential = (row: CredentialRow): CredentialRecord => ({
  id: String(row.id),
  accountId: String(row.account_id),
  keyPrefix: row.key_prefix,
  // A tier this build does not know gets the most restrictive ceiling.
  planTier: parsePlanTier(row.plan_tier) ?? PlanTier.FREE,
  active: row.active,
  createdAt: toDate(row.created_at),
})

export class CredentialsRepository implements CredentialsStore {
  constructor(private readonly db: Queryable) {}

  async create(input: CreateCredentialInput): Promise<CredentialRecord> {
    try {
      const result = await this.db.query<CredentialRow>(
        `
        INSERT INTO credentials (account_id, fingerprint, key_prefix, plan_tier)
        VALUES ($1, $2, $3, $4)
        RETURNING ${CREDENTIAL_COLUMNS}
        `,
        [input.accountId, input.fingerprint, input.keyPrefix, input.planTier]
      )

      return mapCredential(result.rows[0])
    } catch (error) {
      if (isPgErrorCode(error, UNIQUE_VIOLATION)) {
        throw new ConflictError('Credential fingerprint already exists')
      }
      throw error
    }
  }

  async findById(id: string): Promise<CredentialRecord | null> {
    const result = await this.db.query<CredentialRow>(
      `
      SELECT ${CREDENTIAL_COLUMNS}
      FROM credentials
      WHERE id = $1
      `,
      [id]
    )

    return result.rows[0] ? mapCredential(result.rows[0]) : null
  }

  /**
   * Same statement whether the key is unknown, revoked or owned by an
   * inactive account; the caller inspects both flags.
   */
  async findByFingerprint(fingerprint: string): Promise<CredentialMatch | null> {
    const result = await this.db.query<CredentialMatchRow>(
      `
      SELECT c.id, c.account_id, c.key_prefix, c.plan_tier, c.active, c.created_at,
             a.active AS account_active
      FROM credentials c
      JOIN accounts a ON a.id = c.account_id
      WHERE c.fingerprint = $1
      `,
      [fingerprint]
    )

    const row = result.rows[0]
    return row ? { ...mapCredential(row), accountActive: row.account_active } : null
  }

  async listByAccount(accountId: string): Promise<CredentialRecord[]> {
    const result = await this.db.query<CredentialRow>(
      `
      SELECT ${CREDENTIAL_COLUMNS}
      FROM credentials
      WHERE account_id = $1
      ORDER BY created_at DESC, id DESC
      `,
      [accountId]
    )

    return result.rows.map(mapCredential)
  }

  async deactivate(id: string): Promise<boolean> {
    const result = await this.db.query(
      `
      UPDATE credentials
      SET active = FALSE
      WHERE id = $1
      `,
      [id]
    )

    return (result.rowCount ?? 0) > 0
  }
}
