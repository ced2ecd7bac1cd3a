import type { Queryable } from './queryable.js'
import type { AccountRecord, AccountsStore } from './types.js'

type AccountRow = {
  id: string
  email: string
  active: boolean
  created_at: Date | string
}

const toDate = (value: Date | string): Date =>
  value instanceof Date ? value : new Date(value)

const mapAccount = (row: AccountRow): AccountRecord => ({
  id: String(row.id),
  email: row.email,
  active: row.active,
  createdAt: toDate(row.created_at),
})

/**
 * Accounts belong to account management; the gateway creates them only for
 * provisioning and tests, and otherwise reads the active flag.
 */
export class AccountsRepository implements AccountsStore {
  constructor(private readonly db: Queryable) {}

  async create(email: string): Promise<AccountRecord> {
    const result = await this.db.query<AccountRow>(
      `
      INSERT INTO accounts (email)
      VALUES ($1)
      RETURNING id, email, active, created_at
      `,
      [email]
    )

    return mapAccount(result.rows[0])
  }

  async findById(id: string): Promise<AccountRecord | null> {
    const result = await this.db.query<AccountRow>(
      `
      SELECT id, email, active, created_at
      FROM accounts
      WHERE id = $1
      `,
      [id]
    )

    return result.rows[0] ? mapAccount(result.rows[0]) : null
  }

  async setActive(id: string, active: boolean): Promise<AccountRecord | null> {
    const result = await this.db.query<AccountRow>(
      `
      UPDATE accounts
      SET active = $2
      WHERE id = $1
      RETURNING id, email, active, created_at
      `,
      [id, active]
    )

    return result.rows[0] ? mapAccount(result.rows[0]) : null
  }
}
