import pg from 'pg'
import { createSchema } from './schema.js'

const { Pool } = pg

export function createPool(connectionString: string): pg.Pool {
  const pool = new Pool({ connectionString })

  pool.on('error', (err) => {
    console.error('Unexpected error on idle client', err)
    process.exit(-1)
  })

  return pool
}

export async function initDb(pool: pg.Pool): Promise<void> {
  const client = await pool.connect()
  try {
    await createSchema(client)
    console.log('Keygate tables initialized successfully.')
  } finally {
    client.release()
  }
}
