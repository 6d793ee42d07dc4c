import type { User } from '@root/types/config.types.js'
import type { DatabaseService } from '@services/database.service.js'

interface UserRow {
  id: number
  name: string
  created_at: string
  updated_at: string
}

export function mapRowToUser(row: UserRow): User {
  return {
    id: row.id,
    name: row.name,
    created_at: row.created_at,
    updated_at: row.updated_at,
  }
}

/**
 * Retrieves a user by ID
 */
export async function getUser(
  this: DatabaseService,
  id: number,
): Promise<User | undefined> {
  const row = await this.knex<UserRow>('users').where({ id }).first()
  return row ? mapRowToUser(row) : undefined
}

/**
 * Returns the user with the given ID, creating it under that ID when missing.
 * An existing user keeps its name.
 */
export async function ensureUser(
  this: DatabaseService,
  id: number,
  name: string,
): Promise<User> {
  const existing = await this.getUser(id)
  if (existing) {
    return existing
  }

  const now = this.timestamp
  await this.knex('users').insert({
    id,
    name,
    created_at: now,
    updated_at: now,
  })

  return { id, name, created_at: now, updated_at: now }
}
