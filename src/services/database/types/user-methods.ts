import type { User } from '@root/types/config.types.js'

declare module '../../database.service.js' {
  interface DatabaseService {
    // USER MANAGEMENT
    /**
     * Retrieves a user by ID
     * @param id - ID of the user
     * @returns Promise resolving to the user if found, undefined otherwise
     */
    getUser(id: number): Promise<User | undefined>

    /**
     * Returns the user with the given ID, creating it when missing
     * @param id - ID of the user
     * @param name - Name stored for a newly created user
     * @returns Promise resolving to the existing or created user
     */
    ensureUser(id: number, name: string): Promise<User>
  }
}
