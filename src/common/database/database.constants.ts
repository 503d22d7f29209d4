/**
 * Dependency injection tokens for database services
 * These tokens are used to inject the appropriate database implementation
 */

export const DATABASE_TOKENS = {
  READING_DATABASE: 'READING_DATABASE',
  COUCHDB_CONNECTION: 'COUCHDB_CONNECTION',
} as const;

export enum DatabaseType {
  MEMORY = 'memory',
  MONGODB = 'mongodb',
  COUCHDB = 'couchdb',
}

/**
 * Maps a configured DATABASE_TYPE value to a supported type, defaulting to memory
 */
export function resolveDatabaseType(value: string): DatabaseType {
  switch (value.toLowerCase()) {
    case DatabaseType.MONGODB:
      return DatabaseType.MONGODB;
    case DatabaseType.COUCHDB:
      return DatabaseType.COUCHDB;
    default:
      return DatabaseType.MEMORY;
  }
}
