import {createClient, type ResultSet} from '@libsql/client';
import {drizzle} from 'drizzle-orm/libsql';
import type {BaseSQLiteDatabase} from 'drizzle-orm/sqlite-core';
import * as schema from './schema/index';

// Re-export drizzle-orm utilities
export {and, asc, count, desc, eq} from 'drizzle-orm';
export {applySchema} from './migrate';
export {withWriteLock} from './write-lock';

export type Environment = {
  DATABASE_URL: string;
  DATABASE_AUTH_TOKEN?: string;
};

export const getDatabase = (environment: Environment) => {
  const client = createClient({
    url: environment.DATABASE_URL,
    authToken: environment.DATABASE_AUTH_TOKEN,
  });

  return drizzle(client, {
    schema: {
      ...schema,
    },
    casing: 'snake_case',
  });
};

export type Database = ReturnType<typeof getDatabase>;

/** Either the database itself or an open transaction on it. */
export type DatabaseExecutor = BaseSQLiteDatabase<
  'async',
  ResultSet,
  typeof schema
>;

export type Movie = typeof schema.movies.$inferSelect;
export type NewMovie = typeof schema.movies.$inferInsert;
export type Country = typeof schema.countries.$inferSelect;
export type Genre = typeof schema.genres.$inferSelect;
export type Actor = typeof schema.actors.$inferSelect;
export type Language = typeof schema.languages.$inferSelect;
export type {MovieStatus} from './schema/movies';
export {movieStatuses} from './schema/movies';
