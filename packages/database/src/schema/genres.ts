import {integer, sqliteTable, text} from 'drizzle-orm/sqlite-core';

export const genres = sqliteTable('genres', {
  id: integer().primaryKey({autoIncrement: true}),
  name: text().notNull().unique(),
});
