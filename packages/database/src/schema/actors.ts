import {integer, sqliteTable, text} from 'drizzle-orm/sqlite-core';

export const actors = sqliteTable('actors', {
  id: integer().primaryKey({autoIncrement: true}),
  name: text().notNull().unique(),
});
