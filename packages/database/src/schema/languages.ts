import {integer, sqliteTable, text} from 'drizzle-orm/sqlite-core';

export const languages = sqliteTable('languages', {
  id: integer().primaryKey({autoIncrement: true}),
  name: text().notNull().unique(),
});
