import {integer, sqliteTable, text} from 'drizzle-orm/sqlite-core';

export const countries = sqliteTable('countries', {
  id: integer().primaryKey({autoIncrement: true}),
  code: text().notNull().unique(),
  name: text(),
});
