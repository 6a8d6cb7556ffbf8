import {
  index,
  integer,
  real,
  sqliteTable,
  text,
  unique,
} from 'drizzle-orm/sqlite-core';
import {countries} from './countries';

export const movieStatuses = [
  'Released',
  'Post Production',
  'In Production',
] as const;

export type MovieStatus = (typeof movieStatuses)[number];

export const movies = sqliteTable(
  'movies',
  {
    id: integer().primaryKey({autoIncrement: true}),
    name: text().notNull(),
    date: text().notNull(), // YYYY-MM-DD format
    score: real().notNull(),
    overview: text().notNull(),
    status: text({enum: movieStatuses}).notNull(),
    budget: real().notNull(),
    revenue: real().notNull(),
    countryId: integer()
      .notNull()
      .references(() => countries.id),
  },
  table => [
    unique('movies_name_date_unique').on(table.name, table.date),
    index('movies_country_id_idx').on(table.countryId),
  ],
);
