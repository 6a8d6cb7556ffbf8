import {index, integer, primaryKey, sqliteTable} from 'drizzle-orm/sqlite-core';
import {actors} from './actors';
import {genres} from './genres';
import {languages} from './languages';
import {movies} from './movies';

// Association rows go with their movie; lookup rows are shared and stay.

export const moviesGenres = sqliteTable(
  'movies_genres',
  {
    movieId: integer()
      .notNull()
      .references(() => movies.id, {onDelete: 'cascade'}),
    genreId: integer()
      .notNull()
      .references(() => genres.id, {onDelete: 'cascade'}),
  },
  table => [
    primaryKey({columns: [table.movieId, table.genreId]}),
    index('movies_genres_genre_id_idx').on(table.genreId),
  ],
);

export const actorsMovies = sqliteTable(
  'actors_movies',
  {
    movieId: integer()
      .notNull()
      .references(() => movies.id, {onDelete: 'cascade'}),
    actorId: integer()
      .notNull()
      .references(() => actors.id, {onDelete: 'cascade'}),
  },
  table => [
    primaryKey({columns: [table.movieId, table.actorId]}),
    index('actors_movies_actor_id_idx').on(table.actorId),
  ],
);

export const moviesLanguages = sqliteTable(
  'movies_languages',
  {
    movieId: integer()
      .notNull()
      .references(() => movies.id, {onDelete: 'cascade'}),
    languageId: integer()
      .notNull()
      .references(() => languages.id, {onDelete: 'cascade'}),
  },
  table => [
    primaryKey({columns: [table.movieId, table.languageId]}),
    index('movies_languages_language_id_idx').on(table.languageId),
  ],
);
