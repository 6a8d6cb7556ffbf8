import {
  actors,
  actorsMovies,
  countries,
  genres,
  languages,
  movies,
  moviesGenres,
  moviesLanguages,
} from '@theater/database/schema';
import {
  and,
  asc,
  count,
  desc,
  eq,
  type Actor,
  type Country,
  type DatabaseExecutor,
  type Genre,
  type Language,
  type Movie,
  type NewMovie,
} from '@theater/database';
import {getOffset, getTotalPages} from '../utils/pagination';
import {BaseService} from './base-service';
import {
  duplicateMovie,
  isUniqueConstraintViolation,
  movieNotFound,
  ResourceNotFoundError,
} from './errors';
import {LookupService} from './lookup-service';
import type {
  MovieCreateInput,
  MovieDetail,
  MovieListPage,
  MovieUpdateInput,
  PaginationOptions,
} from './types';

type MovieRelations = {
  genres: Genre[];
  actors: Actor[];
  languages: Language[];
};

export class MoviesService extends BaseService {
  async listMovies({page, perPage}: PaginationOptions): Promise<MovieListPage> {
    const [{totalItems}] = await this.database
      .select({totalItems: count()})
      .from(movies);

    if (totalItems === 0) {
      throw new ResourceNotFoundError('No movies found.', {
        resource: 'movie',
        identifier: `page=${page}`,
      });
    }

    const totalPages = getTotalPages(totalItems, perPage);
    if (page > totalPages) {
      throw new ResourceNotFoundError('Page out of range', {
        resource: 'page',
        identifier: String(page),
      });
    }

    const items = await this.database
      .select({
        id: movies.id,
        name: movies.name,
        date: movies.date,
        score: movies.score,
        overview: movies.overview,
      })
      .from(movies)
      .orderBy(desc(movies.id))
      .limit(perPage)
      .offset(getOffset(page, perPage));

    return {movies: items, totalItems, totalPages};
  }

  async getMovieDetails(movieId: number): Promise<MovieDetail> {
    return this.loadMovieDetails(this.database, movieId);
  }

  async createMovie(input: MovieCreateInput): Promise<MovieDetail> {
    return this.transaction(async tx => {
      await this.assertIdentityAvailable(tx, input.name, input.date);

      const lookups = new LookupService(tx);
      const country = await lookups.findOrCreateCountry(input.country);
      const relations: MovieRelations = {
        genres: await lookups.resolveGenres(input.genres),
        actors: await lookups.resolveActors(input.actors),
        languages: await lookups.resolveLanguages(input.languages),
      };

      const movie = await this.insertMovie(tx, {
        name: input.name,
        date: input.date,
        score: input.score,
        overview: input.overview,
        status: input.status,
        budget: input.budget,
        revenue: input.revenue,
        countryId: country.id,
      });

      if (relations.genres.length > 0) {
        await tx.insert(moviesGenres).values(
          relations.genres.map(genre => ({
            movieId: movie.id,
            genreId: genre.id,
          })),
        );
      }

      if (relations.actors.length > 0) {
        await tx.insert(actorsMovies).values(
          relations.actors.map(actor => ({
            movieId: movie.id,
            actorId: actor.id,
          })),
        );
      }

      if (relations.languages.length > 0) {
        await tx.insert(moviesLanguages).values(
          relations.languages.map(language => ({
            movieId: movie.id,
            languageId: language.id,
          })),
        );
      }

      return toMovieDetail(movie, country, relations);
    });
  }

  async deleteMovie(movieId: number): Promise<void> {
    await this.transaction(async tx => {
      await this.requireMovie(tx, movieId);

      await tx.delete(moviesGenres).where(eq(moviesGenres.movieId, movieId));
      await tx.delete(actorsMovies).where(eq(actorsMovies.movieId, movieId));
      await tx
        .delete(moviesLanguages)
        .where(eq(moviesLanguages.movieId, movieId));
      await tx.delete(movies).where(eq(movies.id, movieId));
    });
  }

  /** Applies only the supplied fields; relations are left as they are. */
  async updateMovie(movieId: number, changes: MovieUpdateInput): Promise<void> {
    await this.transaction(async tx => {
      const movie = await this.requireMovie(tx, movieId);

      const hasChanges = Object.values(changes).some(
        value => value !== undefined,
      );
      if (!hasChanges) {
        return;
      }

      const name = changes.name ?? movie.name;
      const date = changes.date ?? movie.date;
      if (name !== movie.name || date !== movie.date) {
        await this.assertIdentityAvailable(tx, name, date);
      }

      try {
        await tx.update(movies).set(changes).where(eq(movies.id, movieId));
      } catch (error) {
        if (isUniqueConstraintViolation(error)) {
          throw duplicateMovie(name, date);
        }

        throw error;
      }
    });
  }

  private async requireMovie(
    database: DatabaseExecutor,
    movieId: number,
  ): Promise<Movie> {
    const [movie] = await database
      .select()
      .from(movies)
      .where(eq(movies.id, movieId))
      .limit(1);

    if (!movie) {
      throw movieNotFound(movieId);
    }

    return movie;
  }

  /** Finds the movie released under `name` on `date`, if there is one. */
  async findMovieByIdentity(
    name: string,
    date: string,
    database: DatabaseExecutor = this.database,
  ): Promise<Pick<Movie, 'id'> | undefined> {
    const [existing] = await database
      .select({id: movies.id})
      .from(movies)
      .where(and(eq(movies.name, name), eq(movies.date, date)))
      .limit(1);

    return existing;
  }

  private async assertIdentityAvailable(
    database: DatabaseExecutor,
    name: string,
    date: string,
  ): Promise<void> {
    if (await this.findMovieByIdentity(name, date, database)) {
      throw duplicateMovie(name, date);
    }
  }

  // The read in assertIdentityAvailable is not atomic with this insert; the
  // unique index on (name, date) settles concurrent creates.
  private async insertMovie(
    database: DatabaseExecutor,
    values: NewMovie,
  ): Promise<Movie> {
    try {
      const [movie] = await database.insert(movies).values(values).returning();
      return movie;
    } catch (error) {
      if (isUniqueConstraintViolation(error)) {
        throw duplicateMovie(values.name, values.date);
      }

      throw error;
    }
  }

  private async loadMovieDetails(
    database: DatabaseExecutor,
    movieId: number,
  ): Promise<MovieDetail> {
    const [row] = await database
      .select({movie: movies, country: countries})
      .from(movies)
      .innerJoin(countries, eq(movies.countryId, countries.id))
      .where(eq(movies.id, movieId))
      .limit(1);

    if (!row) {
      throw movieNotFound(movieId);
    }

    const movieGenres = await database
      .select({id: genres.id, name: genres.name})
      .from(moviesGenres)
      .innerJoin(genres, eq(moviesGenres.genreId, genres.id))
      .where(eq(moviesGenres.movieId, movieId))
      .orderBy(asc(genres.id));

    const movieActors = await database
      .select({id: actors.id, name: actors.name})
      .from(actorsMovies)
      .innerJoin(actors, eq(actorsMovies.actorId, actors.id))
      .where(eq(actorsMovies.movieId, movieId))
      .orderBy(asc(actors.id));

    const movieLanguages = await database
      .select({id: languages.id, name: languages.name})
      .from(moviesLanguages)
      .innerJoin(languages, eq(moviesLanguages.languageId, languages.id))
      .where(eq(moviesLanguages.movieId, movieId))
      .orderBy(asc(languages.id));

    return toMovieDetail(row.movie, row.country, {
      genres: movieGenres,
      actors: movieActors,
      languages: movieLanguages,
    });
  }
}

function toMovieDetail(
  movie: Movie,
  country: Country,
  relations: MovieRelations,
): MovieDetail {
  return {
    id: movie.id,
    name: movie.name,
    date: movie.date,
    score: movie.score,
    overview: movie.overview,
    status: movie.status,
    budget: movie.budget,
    revenue: movie.revenue,
    country: {id: country.id, code: country.code, name: country.name},
    genres: relations.genres,
    actors: relations.actors,
    languages: relations.languages,
  };
}
