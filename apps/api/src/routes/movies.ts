import {Hono} from 'hono';
import {
  parseJsonBody,
  validateMovieCreate,
  validateMovieId,
  validateMovieListQuery,
  validateMovieUpdate,
} from '../middleware/validation';
import {MoviesService} from '../services';
import type {AppEnvironment} from '../types/environment';
import {createValidationError} from '../utils/error-handlers';
import {getPageLinks} from '../utils/pagination';

export const moviesRoutes = new Hono<AppEnvironment>();

// List movies, newest first
moviesRoutes.get('/', async c => {
  const query = validateMovieListQuery(c.req.query());
  if (!query.success) {
    return createValidationError(c, query.errors);
  }

  const {page, per_page: perPage} = query.data;
  const moviesService = new MoviesService(c.get('database'));
  const result = await moviesService.listMovies({page, perPage});

  return c.json({
    movies: result.movies,
    ...getPageLinks(
      c.get('config').apiBasePath,
      page,
      perPage,
      result.totalPages,
    ),
    total_pages: result.totalPages,
    total_items: result.totalItems,
  });
});

// Get movie details with country, genres, actors and languages
moviesRoutes.get('/:id', async c => {
  const movieId = validateMovieId(c.req.param('id'));
  if (!movieId.success) {
    return createValidationError(c, movieId.errors);
  }

  const moviesService = new MoviesService(c.get('database'));
  const movie = await moviesService.getMovieDetails(movieId.data);

  return c.json(movie);
});

// Create movie, creating missing countries, genres, actors and languages
moviesRoutes.post('/', async c => {
  const body = await parseJsonBody(c.req);
  if (!body.success) {
    return createValidationError(c, body.errors);
  }

  const payload = validateMovieCreate(body.data);
  if (!payload.success) {
    return createValidationError(c, payload.errors);
  }

  const moviesService = new MoviesService(c.get('database'));
  const movie = await moviesService.createMovie(payload.data);

  console.log(`Created movie ${movie.id}: ${movie.name} (${movie.date})`);

  return c.json(movie, 201);
});

// Delete movie
moviesRoutes.delete('/:id', async c => {
  const movieId = validateMovieId(c.req.param('id'));
  if (!movieId.success) {
    return createValidationError(c, movieId.errors);
  }

  const moviesService = new MoviesService(c.get('database'));
  await moviesService.deleteMovie(movieId.data);

  console.log(`Deleted movie ${movieId.data}`);

  return c.body(null, 204);
});

// Partially update movie fields
moviesRoutes.patch('/:id', async c => {
  const movieId = validateMovieId(c.req.param('id'));
  if (!movieId.success) {
    return createValidationError(c, movieId.errors);
  }

  const body = await parseJsonBody(c.req);
  if (!body.success) {
    return createValidationError(c, body.errors);
  }

  const changes = validateMovieUpdate(body.data);
  if (!changes.success) {
    return createValidationError(c, changes.errors);
  }

  const moviesService = new MoviesService(c.get('database'));
  await moviesService.updateMovie(movieId.data, changes.data);

  console.log(
    `Updated movie ${movieId.data}: ${Object.keys(changes.data).join(', ') || 'no fields'}`,
  );

  return c.json({detail: 'Movie updated successfully.'});
});
