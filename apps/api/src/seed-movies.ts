import {readFile} from 'node:fs/promises';
import {validateMovieCreate} from './middleware/validation';
import {MoviesService, ResourceConflictError} from './services';

export type SeedOptions = {
  dryRun?: boolean;
};

export type SeedSummary = {
  created: number;
  skipped: number;
  invalid: number;
};

export async function readSeedFile(filePath: string): Promise<unknown[]> {
  const content = await readFile(filePath, 'utf8');
  const parsed: unknown = JSON.parse(content);
  if (!Array.isArray(parsed)) {
    throw new TypeError(`${filePath} must contain a JSON array of movies`);
  }

  return parsed;
}

/**
 * Creates every valid entry through the same path as `POST /movies/`.
 * Entries that already exist are skipped; invalid ones are reported.
 */
export async function seedMovies(
  moviesService: MoviesService,
  entries: unknown[],
  {dryRun = false}: SeedOptions = {},
): Promise<SeedSummary> {
  const summary: SeedSummary = {created: 0, skipped: 0, invalid: 0};

  for (const [index, entry] of entries.entries()) {
    const payload = validateMovieCreate(entry);
    if (!payload.success) {
      summary.invalid++;
      const problems = payload.errors
        .map(error => `${error.field}: ${error.message}`)
        .join('; ');
      console.error(`  ✗ Entry ${index} is invalid: ${problems}`);
      continue;
    }

    const {name, date} = payload.data;
    if (dryRun) {
      if (await moviesService.findMovieByIdentity(name, date)) {
        summary.skipped++;
        console.log(`  • Would skip ${name} (${date}): already exists`);
      } else {
        summary.created++;
        console.log(`  • Would create ${name} (${date})`);
      }
      continue;
    }

    try {
      const movie = await moviesService.createMovie(payload.data);
      summary.created++;
      console.log(`  • Created movie ${movie.id}: ${name} (${date})`);
    } catch (error) {
      if (error instanceof ResourceConflictError) {
        summary.skipped++;
        console.log(`  • Skipped ${name} (${date}): already exists`);
        continue;
      }

      throw error;
    }
  }

  return summary;
}
