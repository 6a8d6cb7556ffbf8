import type {ConflictError, NotFoundError} from '../types/errors';

export class ResourceNotFoundError extends Error {
  constructor(
    message: string,
    readonly details?: NotFoundError['details'],
  ) {
    super(message);
    this.name = 'ResourceNotFoundError';
  }
}

export class ResourceConflictError extends Error {
  constructor(
    message: string,
    readonly details?: ConflictError['details'],
  ) {
    super(message);
    this.name = 'ResourceConflictError';
  }
}

export const movieNotFound = (id: number) =>
  new ResourceNotFoundError('Movie with the given ID was not found.', {
    resource: 'movie',
    identifier: String(id),
  });

export const duplicateMovie = (name: string, date: string) =>
  new ResourceConflictError(
    `A movie with the name '${name}' and release date '${date}' already exists.`,
    {resource: 'movie', constraint: 'movies_name_date_unique'},
  );

/** True when the error, or one of its causes, is a SQLite unique violation. */
export function isUniqueConstraintViolation(error: unknown): boolean {
  let current: unknown = error;
  while (current instanceof Error) {
    if (
      'code' in current &&
      (current.code === 'SQLITE_CONSTRAINT_UNIQUE' ||
        current.code === 'SQLITE_CONSTRAINT_PRIMARYKEY')
    ) {
      return true;
    }

    if (current.message.includes('UNIQUE constraint failed')) {
      return true;
    }

    current = current.cause;
  }

  return false;
}
