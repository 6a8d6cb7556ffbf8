import {
  actors,
  countries,
  genres,
  languages,
} from '@theater/database/schema';
import {
  eq,
  type Actor,
  type Country,
  type Genre,
  type Language,
} from '@theater/database';
import {BaseService} from './base-service';

/**
 * Resolves lookup entities by their natural key, creating the ones that do not
 * exist yet. Meant to run on a transaction so that rows created for a failed
 * write are rolled back with it.
 */
export class LookupService extends BaseService {
  async findCountryByCode(code: string): Promise<Country | undefined> {
    const [country] = await this.database
      .select()
      .from(countries)
      .where(eq(countries.code, code))
      .limit(1);
    return country;
  }

  async findGenreByName(name: string): Promise<Genre | undefined> {
    const [genre] = await this.database
      .select()
      .from(genres)
      .where(eq(genres.name, name))
      .limit(1);
    return genre;
  }

  async findActorByName(name: string): Promise<Actor | undefined> {
    const [actor] = await this.database
      .select()
      .from(actors)
      .where(eq(actors.name, name))
      .limit(1);
    return actor;
  }

  async findLanguageByName(name: string): Promise<Language | undefined> {
    const [language] = await this.database
      .select()
      .from(languages)
      .where(eq(languages.name, name))
      .limit(1);
    return language;
  }

  async findOrCreateCountry(code: string): Promise<Country> {
    return this.resolve(
      `country ${code}`,
      async () => this.findCountryByCode(code),
      async () =>
        this.database
          .insert(countries)
          .values({code, name: null})
          .onConflictDoNothing({target: countries.code})
          .returning(),
    );
  }

  async resolveGenres(names: string[]): Promise<Genre[]> {
    const resolved: Genre[] = [];
    for (const name of unique(names)) {
      resolved.push(
        await this.resolve(
          `genre ${name}`,
          async () => this.findGenreByName(name),
          async () =>
            this.database
              .insert(genres)
              .values({name})
              .onConflictDoNothing({target: genres.name})
              .returning(),
        ),
      );
    }

    return resolved;
  }

  async resolveActors(names: string[]): Promise<Actor[]> {
    const resolved: Actor[] = [];
    for (const name of unique(names)) {
      resolved.push(
        await this.resolve(
          `actor ${name}`,
          async () => this.findActorByName(name),
          async () =>
            this.database
              .insert(actors)
              .values({name})
              .onConflictDoNothing({target: actors.name})
              .returning(),
        ),
      );
    }

    return resolved;
  }

  async resolveLanguages(names: string[]): Promise<Language[]> {
    const resolved: Language[] = [];
    for (const name of unique(names)) {
      resolved.push(
        await this.resolve(
          `language ${name}`,
          async () => this.findLanguageByName(name),
          async () =>
            this.database
              .insert(languages)
              .values({name})
              .onConflictDoNothing({target: languages.name})
              .returning(),
        ),
      );
    }

    return resolved;
  }

  private async resolve<T>(
    label: string,
    find: () => Promise<T | undefined>,
    create: () => Promise<T[]>,
  ): Promise<T> {
    const existing = await find();
    if (existing) {
      return existing;
    }

    const [created] = await create();
    if (created) {
      return created;
    }

    // Another writer inserted the same key between our read and insert.
    const concurrent = await find();
    if (!concurrent) {
      throw new Error(`Could not resolve ${label}`);
    }

    return concurrent;
  }
}

const unique = (names: string[]) => [...new Set(names)];
