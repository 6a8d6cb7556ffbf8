import type {
  Actor,
  Country,
  DatabaseExecutor,
  Genre,
  Language,
  Movie,
  MovieStatus,
} from '@theater/database';

export type ServiceContext = {
  database: DatabaseExecutor;
};

export type PaginationOptions = {
  page: number;
  perPage: number;
};

export type MovieListItem = Pick<
  Movie,
  'id' | 'name' | 'date' | 'score' | 'overview'
>;

export type MovieListPage = {
  movies: MovieListItem[];
  totalItems: number;
  totalPages: number;
};

export type MovieDetail = Omit<Movie, 'countryId'> & {
  country: Country;
  genres: Genre[];
  actors: Actor[];
  languages: Language[];
};

export type MovieCreateInput = {
  name: string;
  date: string;
  score: number;
  overview: string;
  status: MovieStatus;
  budget: number;
  revenue: number;
  country: string;
  genres: string[];
  actors: string[];
  languages: string[];
};

export type MovieUpdateInput = Partial<
  Pick<
    MovieCreateInput,
    'name' | 'date' | 'score' | 'overview' | 'status' | 'budget' | 'revenue'
  >
>;
