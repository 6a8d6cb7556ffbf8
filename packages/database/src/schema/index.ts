export * from './actors';
export * from './countries';
export * from './genres';
export * from './languages';
export * from './movie-links';
export * from './movies';
