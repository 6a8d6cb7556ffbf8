export {LookupService} from './lookup-service';
export {MoviesService} from './movies-service';
export * from './errors';
export type * from './types';
