import type {Database} from '@theater/database';
import type {AppConfig} from '../config';

export type AppEnvironment = {
  Variables: {
    database: Database;
    config: AppConfig;
  };
};
