import * as dotenv from 'dotenv';
import {defineConfig} from 'drizzle-kit';

dotenv.config();

export default defineConfig({
  schema: './packages/database/src/schema/index.ts',
  out: './packages/database/migrations',
  dialect: 'turso',
  dbCredentials: {
    url: process.env.DATABASE_URL || 'file:theater.db',
    authToken: process.env.DATABASE_AUTH_TOKEN,
  },
  casing: 'snake_case',
});
