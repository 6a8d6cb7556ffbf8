import {serve} from '@hono/node-server';
import {applySchema, getDatabase} from '@theater/database';
import {loadConfig} from './config';
import {createApp} from './index';
import {loadEnvironmentFiles} from './load-environment';

loadEnvironmentFiles();

const config = loadConfig();
const database = getDatabase(config.database);

await applySchema(database.$client);

const app = createApp({database, config});

const server = serve({fetch: app.fetch, port: config.port}, info => {
  console.log(
    `Movie theater API listening on http://localhost:${info.port}${config.apiBasePath}/movies/`,
  );
});

const shutdown = (signal: NodeJS.Signals) => {
  console.log(`Received ${signal}, shutting down`);
  server.close(error => {
    database.$client.close();
    if (error) {
      console.error('Error while closing the server:', error);
      process.exitCode = 1;
    }
  });
};

process.once('SIGINT', shutdown);
process.once('SIGTERM', shutdown);
