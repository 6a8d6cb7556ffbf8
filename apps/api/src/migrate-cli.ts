import {Command} from 'commander';
import {applySchema, getDatabase} from '@theater/database';
import {loadConfig} from './config';
import {loadEnvironmentFiles} from './load-environment';

loadEnvironmentFiles();

const program = new Command();

program
  .name('migrate')
  .description('Create the catalog tables that do not exist yet.')
  .action(async () => {
    const config = loadConfig();
    const database = getDatabase(config.database);

    try {
      await applySchema(database.$client);
      console.log(`✅ Schema applied to ${config.database.DATABASE_URL}`);
    } finally {
      database.$client.close();
    }
  });

try {
  await program.parseAsync(process.argv);
} catch (error) {
  console.error('Unexpected failure:', error);
  process.exitCode = 1;
}
