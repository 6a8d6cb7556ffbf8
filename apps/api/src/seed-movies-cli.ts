import {Command} from 'commander';
import {applySchema, getDatabase} from '@theater/database';
import {loadConfig} from './config';
import {loadEnvironmentFiles} from './load-environment';
import {readSeedFile, seedMovies} from './seed-movies';
import {MoviesService} from './services';

loadEnvironmentFiles();

const program = new Command();

program
  .name('seed-movies')
  .description('Import movies from a JSON file into the catalog.')
  .argument('<json-file>', 'Path to a JSON array of movie create payloads')
  .option('--dry-run', 'Validate entries without writing to the database', false)
  .action(async (jsonFile: string, options: {dryRun: boolean}) => {
    const config = loadConfig();
    const database = getDatabase(config.database);

    try {
      await applySchema(database.$client);

      const entries = await readSeedFile(jsonFile);
      console.log(`🎬 Importing ${entries.length} movies from ${jsonFile}...`);

      const summary = await seedMovies(new MoviesService(database), entries, {
        dryRun: options.dryRun,
      });

      console.log(
        `🎉 Done: ${summary.created} created, ${summary.skipped} skipped, ${summary.invalid} invalid.`,
      );
      if (summary.invalid > 0) {
        process.exitCode = 1;
      }
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
