/**
 * Database bootstrap
 *
 * Provisions the schema of the database named by the environment.
 *
 *   RECIPES_DB_PATH=./data/recipes.db npm run db:init
 */

import { ConfigLoader } from '../src/config/index.js';
import { RecipeBook } from '../src/recipes/index.js';
import { getLogger } from '../src/observability/index.js';

async function main(): Promise<void> {
  const config = ConfigLoader.fromEnv();
  const book = await RecipeBook.open(config);
  getLogger().info({ filename: config.database.filename }, 'Database ready');
  await book.close();
}

main().catch((error: unknown) => {
  getLogger().fatal({ error: error instanceof Error ? error.message : String(error) }, 'Database bootstrap failed');
  process.exit(1);
});
