import { loadConfig } from '../../src/config/index.js';
import { createSQLiteClient, IN_MEMORY_DB } from '../../src/infrastructure/sqlite/client.js';

async function main() {
  const config = loadConfig();
  const { sqlite } = config.persistence;
  if (sqlite.filePath === IN_MEMORY_DB) {
    throw new Error('SQLITE_DB_FILE points at an in-memory database; nothing to migrate');
  }
  // Opening the client applies every pending migration
  const client = createSQLiteClient(sqlite);
  try {
    const rows = client
      .getConnection()
      .prepare('SELECT name FROM __migrations ORDER BY name')
      .all();
    console.log(`Database ${client.filePath} is at ${rows.length} migration(s)`);
  } finally {
    client.close();
  }
}

main().catch(error => {
  console.error(error instanceof Error ? error.message : error);
  process.exit(1);
});
