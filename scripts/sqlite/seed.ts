import { loadConfig } from '../../src/config/index.js';
import { createLogger } from '../../src/common/logger.js';
import { createSQLiteRepositoryBundle } from '../../src/infrastructure/repositories.js';
import { seedDemoData } from '../../src/infrastructure/seeds.js';
import { createCourseContext } from '../../src/modules/courses/course.context.js';

async function main() {
  const config = loadConfig();
  const repositories = createSQLiteRepositoryBundle(config);
  try {
    const context = createCourseContext({ repositories, logger: createLogger(config.logging.level) });
    const seeded = seedDemoData(context);
    console.log(seeded ? 'Seeded demo program, semesters and assignments' : 'Programs already exist; nothing seeded');
  } finally {
    await repositories.dispose?.();
  }
}

main().catch(error => {
  console.error(error instanceof Error ? error.message : error);
  process.exit(1);
});
