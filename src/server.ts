import { buildApp } from './app.js';
import { loadConfig } from './config/index.js';
import { createRepositoryBundleFromConfig } from './infrastructure/repositories.js';
import { seedDemoData } from './infrastructure/seeds.js';
import { createCourseContext } from './modules/courses/course.context.js';

process.on('unhandledRejection', (reason, promise) => {
  console.error('Unhandled Rejection at:', promise, 'reason:', reason);
  process.exit(1);
});

const start = async () => {
  const config = loadConfig();
  const repositories = createRepositoryBundleFromConfig(config);
  const app = buildApp({
    repositories,
    logLevel: config.logging.level,
    publicUrl: config.http.publicUrl,
  });
  if (config.persistence.seedDemoData) {
    const seeded = seedDemoData(createCourseContext({ repositories, logger: app.log }));
    app.log.info({ seeded }, 'Demo data checked');
  }
  try {
    await app.listen({ port: config.http.port, host: config.http.host });
  } catch (err) {
    app.log.error({ err }, 'Error starting server');
    process.exit(1);
  }
};

void start();
