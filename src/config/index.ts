import path from 'node:path';
import { LOG_LEVELS, type LogLevel } from '../common/logger.js';

export interface HttpConfig {
  port: number;
  host: string;
  publicUrl: string;
}

export interface LoggingConfig {
  level: LogLevel;
}

export type PersistenceProvider = 'memory' | 'sqlite';

export interface SqliteConfig {
  /** Database file, or `:memory:` to keep everything in process. */
  filePath: string;
  migrationsDir: string;
}

export interface PersistenceConfig {
  provider: PersistenceProvider;
  sqlite: SqliteConfig;
  seedDemoData: boolean;
}

export interface AppConfig {
  http: HttpConfig;
  logging: LoggingConfig;
  persistence: PersistenceConfig;
}

function readIntFromEnv(envName: string): number | undefined {
  const raw = process.env[envName];
  if (!raw) {
    return undefined;
  }
  const parsed = Number.parseInt(raw, 10);
  return Number.isFinite(parsed) ? parsed : undefined;
}

function readProviderFromEnv(envName: string): PersistenceProvider {
  const raw = (process.env[envName] ?? 'sqlite').toLowerCase();
  if (raw === 'memory') return 'memory';
  return 'sqlite';
}

function readBooleanFromEnv(envName: string, defaultValue: boolean): boolean {
  const raw = process.env[envName];
  if (raw === undefined) return defaultValue;
  return ['1', 'true', 'yes', 'on'].includes(raw.toLowerCase());
}

function readLogLevelFromEnv(envName: string): LogLevel {
  const raw = (process.env[envName] ?? '').toLowerCase();
  return LOG_LEVELS.find(level => level === raw) ?? 'info';
}

export function loadConfig(): AppConfig {
  const port = readIntFromEnv('PORT') ?? 3000;
  const host = process.env.HOST || '0.0.0.0';
  const publicUrl = process.env.API_PUBLIC_URL || `http://localhost:${port}`;
  const filePath = process.env.SQLITE_DB_FILE || path.resolve(process.cwd(), 'data', 'sqlite', 'courses.db');
  const migrationsDir = process.env.SQLITE_MIGRATIONS_DIR || path.resolve(process.cwd(), 'migrations', 'sqlite');

  return {
    http: { port, host, publicUrl },
    logging: { level: readLogLevelFromEnv('LOG_LEVEL') },
    persistence: {
      provider: readProviderFromEnv('DB_PROVIDER'),
      sqlite: { filePath, migrationsDir },
      seedDemoData: readBooleanFromEnv('SQLITE_SEED_DEMO_DATA', false),
    },
  };
}
