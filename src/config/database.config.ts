import { registerAs } from '@nestjs/config';

/** Relational drivers the task store can run on */
export type DatabaseDriver = 'postgres' | 'better-sqlite3';

function parseDriver(value: string | undefined): DatabaseDriver {
  switch (value) {
    case undefined:
    case '':
    case 'postgres':
      return 'postgres';
    case 'better-sqlite3':
      return 'better-sqlite3';
    default:
      throw new Error(`Unsupported DB_TYPE "${value}" (expected postgres or better-sqlite3)`);
  }
}

/**
 * Database configuration for TypeORM
 *
 * PostgreSQL is the default target. The embedded better-sqlite3 driver is
 * meant for local runs and tests, where DB_DATABASE is a file path or
 * `:memory:`.
 *
 * @remarks
 * - Schema synchronization is only enabled in development
 * - Everywhere else the migrations under src/database/migrations run at startup
 */
export default registerAs('database', () => {
  const development = process.env.NODE_ENV === 'development';

  return {
    /** Driver selected through DB_TYPE */
    type: parseDriver(process.env.DB_TYPE),

    /** PostgreSQL server hostname */
    host: process.env.DB_HOST || 'localhost',

    /** PostgreSQL server port */
    port: parseInt(process.env.DB_PORT || '5432', 10),

    username: process.env.DB_USERNAME || 'postgres',

    password: process.env.DB_PASSWORD || 'postgres',

    /** Database name, or the file path / `:memory:` for better-sqlite3 */
    database: process.env.DB_DATABASE || 'tasks',

    /** Only in development: create and update the schema from the entities */
    synchronize: development,

    /** Only in development: log every SQL query */
    logging: development,
  };
});
