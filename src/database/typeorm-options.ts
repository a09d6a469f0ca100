import { ConfigType } from '@nestjs/config';
import { TypeOrmModuleOptions } from '@nestjs/typeorm';
import databaseConfig from '../config/database.config';
import { migrations } from './migrations';

/**
 * Builds the TypeORM connection options for the configured driver
 *
 * Entities are registered by the feature modules (`autoLoadEntities`).
 * Outside development the schema comes from the migrations, run on startup.
 */
export function buildTypeOrmOptions(config: ConfigType<typeof databaseConfig>): TypeOrmModuleOptions {
  const common = {
    autoLoadEntities: true,
    synchronize: config.synchronize,
    migrations,
    migrationsRun: !config.synchronize,
    logging: config.logging,
  };

  switch (config.type) {
    case 'better-sqlite3':
      return {
        ...common,
        type: 'better-sqlite3',
        database: config.database,
      };
    case 'postgres':
      return {
        ...common,
        type: 'postgres',
        host: config.host,
        port: config.port,
        username: config.username,
        password: config.password,
        database: config.database,
      };
  }
}
