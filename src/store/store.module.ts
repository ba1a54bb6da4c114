import { DynamicModule, Logger, Module, Provider } from '@nestjs/common';
import { TypeOrmModule, getDataSourceToken } from '@nestjs/typeorm';
import type { DataSource } from 'typeorm';
import type { AppConfig } from '../config/app.config.js';
import { sqliteOptions } from '../database/sqlite-options.js';
import { KeyValueStore } from './key-value.store.js';
import { MemoryKeyValueStore } from './memory-key-value.store.js';
import { SqliteKeyValueStore } from './sqlite-key-value.store.js';

@Module({})
export class StoreModule {
  static forRoot(config: Pick<AppConfig, 'storeDriver' | 'databasePath' | 'scanBatchSize'>): DynamicModule {
    const log = new Logger(StoreModule.name);

    if (config.storeDriver === 'memory') {
      log.log('Using in-memory record store');
      const memoryBinding: Provider = {
        provide: KeyValueStore,
        useFactory: () => new MemoryKeyValueStore(config.scanBatchSize),
      };
      return {
        module: StoreModule,
        global: true,
        providers: [memoryBinding],
        exports: [KeyValueStore],
      };
    }

    log.log(`Using SQLite record store at ${config.databasePath}`);
    const sqliteBinding: Provider = {
      provide: KeyValueStore,
      inject: [getDataSourceToken()],
      useFactory: (ds: DataSource) => new SqliteKeyValueStore(ds, config.scanBatchSize),
    };
    return {
      module: StoreModule,
      global: true,
      imports: [TypeOrmModule.forRoot(sqliteOptions(config))],
      providers: [sqliteBinding],
      exports: [KeyValueStore],
    };
  }
}
