// src/app.module.ts
import { DynamicModule, Module, ValidationPipe } from '@nestjs/common';
import { APP_GUARD, APP_PIPE } from '@nestjs/core';
import { GraphQLModule } from '@nestjs/graphql';
import { MercuriusDriver, type MercuriusDriverConfig } from '@nestjs/mercurius';

import { AppController } from './app.controller.js';
import { ApiKeyGuard } from './auth/api-key.guard.js';
import { APP_CONFIG, type AppConfig } from './config/app.config.js';
import { RecordsModule } from './records/records.module.js';
import { StoreModule } from './store/store.module.js';

@Module({})
export class AppModule {
  static forRoot(config: AppConfig): DynamicModule {
    return {
      module: AppModule,
      imports: [
        StoreModule.forRoot(config),
        GraphQLModule.forRoot<MercuriusDriverConfig>({
          driver: MercuriusDriver,
          autoSchemaFile: true,
          sortSchema: true,
          graphiql: config.graphiql,
        }),
        RecordsModule,
      ],
      controllers: [AppController],
      providers: [
        { provide: APP_CONFIG, useValue: config },
        {
          provide: APP_PIPE,
          useValue: new ValidationPipe({ whitelist: true, transform: true }),
        },
        {
          provide: APP_GUARD,
          useClass: ApiKeyGuard,
        },
      ],
    };
  }
}
