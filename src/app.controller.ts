import { Controller, Get, Inject } from '@nestjs/common';
import { APP_CONFIG, type AppConfig, type StoreDriver } from './config/app.config.js';

export interface HealthStatus {
  status: 'ok';
  store: StoreDriver;
  timestamp: string;
}

@Controller()
export class AppController {
  constructor(@Inject(APP_CONFIG) private readonly config: AppConfig) {}

  @Get('health')
  getHealth(): HealthStatus {
    return { status: 'ok', store: this.config.storeDriver, timestamp: new Date().toISOString() };
  }
}
