import 'reflect-metadata';
import { Logger, type LogLevel } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { FastifyAdapter, type NestFastifyApplication } from '@nestjs/platform-fastify';
import { AppModule } from './app.module.js';
import { loadAppConfig } from './config/app.config.js';

async function bootstrap() {
  const config = loadAppConfig();
  const logger: LogLevel[] = config.isProduction
    ? ['error', 'warn', 'log']
    : ['error', 'warn', 'log', 'debug', 'verbose'];

  const app = await NestFactory.create<NestFastifyApplication>(
    AppModule.forRoot(config),
    new FastifyAdapter(),
    { logger },
  );

  await app.listen(config.port, config.host);

  const log = new Logger('Bootstrap');
  const authStatus = config.isProduction ? 'API key required' : 'open access';
  log.log(`GraphQL endpoint: http://${config.host}:${config.port}/graphql`);
  if (config.graphiql) log.log(`GraphiQL: http://${config.host}:${config.port}/graphiql`);
  log.log(`Environment: ${config.nodeEnv} (${authStatus})`);
}

bootstrap().catch((err: unknown) => {
  new Logger('Bootstrap').error(
    'Application failed to start',
    err instanceof Error ? err.stack : String(err),
  );
  process.exit(1);
});
