import {
  CanActivate,
  ExecutionContext,
  Inject,
  Injectable,
  UnauthorizedException,
} from '@nestjs/common';
import { GqlExecutionContext, type GqlContextType } from '@nestjs/graphql';
import type { FastifyRequest } from 'fastify';
import type { MercuriusContext } from 'mercurius';
import { APP_CONFIG, type AppConfig } from '../config/app.config.js';

@Injectable()
export class ApiKeyGuard implements CanActivate {
  constructor(@Inject(APP_CONFIG) private readonly config: AppConfig) {}

  canActivate(context: ExecutionContext): boolean {
    // Skip authentication in development
    if (!this.config.isProduction) {
      return true;
    }

    const apiKey = this.extractApiKey(this.requestOf(context));
    const validApiKey = this.config.apiKey;

    if (!validApiKey) {
      throw new Error('API_KEY environment variable is not configured');
    }

    if (!apiKey) {
      throw new UnauthorizedException('Missing API key');
    }

    if (apiKey !== validApiKey) {
      throw new UnauthorizedException('Invalid API key');
    }

    return true;
  }

  /** Mercurius hands resolvers the Fastify reply; the request hangs off it. */
  private requestOf(context: ExecutionContext): FastifyRequest {
    if (context.getType<GqlContextType>() === 'graphql') {
      return GqlExecutionContext.create(context).getContext<MercuriusContext>().reply.request;
    }
    return context.switchToHttp().getRequest<FastifyRequest>();
  }

  private extractApiKey(request: FastifyRequest): string | undefined {
    const apiKeyHeader = request.headers['x-api-key'];
    const apiKey = Array.isArray(apiKeyHeader) ? apiKeyHeader[0] : apiKeyHeader;
    if (typeof apiKey === 'string' && apiKey.trim().length > 0) {
      return apiKey.trim();
    }

    const authHeader = request.headers['authorization'];
    if (typeof authHeader === 'string' && authHeader.startsWith('Bearer ')) {
      return authHeader.slice(7).trim();
    }

    return undefined;
  }
}
