import fs from 'fs';
import path from 'path';
import Fastify, { type FastifyError, type FastifyServerOptions } from 'fastify';
import cors from '@fastify/cors';
import multipart from '@fastify/multipart';
import fastifyStatic from '@fastify/static';
import { ZodError } from 'zod';
import type { AppConfig } from './config';
import type { DB } from './db';
import './http/context';
import { ApiError } from './http/errors';
import { authenticate, publicRoute } from './http/procedures';
import { envelope, ok } from './http/response';
import { toFieldErrors } from './http/validate';
import { communityRouter } from './modules/community/router';
import { ingredientRouter } from './modules/ingredient/router';
import { nutritionRouter } from './modules/nutrition/router';
import { recipeRouter } from './modules/recipe/router';
import { shoppingRouter } from './modules/shopping/router';
import { refreshAccessToken } from './modules/user/auth.router';
import { userRouter } from './modules/user/router';
import { registerUploadRoute } from './routes/upload';
import { TokenService } from './services/auth-tokens';
import { MockIngredientRecognizer, type IngredientRecognizer } from './services/ingredient-recognition';

export interface BuildAppOptions {
  config: AppConfig;
  db: DB;
  recognizer?: IngredientRecognizer;
}

const ENDPOINTS = {
  user: '/api/user/',
  ingredient: '/api/ingredient/',
  recipe: '/api/recipe/',
  shoppingList: '/api/shopping-list/',
  community: '/api/community/',
  nutrition: '/api/nutrition/',
  upload: '/api/upload/',
  tokenRefresh: '/api/token/refresh/',
};

function loggerOptions(config: AppConfig): FastifyServerOptions['logger'] {
  if (config.env === 'test') return false;
  if (config.isProd) return { level: config.logLevel ?? 'warn' };
  return {
    level: config.logLevel ?? 'info',
    transport: {
      target: 'pino-pretty',
      options: {
        colorize: true,
      },
    },
  };
}

export async function buildApp({ config, db, recognizer }: BuildAppOptions) {
  const app = Fastify({
    logger: loggerOptions(config),
    ignoreTrailingSlash: true,
  });

  app.decorate('config', config);
  app.decorate('db', db);
  app.decorate(
    'tokens',
    new TokenService({
      secret: config.jwtSecret,
      accessTtl: config.accessTokenTtl,
      refreshTtl: config.refreshTokenTtl,
    })
  );
  app.decorate('recognizer', recognizer ?? new MockIngredientRecognizer());
  app.decorateRequest('user', null);
  app.decorateRequest('authFailure', null);
  app.addHook('onRequest', authenticate);

  // Every failure leaves as the { code, message, data } envelope
  app.setErrorHandler((error: FastifyError, request, reply) => {
    if (error instanceof ApiError) {
      return reply.status(error.statusCode).send(envelope(error.statusCode, error.message, error.data));
    }
    if (error instanceof ZodError) {
      return reply.status(400).send(envelope(400, 'Validation failed', toFieldErrors(error)));
    }
    if (error.statusCode !== undefined && error.statusCode < 500) {
      return reply.status(error.statusCode).send(envelope(error.statusCode, error.message, null));
    }

    request.log.error({ err: error }, 'unhandled error');
    return reply.status(500).send(envelope(500, 'Internal server error', null));
  });

  app.setNotFoundHandler((_request, reply) => {
    return reply.status(404).send(envelope(404, 'Not found', null));
  });

  // CORS: echo back any origin
  await app.register(cors, {
    origin: (_origin, cb) => {
      cb(null, true);
    },
    credentials: true,
    allowedHeaders: ['Content-Type', 'Authorization'],
    methods: ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'],
  });

  await app.register(multipart, {
    limits: { fileSize: config.uploadMaxBytes, files: 1 },
  });

  const mediaRoot = path.resolve(config.mediaRoot);
  fs.mkdirSync(mediaRoot, { recursive: true });
  await app.register(fastifyStatic, { root: mediaRoot, prefix: config.mediaUrl });

  // Health check (not enveloped)
  app.get('/health', async () => ({
    status: 'ok',
    timestamp: new Date().toISOString(),
    environment: config.env,
  }));

  await app.register(
    async (api) => {
      api.get('/', publicRoute, async () => ok(ENDPOINTS, 'Smart Recipe API'));
      api.post('/token/refresh', publicRoute, refreshAccessToken);
      await api.register(registerUploadRoute);
      await api.register(userRouter, { prefix: '/user' });
      await api.register(ingredientRouter, { prefix: '/ingredient' });
      await api.register(recipeRouter, { prefix: '/recipe' });
      await api.register(shoppingRouter, { prefix: '/shopping-list' });
      await api.register(communityRouter, { prefix: '/community' });
      await api.register(nutritionRouter, { prefix: '/nutrition' });
    },
    { prefix: '/api' }
  );

  return app;
}

export type App = Awaited<ReturnType<typeof buildApp>>;
