import Fastify, { type FastifyBaseLogger, type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import type { Logger } from 'pino';
import { chatRoutes, type ChatRouteOptions } from './routes/chat.js';
import { weatherRoutes } from './routes/weather.js';
import type { OpenWeatherClient } from './services/weather/client.js';
import { AppError, errorHandler, formatErrorResponse } from './utils/errors.js';

export const APP_VERSION = '0.1.0';

export interface AppDeps {
  logger: Logger;
  orchestrator: ChatRouteOptions['orchestrator'];
  weatherClient: OpenWeatherClient;
  corsOrigin?: string[] | boolean;
}

export async function buildApp({ logger, orchestrator, weatherClient, corsOrigin = true }: AppDeps): Promise<FastifyInstance> {
  const fastifyLogger: FastifyBaseLogger = logger;
  const server = Fastify({ logger: fastifyLogger });

  await server.register(cors, { origin: corsOrigin });

  server.setErrorHandler(errorHandler);

  server.setNotFoundHandler((request, reply) => {
    const error = AppError.notFound(`Route ${request.method} ${request.url} not found`);
    return reply.code(error.statusCode).send(formatErrorResponse(error));
  });

  server.get('/health', async () => {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      version: APP_VERSION,
    };
  });

  await server.register(chatRoutes, { orchestrator });
  await server.register(weatherRoutes, { prefix: '/api', client: weatherClient });

  // The client is process-wide; it goes down with the server
  server.addHook('onClose', async () => {
    await weatherClient.close();
  });

  return server;
}
