// Weather Agent API
// Port: 8000 (localhost by default)

// Load environment variables from .env file
import 'dotenv/config';

import { buildApp } from './app.js';
import { ConfigurationError, loadConfig, logConfiguration, type AppConfig } from './env.js';
import { createProvider } from './providers/index.js';
import { WeatherOrchestrator } from './services/orchestrator/index.js';
import { createWeatherToolRegistry } from './services/tools/index.js';
import { OpenWeatherClient } from './services/weather/client.js';
import { createLogger } from './utils/logger.js';

const bootLogger = createLogger({
  level: process.env.LOG_LEVEL || 'info',
  pretty: process.env.NODE_ENV !== 'production',
});

let config: AppConfig;
try {
  config = loadConfig();
} catch (err) {
  if (err instanceof ConfigurationError) {
    bootLogger.fatal(err.message);
    process.exit(1);
  }
  throw err;
}

const logger = createLogger({ level: config.logLevel, pretty: config.nodeEnv !== 'production' });
logConfiguration(config, logger);

// One pooled client for the whole process
const weatherClient = new OpenWeatherClient({ ...config.weather, logger }).open();

const registry = createWeatherToolRegistry({ client: weatherClient, defaults: config.tools, logger });

const orchestrator = new WeatherOrchestrator(
  { provider: createProvider(config.llm), registry, logger },
  { maxTurns: config.maxTurns },
);

const server = await buildApp({ logger, orchestrator, weatherClient });

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, () => {
    logger.info({ signal }, 'Shutting down');
    server.close().then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error({ err }, 'Error during shutdown');
        process.exit(1);
      },
    );
  });
}

// Start server
try {
  await server.listen({ port: config.port, host: config.host });
  logger.info(`Health: http://${config.host}:${config.port}/health`);
} catch (err) {
  logger.error({ err }, 'Failed to start server');
  await weatherClient.close();
  process.exit(1);
}
