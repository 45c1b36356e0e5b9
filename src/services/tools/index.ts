// Tool System Initialization
// Builds the weather tool registry once at startup

import type { Logger } from 'pino';
import type { ToolDefaults } from '../../env.js';
import type { OpenWeatherClient } from '../weather/client.js';
import { createCityToCoordsTool } from './city-to-coords-tool.js';
import { createCurrentWeatherTool } from './current-weather-tool.js';
import { createForecastTool, type ForecastToolOptions } from './forecast-tool.js';
import { ToolRegistry } from './registry.js';

export { ToolRegistry } from './registry.js';
export type { ProviderFunctionDef } from './registry.js';
export type { ToolDefinition, ToolResult, ToolParameter, ToolContext, ToolOutput } from './types.js';

export interface WeatherToolsOptions {
  client: OpenWeatherClient;
  defaults: ToolDefaults;
  logger: Logger;
  forecast?: ForecastToolOptions;
}

export function createWeatherToolRegistry({ client, defaults, logger, forecast }: WeatherToolsOptions): ToolRegistry {
  const log = logger.child({ module: 'tools' });
  const registry = new ToolRegistry(log);

  registry.register(createCityToCoordsTool(client, defaults));
  registry.register(createCurrentWeatherTool(client, defaults));
  registry.register(createForecastTool(client, defaults, forecast));

  log.info({ tools: registry.getAll().map(t => t.name) }, 'Tool system initialized');
  return registry;
}
