// Orchestrator Module - Main exports

export { WeatherOrchestrator, buildTurnConversation, emptyUsage, DEFAULT_MAX_TURNS } from './orchestrator.js';
export { ToolExecutor, parseToolArguments } from './executor.js';
export { ModelQueryError, ToolExecutionError, UnknownToolError } from './errors.js';
export type { ExecutedToolCall } from './executor.js';
export type { OrchestratorOptions, InvokeOptions, InvokeResult, ToolCallTrace } from './types.js';
