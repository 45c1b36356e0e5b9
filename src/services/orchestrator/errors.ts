// Errors of the tool-calling loop

// The language model call failed; the whole invocation fails with it
export class ModelQueryError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ModelQueryError';
  }
}

// Raised inside the executor and recovered into the tool's fallback result
export class ToolExecutionError extends Error {
  constructor(
    public readonly tool: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'ToolExecutionError';
  }
}

export class UnknownToolError extends Error {
  constructor(public readonly tool: string) {
    super(`Unknown tool: ${tool}`);
    this.name = 'UnknownToolError';
  }
}
