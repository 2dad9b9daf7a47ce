/**
 * Error types shared across the pipeline
 */

// Missing or invalid configuration; fatal at startup
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

// A call to an external collaborator (places API, LLM, website) failed
export class CollaboratorError extends Error {
  constructor(
    message: string,
    public readonly collaborator: 'places' | 'llm' | 'http',
    public readonly statusCode?: number
  ) {
    super(message);
    this.name = 'CollaboratorError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
