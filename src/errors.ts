export class SupportAssistantError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

// Missing or rejected credentials / identifiers. Fatal to the operation.
export class ConfigurationError extends SupportAssistantError {}

// Transient failure talking to an upstream provider. Callers decide on retries.
export class ProviderError extends SupportAssistantError {}

// Persisted knowledge base artifacts disagree with each other.
export class CorruptionError extends SupportAssistantError {}

export class OutOfRangeError extends SupportAssistantError {
  constructor(readonly position: number, readonly size: number) {
    super(`Position ${position} is out of range (size ${size})`);
  }
}

export class DimensionMismatchError extends SupportAssistantError {
  constructor(readonly expected: number, readonly actual: number) {
    super(`Vector has dimension ${actual}, expected ${expected}`);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
