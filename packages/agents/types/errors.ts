// Error taxonomy shared by the registry, orchestrator and gateways

export type ErrorKind =
  | 'InvalidInput'
  | 'NotFound'
  | 'StageFailure'
  | 'PipelineDefinition'
  | 'RunState'
  | 'Config';

export class MarketIntelError extends Error {
  constructor(
    message: string,
    public readonly kind: ErrorKind,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'MarketIntelError';
  }
}

export class InvalidInputError extends MarketIntelError {
  constructor(message: string) {
    super(message, 'InvalidInput');
    this.name = 'InvalidInputError';
  }
}

export class NotFoundError extends MarketIntelError {
  constructor(public readonly runId: string) {
    super(`Unknown run_id: ${runId}`, 'NotFound');
    this.name = 'NotFoundError';
  }
}

export class StageFailureError extends MarketIntelError {
  constructor(
    message: string,
    public readonly stage: string,
    cause?: unknown,
  ) {
    super(message, 'StageFailure', cause);
    this.name = 'StageFailureError';
  }
}

export class StageTimeoutError extends StageFailureError {
  constructor(stage: string, public readonly timeoutMs: number) {
    super(`Stage ${stage} timed out after ${timeoutMs / 1000}s`, stage);
    this.name = 'StageTimeoutError';
  }
}

export class PipelineDefinitionError extends MarketIntelError {
  constructor(message: string) {
    super(message, 'PipelineDefinition');
    this.name = 'PipelineDefinitionError';
  }
}

export class RunStateError extends MarketIntelError {
  constructor(message: string) {
    super(message, 'RunState');
    this.name = 'RunStateError';
  }
}

export class ConfigError extends MarketIntelError {
  constructor(message: string) {
    super(message, 'Config');
    this.name = 'ConfigError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
