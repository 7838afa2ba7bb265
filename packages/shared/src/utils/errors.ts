export class TenetError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'TenetError';
  }
}

export class EvaluationValidationError extends TenetError {
  constructor(message: string) {
    super(message, 'EVALUATION_VALIDATION_ERROR');
    this.name = 'EvaluationValidationError';
  }
}

export class EvaluationError extends TenetError {
  constructor(message: string, cause?: Error) {
    super(message, 'EVALUATION_ERROR', cause);
    this.name = 'EvaluationError';
  }
}

export class NotFoundError extends TenetError {
  constructor(message: string) {
    super(message, 'NOT_FOUND');
    this.name = 'NotFoundError';
  }
}

export class ChecksumMismatchError extends TenetError {
  constructor(
    message: string,
    public readonly expected: string,
    public readonly actual: string,
  ) {
    super(message, 'CHECKSUM_MISMATCH');
    this.name = 'ChecksumMismatchError';
  }
}

export class UnapprovedInvoiceError extends TenetError {
  constructor(message: string) {
    super(message, 'UNAPPROVED_INVOICE');
    this.name = 'UnapprovedInvoiceError';
  }
}

export class AgentError extends TenetError {
  constructor(message: string, cause?: Error) {
    super(message, 'AGENT_ERROR', cause);
    this.name = 'AgentError';
  }
}

export class LlmError extends TenetError {
  constructor(
    message: string,
    public readonly retryable: boolean,
    cause?: Error,
  ) {
    super(message, 'LLM_ERROR', cause);
    this.name = 'LlmError';
  }
}

export class PersistenceError extends TenetError {
  constructor(message: string, cause?: Error) {
    super(message, 'PERSISTENCE_ERROR', cause);
    this.name = 'PersistenceError';
  }
}

export class SchemaValidationError extends TenetError {
  constructor(
    message: string,
    public readonly validationErrors: readonly string[],
  ) {
    super(message, 'SCHEMA_VALIDATION_ERROR');
    this.name = 'SchemaValidationError';
  }
}

export class ConfigurationError extends TenetError {
  constructor(message: string) {
    super(message, 'CONFIGURATION_ERROR');
    this.name = 'ConfigurationError';
  }
}
