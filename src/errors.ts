/**
 * Error taxonomy for wfscope
 *
 * Construction errors (registry, expression model) are thrown at once.
 * Validator findings reuse the same names as plain records (see query/validator.ts).
 * DecodeWarning is never thrown; the history pipeline collects it per payload.
 */

/** Base class so callers can catch everything wfscope raises */
export class WfscopeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'WfscopeError';
  }
}

// ============================================================
// Query construction
// ============================================================

export class UnknownFieldError extends WfscopeError {
  constructor(
    public readonly field: string,
    public readonly suggestion?: string
  ) {
    super(
      suggestion
        ? `Unknown field '${field}' (did you mean \`${suggestion}\`?)`
        : `Unknown field '${field}'`
    );
    this.name = 'UnknownFieldError';
  }
}

export class InvalidFieldNameError extends WfscopeError {
  constructor(
    public readonly field: string,
    reason: string
  ) {
    super(`Invalid field name '${field}': ${reason}`);
    this.name = 'InvalidFieldNameError';
  }
}

export class TypeMismatchError extends WfscopeError {
  constructor(
    public readonly field: string,
    message: string
  ) {
    super(`${field}: ${message}`);
    this.name = 'TypeMismatchError';
  }
}

// ============================================================
// Static validation (thrown only by assertValidQuery)
// ============================================================

export class UnsupportedOperatorError extends WfscopeError {
  constructor(
    message: string,
    public readonly suggestion?: string
  ) {
    super(message);
    this.name = 'UnsupportedOperatorError';
  }
}

export class UnbalancedQuotesError extends WfscopeError {
  constructor(message = 'Unbalanced single quotes in query') {
    super(message);
    this.name = 'UnbalancedQuotesError';
  }
}

export class UnbalancedParensError extends WfscopeError {
  constructor(message = 'Unbalanced parentheses in query') {
    super(message);
    this.name = 'UnbalancedParensError';
  }
}

export class CaseError extends WfscopeError {
  constructor(message: string) {
    super(message);
    this.name = 'CaseError';
  }
}

export class InvalidQueryDocumentError extends WfscopeError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidQueryDocumentError';
  }
}

// ============================================================
// History
// ============================================================

export class MalformedEventError extends WfscopeError {
  constructor(
    /** eventId when known, otherwise `#<position>` in the raw sequence */
    public readonly eventRef: string,
    reason: string
  ) {
    super(`Malformed history event ${eventRef}: ${reason}`);
    this.name = 'MalformedEventError';
  }
}

export class InvalidFilterSpecError extends WfscopeError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidFilterSpecError';
  }
}

/**
 * Non-fatal payload decode problem.
 * Recorded alongside the pipeline result, never thrown.
 */
export class DecodeWarning extends WfscopeError {
  constructor(
    public readonly eventId: number,
    public readonly payloadIndex: number,
    reason: string
  ) {
    super(`Event ${eventId} payload[${payloadIndex}]: ${reason}`);
    this.name = 'DecodeWarning';
  }
}

// ============================================================
// temporal CLI collaborator
// ============================================================

export class TemporalCliError extends WfscopeError {
  constructor(
    message: string,
    public readonly argv: string[],
    public readonly exitCode: number | null,
    public readonly stderr: string = ''
  ) {
    super(message);
    this.name = 'TemporalCliError';
  }
}

export class TemporalCliNotFoundError extends WfscopeError {
  constructor(binary: string) {
    super(`temporal CLI not found: '${binary}'. Install the Temporal CLI or set temporal.binary in config.`);
    this.name = 'TemporalCliNotFoundError';
  }
}

export class CommandTimeoutError extends WfscopeError {
  constructor(
    public readonly argv: string[],
    public readonly timeoutMs: number
  ) {
    super(`Command timed out after ${timeoutMs}ms: ${argv.join(' ')}`);
    this.name = 'CommandTimeoutError';
  }
}

// ============================================================
// Configuration
// ============================================================

export class ConfigError extends WfscopeError {
  constructor(
    message: string,
    public readonly configPath: string
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}
