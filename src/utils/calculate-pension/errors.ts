export type WarningKind = 'EligibilityWarning' | 'ComputationWarning' | 'ComputationError' | 'ConfigurationError';

/**
 * A non-fatal problem recorded on a result
 */
export type EngineWarning = {
  kind: WarningKind;
  message: string;
  schemeId?: string;
};

/**
 * A scheme's parameters cannot be evaluated under its declared type.
 * Aborts that scheme; escapes the engine only when nothing usable remains.
 */
export class ConfigurationError extends Error {
  schemeId: string | null;
  constructor(message: string, schemeId: string | null = null) {
    super(message);
    this.name = 'ConfigurationError';
    this.schemeId = schemeId;
  }
}

/**
 * Arithmetic failure local to one scheme, such as a zero annuity divisor
 */
export class ComputationError extends Error {
  schemeId: string;
  constructor(message: string, schemeId: string) {
    super(message);
    this.name = 'ComputationError';
    this.schemeId = schemeId;
  }
}

export function toWarning(error: ConfigurationError | ComputationError): EngineWarning {
  const warning: EngineWarning = {
    kind: error instanceof ConfigurationError ? 'ConfigurationError' : 'ComputationError',
    message: error.message,
  };
  if (error.schemeId) {
    warning.schemeId = error.schemeId;
  }
  return warning;
}
