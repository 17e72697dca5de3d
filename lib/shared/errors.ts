/**
 * Error kinds raised by the game core.
 *
 * RetrievalUnavailable is deliberately absent: a missing or failing similarity
 * backend degrades retrieval to sequence order and is only logged.
 */

export const ErrorCodes = {
  GENERATION_FAILURE: 'GENERATION_FAILURE',
  INVALID_SELECTION: 'INVALID_SELECTION',
  INVALID_ACCUSATION: 'INVALID_ACCUSATION',
  INVALID_CONFIG: 'INVALID_CONFIG',
} as const;

export type ErrorCode = typeof ErrorCodes[keyof typeof ErrorCodes];

export class GameError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Backend unavailable, malformed structured output, or a roster/scenario missing a required role */
export class GenerationFailure extends GameError {
  readonly step: string;

  constructor(step: string, message: string, options?: { cause?: unknown }) {
    super(ErrorCodes.GENERATION_FAILURE, `[${step}] ${message}`, options);
    this.step = step;
  }
}

/** Out-of-range roster index or a pick of the victim */
export class InvalidSelection extends GameError {
  constructor(message: string) {
    super(ErrorCodes.INVALID_SELECTION, message);
  }
}

/** Accused name does not match any suspect */
export class InvalidAccusation extends GameError {
  constructor(message: string) {
    super(ErrorCodes.INVALID_ACCUSATION, message);
  }
}

export class ConfigError extends GameError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(ErrorCodes.INVALID_CONFIG, `Invalid configuration: ${issues.join('; ')}`);
    this.issues = issues;
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
