/** Invalid or contradictory delegation configuration; raised before any child session is created. */
export class ConfigurationError extends Error {
  readonly hints: string[];

  constructor(message: string, hints: string[] = []) {
    super(message);
    this.name = 'ConfigurationError';
    this.hints = hints;
  }
}

/** The delegate request itself failed parameter validation. */
export class ValidationError extends Error {
  readonly missingRequired: string[];
  readonly typeErrors: string[];

  constructor(message: string, missingRequired: string[] = [], typeErrors: string[] = []) {
    super(message);
    this.name = 'ValidationError';
    this.missingRequired = missingRequired;
    this.typeErrors = typeErrors;
  }
}

/** A child kept sending invalid callback arguments until its retry budget ran out. */
export class ToolValidationError extends Error {
  readonly toolName: string;
  readonly attempts: number;

  constructor(toolName: string, attempts: number, detail: string) {
    super(`Validation failed after ${attempts} attempts: ${detail}`);
    this.name = 'ToolValidationError';
    this.toolName = toolName;
    this.attempts = attempts;
  }
}

export class RecursionLimitExceededError extends Error {
  readonly currentLevel: number;
  readonly maxLevel: number;

  constructor(currentLevel: number, maxLevel: number) {
    super(`Maximum recursion level (${maxLevel}) reached (current level: ${currentLevel}).`);
    this.name = 'RecursionLimitExceededError';
    this.currentLevel = currentLevel;
    this.maxLevel = maxLevel;
  }
}

export class DanglingExhaustedError extends Error {
  readonly sessionId: string;
  readonly reminders: number;

  constructor(sessionId: string, reminders: number) {
    super(`Child session failed to provide result after ${reminders} reminder attempts.`);
    this.name = 'DanglingExhaustedError';
    this.sessionId = sessionId;
    this.reminders = reminders;
  }
}

export class DelegationCancelledError extends Error {
  readonly reason: unknown;

  constructor(reason?: unknown) {
    super(
      reason instanceof Error
        ? `Delegation was cancelled: ${reason.message}`
        : typeof reason === 'string' && reason.trim()
          ? `Delegation was cancelled: ${reason}`
          : 'Delegation was cancelled.',
    );
    this.name = 'DelegationCancelledError';
    this.reason = reason;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
