/**
 * Fatal run errors. Per-ticker data problems never throw; only a malformed
 * configuration or a structurally broken input aborts the run.
 */

export type SignalRankerErrorCode = 'config_invalid' | 'input_invalid';

export class SignalRankerError extends Error {
  readonly code: SignalRankerErrorCode;
  readonly details: readonly string[];

  constructor(code: SignalRankerErrorCode, summary: string, details: readonly string[] = []) {
    const suffix = details.length > 0 ? ` (${details.join('; ')})` : '';
    super(`${code}: ${summary}${suffix}`);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
  }
}

export class ConfigError extends SignalRankerError {
  constructor(summary: string, details: readonly string[] = []) {
    super('config_invalid', summary, details);
  }
}

export class InputShapeError extends SignalRankerError {
  constructor(summary: string, details: readonly string[] = []) {
    super('input_invalid', summary, details);
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
