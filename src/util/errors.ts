/**
 * Startup-time errors.
 *
 * Malformed telemetry never throws; only a bad configuration or registry does,
 * and the process must refuse to start when it happens.
 */

export type ConfigErrorCode =
  | 'INVALID_PATTERN'
  | 'UNKNOWN_GROUP'
  | 'INVALID_CONFIG'
  | 'INVALID_REGISTRY';

export class ConfigError extends Error {
  public readonly code: ConfigErrorCode;
  public readonly details?: Record<string, unknown>;

  constructor(code: ConfigErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'ConfigError';
    this.code = code;
    this.details = details;
  }

  /** Serialize into a plain shape for structured logs. */
  public toObject(): { code: ConfigErrorCode; message: string; details?: Record<string, unknown> } {
    return {
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

export function isConfigError(err: unknown): err is ConfigError {
  return err instanceof ConfigError;
}
