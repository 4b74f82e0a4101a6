export type ErrorCode =
  | 'NOT_ENTITLED'
  | 'TRIAL_ALREADY_USED'
  | 'ALREADY_ENTITLED'
  | 'INVALID_DURATION'
  | 'DUPLICATE_ADDRESS'
  | 'NOT_FOUND'
  | 'NO_ACTIVE_SERVERS';

/**
 * Ожидаемые ошибки ядра: их показываем пользователю,
 * всё остальное (SQLite, сеть) летит дальше как есть.
 */
export class ProxyBotError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string) {
    super(message);
    this.name = 'ProxyBotError';
    this.code = code;
  }
}

export type TrialError = 'ALREADY_ENTITLED' | 'TRIAL_ALREADY_USED';

export type Result<T, E extends ErrorCode = ErrorCode> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function isProxyBotError(err: unknown, code?: ErrorCode): err is ProxyBotError {
  return err instanceof ProxyBotError && (code === undefined || err.code === code);
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
