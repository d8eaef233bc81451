export type ErrorCode =
  | "UNAUTHENTICATED"
  | "VALIDATION_ERROR"
  | "UNKNOWN_FRAME_TYPE"
  | "PERSISTENCE_FAILURE"
  | "DELIVERY_FAILURE"
  | "TRANSPORT_FAILURE"
  | "FRAME_TOO_LARGE"
  | "MESSAGE_NOT_FOUND";

export type ServiceError = Readonly<{
  code: ErrorCode;
  message: string;
  context?: Record<string, unknown>;
}>;

type ResultOk<T> = { ok: true; value: T };
type ResultErr = { ok: false; error: ServiceError };
export type Result<T> = ResultOk<T> | ResultErr;

export function ok<T>(value: T): ResultOk<T> {
  return { ok: true, value };
}

export function err(code: ErrorCode, message: string, context?: Record<string, unknown>): ResultErr {
  const error: ServiceError = context ? { code, message, context } : { code, message };
  return { ok: false, error };
}

export function describeError(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

/**
 * Races `promise` against a timer. The timer is always cleared so a settled call leaves nothing
 * scheduled on the event loop.
 */
export function withTimeout<T>(promise: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      reject(new Error(`${label} timed out after ${timeoutMs}ms.`));
    }, timeoutMs);
    promise.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (e: unknown) => {
        clearTimeout(timer);
        reject(e);
      }
    );
  });
}
