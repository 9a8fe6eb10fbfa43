/**
 * Response Envelope
 *
 * Every response body, success or failure, has the same shape with the
 * fixed `official_email` identity field. `data` and `error` never appear
 * together.
 */

export interface SuccessEnvelope<T> {
  is_success: true;
  official_email: string;
  data?: T;
}

export interface ErrorEnvelope {
  is_success: false;
  official_email: string;
  error: string;
}

export type ResponseEnvelope<T = unknown> = SuccessEnvelope<T> | ErrorEnvelope;

/**
 * Success envelope carrying a handler result
 */
export function successEnvelope<T>(officialEmail: string, data: T): SuccessEnvelope<T> {
  return {
    is_success: true,
    official_email: officialEmail,
    data,
  };
}

/**
 * Success envelope with no data field (health check)
 */
export function emptySuccessEnvelope(officialEmail: string): SuccessEnvelope<never> {
  return {
    is_success: true,
    official_email: officialEmail,
  };
}

export function errorEnvelope(officialEmail: string, message: string): ErrorEnvelope {
  return {
    is_success: false,
    official_email: officialEmail,
    error: message,
  };
}
