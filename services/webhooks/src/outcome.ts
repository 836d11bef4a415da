/**
 * Classification of a single delivery attempt
 */

export const ERROR_EXCERPT_LENGTH = 200;

/** What one POST produced: a response, or a failure before one arrived */
export type AttemptObservation =
  | { kind: 'response'; statusCode: number; body: string }
  | { kind: 'transport_error'; error: TransportError };

export type TransportErrorKind = 'timeout' | 'connection' | 'request';

export interface TransportError {
  kind: TransportErrorKind;
  message: string;
}

export type AttemptOutcome =
  | { kind: 'success'; statusCode: number }
  | { kind: 'client_error'; statusCode: number; error: string }
  | { kind: 'retryable'; statusCode: number | null; error: string };

export function excerpt(text: string, length = ERROR_EXCERPT_LENGTH): string {
  return text.length > length ? text.slice(0, length) : text;
}

function describeTransportError(error: TransportError): string {
  switch (error.kind) {
    case 'timeout':
      return excerpt(error.message);
    case 'connection':
      return `Connection error: ${excerpt(error.message)}`;
    case 'request':
      return `Request exception: ${excerpt(error.message)}`;
  }
}

/**
 * 2xx delivers; 3xx (redirects are not followed) and 4xx are terminal;
 * 5xx and transport failures are retried.
 */
export function classifyAttempt(observation: AttemptObservation): AttemptOutcome {
  if (observation.kind === 'transport_error') {
    return { kind: 'retryable', statusCode: null, error: describeTransportError(observation.error) };
  }

  const { statusCode, body } = observation;

  if (statusCode >= 200 && statusCode < 300) {
    return { kind: 'success', statusCode };
  }

  if (statusCode >= 300 && statusCode < 400) {
    return { kind: 'client_error', statusCode, error: `Redirect ${statusCode} not followed` };
  }

  if (statusCode >= 400 && statusCode < 500) {
    return { kind: 'client_error', statusCode, error: `Client error ${statusCode}: ${excerpt(body)}` };
  }

  if (statusCode >= 500) {
    return { kind: 'retryable', statusCode, error: `Server error ${statusCode}: ${excerpt(body)}` };
  }

  // 1xx never surfaces as a final response; treat it like a server fault
  return { kind: 'retryable', statusCode, error: `Unexpected status ${statusCode}` };
}
