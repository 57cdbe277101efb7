import { randomUUID } from 'crypto';

const MAX_REQUEST_ID_LENGTH = 128;
const REQUEST_ID_PATTERN = /^[A-Za-z0-9._-]+$/;

export type RequestIdCarrier = {
  headers: Readonly<Record<string, unknown>>;
  requestId?: string;
  // pino-http types `IncomingMessage.id` as `string | number | object`.
  id?: unknown;
};

/**
 * Accepts a caller supplied id (first value when the header repeats) only when it is short and
 * made of URL-safe characters, so it can be echoed back and logged verbatim.
 */
export function normalizeRequestId(value: unknown): string | undefined {
  const first = Array.isArray(value) ? value[0] : value;
  if (typeof first !== 'string') return undefined;
  const trimmed = first.trim();
  if (trimmed === '' || trimmed.length > MAX_REQUEST_ID_LENGTH) return undefined;
  return REQUEST_ID_PATTERN.test(trimmed) ? trimmed : undefined;
}

export function getOrCreateRequestId(params: {
  headerValue: unknown;
  existingRequestId?: unknown;
  existingId?: unknown;
}): string {
  return (
    normalizeRequestId(params.headerValue) ??
    normalizeRequestId(params.existingRequestId) ??
    normalizeRequestId(params.existingId) ??
    randomUUID()
  );
}

/** Resolves the request id once and pins it on both `requestId` and `id`. */
export function assignRequestId(req: RequestIdCarrier): string {
  const requestId = getOrCreateRequestId({
    headerValue: req.headers['x-request-id'],
    existingRequestId: req.requestId,
    existingId: req.id,
  });
  req.requestId = requestId;
  req.id = requestId;
  return requestId;
}
