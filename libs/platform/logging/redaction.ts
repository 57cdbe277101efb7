export const DEFAULT_REDACT_PATHS: ReadonlyArray<string> = Object.freeze([
  // HTTP
  'req.headers.authorization',
  'req.headers.cookie',
  'req.headers["set-cookie"]',
  'req.headers["x-api-key"]',
  'res.headers["set-cookie"]',

  // Secret fields if they accidentally get logged.
  '*.password',
  '*.apiKey',

  // Known config keys.
  'LOCKOUT_SERVICE_API_KEY',
  'LOCKOUT_ADMIN_API_KEY',
  'OTEL_EXPORTER_OTLP_HEADERS',
]);
