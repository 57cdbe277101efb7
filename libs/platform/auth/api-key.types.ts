export type ApiKeyRole = 'service' | 'admin';

export const API_KEY_ROLE_KEY = 'auth:api-key-role';
export const API_KEY_HEADER = 'x-api-key';
export const API_KEY_SECURITY_SCHEME = 'api-key';

export const API_KEY_ENV: Readonly<Record<ApiKeyRole, string>> = {
  service: 'LOCKOUT_SERVICE_API_KEY',
  admin: 'LOCKOUT_ADMIN_API_KEY',
};
