import { applyDecorators, SetMetadata, UseGuards } from '@nestjs/common';
import { ApiSecurity, ApiUnauthorizedResponse } from '@nestjs/swagger';
import { ApiKeyGuard } from './api-key.guard';
import { API_KEY_ROLE_KEY, API_KEY_SECURITY_SCHEME, type ApiKeyRole } from './api-key.types';

/**
 * Guards a controller or route with the `x-api-key` header. `service` routes are called by the
 * authentication pipeline; `admin` routes by operators.
 */
export function RequireApiKey(role: ApiKeyRole) {
  return applyDecorators(
    SetMetadata(API_KEY_ROLE_KEY, role),
    UseGuards(ApiKeyGuard),
    ApiSecurity(API_KEY_SECURITY_SCHEME),
    ApiUnauthorizedResponse({ description: 'Missing or invalid API key (problem details).' }),
  );
}
