import type { NestFastifyApplication } from '@nestjs/platform-fastify';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import type { OpenAPIObject } from '@nestjs/swagger';
import {
  API_KEY_HEADER,
  API_KEY_SECURITY_SCHEME,
} from '../../../libs/platform/auth/api-key.types';
import { NodeEnv } from '../../../libs/platform/config/env.enums';
import { normalizeNodeEnv } from '../../../libs/platform/config/env.runtime';
import { parseEnvBoolean } from '../../../libs/platform/config/env.transforms';

export function buildOpenApiDocument(app: NestFastifyApplication): OpenAPIObject {
  const config = new DocumentBuilder()
    .setTitle('Lockout Guard API')
    .setDescription('Login attempt tracking and brute-force lockout (code-first contract).')
    .setVersion('0.1.0')
    .addServer('/')
    .addApiKey(
      {
        type: 'apiKey',
        in: 'header',
        name: API_KEY_HEADER,
        description: 'Service key for lockout routes, admin key for admin routes.',
      },
      API_KEY_SECURITY_SCHEME,
    )
    .addTag('Health', 'Service health and readiness endpoints.')
    .addTag('Lockout', 'Gate and outcome recording for the authentication pipeline.')
    .addTag('Admin', 'Operator views and resets of lockout state.')
    .build();

  return SwaggerModule.createDocument(app, config, {
    ignoreGlobalPrefix: false,
  });
}

export function setupSwaggerUi(app: NestFastifyApplication, document: OpenAPIObject) {
  SwaggerModule.setup('docs', app, document, {
    swaggerOptions: { persistAuthorization: true },
  });
}

/** Never in production or tests; elsewhere on unless `SWAGGER_UI_ENABLED` says otherwise. */
export function isSwaggerUiEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
  const nodeEnv = normalizeNodeEnv(env.NODE_ENV);
  if (nodeEnv === NodeEnv.Production || nodeEnv === NodeEnv.Test) return false;

  const override = parseEnvBoolean(env.SWAGGER_UI_ENABLED);
  return typeof override === 'boolean' ? override : true;
}
