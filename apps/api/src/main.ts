import { ConfigService } from '@nestjs/config';
import { loadDotEnvOnce } from '../../../libs/platform/config/dotenv';
import { initTelemetry } from '../../../libs/platform/otel/telemetry';

async function main(): Promise<void> {
  await loadDotEnvOnce();
  const telemetry = await initTelemetry('api');
  const stopTelemetry = () => void telemetry.shutdown().catch(() => undefined);
  process.once('SIGTERM', stopTelemetry);
  process.once('SIGINT', stopTelemetry);

  // Telemetry must patch modules before Nest and Fastify load.
  const { createApiApp } = await import('./bootstrap');
  const { buildOpenApiDocument, isSwaggerUiEnabled, setupSwaggerUi } = await import('./openapi');
  const { resolveListenAddress } = await import('./listen-address');

  const app = await createApiApp().catch(async (err: unknown) => {
    await telemetry.shutdown().catch(() => undefined);
    throw err;
  });

  if (isSwaggerUiEnabled()) {
    setupSwaggerUi(app, buildOpenApiDocument(app));
  }

  await app.listen(resolveListenAddress(app.get(ConfigService)));
}

main().catch((err: unknown) => {
  process.stderr.write(`${err instanceof Error ? (err.stack ?? err.message) : String(err)}\n`);
  process.exit(1);
});
