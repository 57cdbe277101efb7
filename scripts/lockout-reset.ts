import 'reflect-metadata';
import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { Logger } from 'nestjs-pino';
import { loadDotEnvOnce } from '../libs/platform/config/dotenv';
import { validateEnv } from '../libs/platform/config/env.validation';
import { LoggingModule } from '../libs/platform/logging/logging.module';
import { LockoutService } from '../libs/features/lockout/app/lockout.service';
import { LockoutModule } from '../libs/features/lockout/infra/lockout.module';
import { parseResetArgs, RESET_USAGE } from '../libs/features/lockout/infra/cli/reset-args';

// Built after `.env` is loaded: ConfigModule validates the environment when `forRoot` runs.
function createCliModule() {
  @Module({
    imports: [
      ConfigModule.forRoot({ isGlobal: true, validate: validateEnv }),
      LoggingModule.forRoot('cli'),
      LockoutModule,
    ],
  })
  class LockoutCliModule {}

  return LockoutCliModule;
}

async function main() {
  const args = parseResetArgs(process.argv.slice(2));
  if (args.help) {
    process.stdout.write(`${RESET_USAGE}\n`);
    return;
  }

  await loadDotEnvOnce();
  const app = await NestFactory.createApplicationContext(createCliModule(), { bufferLogs: true });
  app.useLogger(app.get(Logger));
  try {
    const removed = await app.get(LockoutService).reset({ ip: args.ip, username: args.username });
    process.stdout.write(`Removed ${removed} attempt record(s)\n`);
  } finally {
    await app.close();
  }
}

main().catch((err: unknown) => {
  const msg = err instanceof Error ? (err.stack ?? err.message) : String(err);
  process.stderr.write(`${msg}\n`);
  process.exit(1);
});
