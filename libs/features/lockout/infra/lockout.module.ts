import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { PinoLogger } from 'nestjs-pino';
import type { Clock } from '../../../shared/time';
import { PlatformAuthModule } from '../../../platform/auth/auth.module';
import { DatabaseModule } from '../../../platform/db/database.module';
import { DatabaseService } from '../../../platform/db/database.service';
import {
  provideAppService,
  provideSystemClockToken,
} from '../../../platform/di/app-service.provider';
import { RedisModule } from '../../../platform/redis/redis.module';
import { RedisService } from '../../../platform/redis/redis.service';
import { LockoutAdminService } from '../app/lockout-admin.service';
import { LockoutEventChannel } from '../app/lockout-events';
import type { LockoutConfig } from '../app/lockout.config';
import type { LockoutLogger } from '../app/lockout.logger';
import { LockoutService } from '../app/lockout.service';
import type { AccessLogRepository } from '../app/ports/access-log.repository';
import type { AttemptStore } from '../app/ports/attempt.store';
import type { TrustStore } from '../app/ports/trust.store';
import { LockoutAdminController } from './http/lockout-admin.controller';
import { LockoutErrorFilter } from './http/lockout-error.filter';
import { LockoutController } from './http/lockout.controller';
import { buildLockoutConfig } from './lockout-config';
import {
  ACCESS_LOG_REPOSITORY,
  ATTEMPT_STORE,
  LOCKOUT_CLOCK,
  LOCKOUT_CONFIG,
  LOCKOUT_LOGGER,
  TRUST_STORE,
} from './lockout.tokens';
import { SqliteAccessLogRepository } from './persistence/sqlite-access-log.repository';
import { SqliteTrustStore } from './persistence/sqlite-trust.store';
import { InMemoryAttemptStore } from './store/in-memory-attempt.store';
import { RedisAttemptStore } from './store/redis-attempt.store';

@Module({
  imports: [DatabaseModule, RedisModule, PlatformAuthModule],
  controllers: [LockoutController, LockoutAdminController],
  providers: [
    LockoutErrorFilter,
    provideSystemClockToken(LOCKOUT_CLOCK),
    provideAppService({
      provide: LOCKOUT_CONFIG,
      inject: [ConfigService],
      factory: (config: ConfigService): LockoutConfig => buildLockoutConfig(config),
    }),
    provideAppService({
      provide: LOCKOUT_LOGGER,
      inject: [PinoLogger],
      factory: (logger: PinoLogger): LockoutLogger => {
        logger.setContext(LockoutService.name);
        return logger;
      },
    }),
    provideAppService({
      provide: ATTEMPT_STORE,
      inject: [RedisService, LOCKOUT_LOGGER],
      factory: (redis: RedisService, logger: LockoutLogger): AttemptStore => {
        if (redis.isEnabled()) {
          return new RedisAttemptStore(redis.getClient());
        }
        logger.warn({}, 'REDIS_URL is not set; attempt counters are kept in process memory');
        return new InMemoryAttemptStore();
      },
    }),
    provideAppService({
      provide: ACCESS_LOG_REPOSITORY,
      inject: [DatabaseService, LOCKOUT_CLOCK],
      factory: (database: DatabaseService, clock: Clock): AccessLogRepository =>
        new SqliteAccessLogRepository(database.db, clock),
    }),
    provideAppService({
      provide: TRUST_STORE,
      inject: [DatabaseService],
      factory: (database: DatabaseService): TrustStore => new SqliteTrustStore(database.db),
    }),
    provideAppService({
      provide: LockoutService,
      inject: [
        ATTEMPT_STORE,
        ACCESS_LOG_REPOSITORY,
        TRUST_STORE,
        LOCKOUT_CONFIG,
        LOCKOUT_CLOCK,
        LOCKOUT_LOGGER,
      ],
      factory: (
        attempts: AttemptStore,
        accessLogs: AccessLogRepository,
        trust: TrustStore,
        config: LockoutConfig,
        clock: Clock,
        logger: LockoutLogger,
      ) =>
        new LockoutService(
          attempts,
          accessLogs,
          trust,
          new LockoutEventChannel(logger),
          config,
          clock,
          logger,
        ),
    }),
    provideAppService({
      provide: LockoutAdminService,
      inject: [ATTEMPT_STORE, ACCESS_LOG_REPOSITORY, TRUST_STORE, LOCKOUT_CONFIG, LOCKOUT_CLOCK],
      factory: (
        attempts: AttemptStore,
        accessLogs: AccessLogRepository,
        trust: TrustStore,
        config: LockoutConfig,
        clock: Clock,
      ) => new LockoutAdminService(attempts, accessLogs, trust, config.policy, clock),
    }),
  ],
  exports: [LockoutService, LockoutAdminService],
})
export class LockoutModule {}
