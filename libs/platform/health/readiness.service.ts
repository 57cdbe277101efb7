import { Injectable } from '@nestjs/common';
import { DatabaseService } from '../db/database.service';
import { ErrorCode } from '../http/errors/error-codes';
import { ProblemException } from '../http/errors/problem.exception';
import { RedisService } from '../redis/redis.service';

type ReadinessFailure = { field: string; message: string };

function messageOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

@Injectable()
export class ReadinessService {
  constructor(
    private readonly database: DatabaseService,
    private readonly redis: RedisService,
  ) {}

  async assertReady(): Promise<void> {
    const failures: ReadinessFailure[] = [];

    try {
      this.database.ping();
    } catch (err: unknown) {
      failures.push({ field: 'db', message: `SQLite not ready: ${messageOf(err)}` });
    }

    // Without REDIS_URL attempts live in process memory; there is nothing to reach.
    if (this.redis.isEnabled()) {
      try {
        await this.redis.ping();
      } catch (err: unknown) {
        failures.push({ field: 'redis', message: `Redis not ready: ${messageOf(err)}` });
      }
    }

    if (failures.length > 0) {
      throw new ProblemException(503, {
        title: 'Service Unavailable',
        detail: 'Readiness checks failed',
        code: ErrorCode.INTERNAL,
        errors: failures,
      });
    }
  }
}
