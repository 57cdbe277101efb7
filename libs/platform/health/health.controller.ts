import { Controller, Get } from '@nestjs/common';
import {
  ApiOkResponse,
  ApiOperation,
  ApiServiceUnavailableResponse,
  ApiTags,
} from '@nestjs/swagger';
import { SkipEnvelope } from '../http/decorators/skip-envelope.decorator';
import { ErrorCode } from '../http/errors/error-codes';
import { ApiErrorCodes } from '../http/openapi/api-error-codes.decorator';
import { ReadinessService } from './readiness.service';

const STATUS_SCHEMA = {
  type: 'object',
  properties: { status: { type: 'string', example: 'ok' } },
  required: ['status'],
};

/** Unversioned health checks for the orchestrator; neither needs an API key. */
@ApiTags('Health')
@Controller()
export class HealthController {
  constructor(private readonly readiness: ReadinessService) {}

  @Get('health')
  @SkipEnvelope()
  @ApiOperation({
    operationId: 'health.get',
    summary: 'Liveness check',
    description: 'Answers while the process can serve requests. Touches no store.',
  })
  @ApiErrorCodes([ErrorCode.INTERNAL])
  @ApiOkResponse({ description: 'Process is alive.', schema: STATUS_SCHEMA })
  getHealth() {
    return { status: 'ok' };
  }

  @Get('ready')
  @SkipEnvelope()
  @ApiOperation({
    operationId: 'ready.get',
    summary: 'Readiness check',
    description: 'Pings the SQLite database and, when configured, the Redis attempt store.',
  })
  @ApiErrorCodes([ErrorCode.INTERNAL])
  @ApiOkResponse({ description: 'All stores answered.', schema: STATUS_SCHEMA })
  @ApiServiceUnavailableResponse({ description: 'A store did not answer (problem details).' })
  async getReady() {
    await this.readiness.assertReady();
    return { status: 'ok' };
  }
}
