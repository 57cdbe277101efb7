import { Body, Controller, HttpCode, Post, UseFilters } from '@nestjs/common';
import {
  ApiOkResponse,
  ApiOperation,
  ApiTags,
  ApiTooManyRequestsResponse,
} from '@nestjs/swagger';
import { RequireApiKey } from '../../../../platform/auth/api-key.decorator';
import { ErrorCode } from '../../../../platform/http/errors/error-codes';
import { ApiErrorCodes } from '../../../../platform/http/openapi/api-error-codes.decorator';
import {
  ClientContext,
  type ClientContextValue,
} from '../../../../platform/http/request-context.decorator';
import type { LockoutVerdict } from '../../domain/lockout-evaluator';
import { LockoutService } from '../../app/lockout.service';
import { LockoutErrorCode } from '../../app/lockout.error-codes';
import { LockoutError } from '../../app/lockout.errors';
import type { LogoutResult } from '../../app/lockout.types';
import {
  LockoutAttemptRequestDto,
  LockoutCheckRequestDto,
  LockoutLogoutEnvelopeDto,
  LockoutLogoutRequestDto,
  LockoutVerdictEnvelopeDto,
  type LockoutVerdictDto,
} from './dtos/lockout.dto';
import { LockoutErrorFilter } from './lockout-error.filter';

/** A locked verdict is answered as a 429 problem carrying `Retry-After`. */
function toVerdictResponse(verdict: LockoutVerdict): LockoutVerdictDto {
  if (verdict.status === 'locked') {
    throw new LockoutError({
      status: 429,
      code: LockoutErrorCode.LOCKOUT_LOCKED,
      message: 'Too many failed login attempts. Try again later.',
      retryAfterSeconds: verdict.retryAfterSeconds,
    });
  }
  return { status: verdict.status, scopes: [...verdict.scopes] };
}

@ApiTags('Lockout')
@Controller('lockout')
@RequireApiKey('service')
@UseFilters(LockoutErrorFilter)
export class LockoutController {
  constructor(private readonly lockout: LockoutService) {}

  @Post('check')
  @HttpCode(200)
  @ApiOperation({
    operationId: 'lockout.check',
    summary: 'Check before verifying credentials',
    description:
      'Answers whether the caller may attempt a login for this username from the given ip, or the request ip. Records nothing.',
  })
  @ApiErrorCodes([
    ErrorCode.VALIDATION_FAILED,
    ErrorCode.UNAUTHORIZED,
    LockoutErrorCode.LOCKOUT_LOCKED,
    ErrorCode.INTERNAL,
  ])
  @ApiOkResponse({ type: LockoutVerdictEnvelopeDto })
  @ApiTooManyRequestsResponse({ description: 'Locked out (problem details, Retry-After).' })
  async check(
    @Body() body: LockoutCheckRequestDto,
    @ClientContext() client: ClientContextValue,
  ): Promise<LockoutVerdictDto> {
    const verdict = await this.lockout.checkAttempt({
      username: body.username,
      ip: body.ip ?? client.ip,
      userAgent: body.userAgent ?? client.userAgent,
    });
    return toVerdictResponse(verdict);
  }

  @Post('attempts')
  @HttpCode(200)
  @ApiOperation({
    operationId: 'lockout.attempts.record',
    summary: 'Record a login attempt',
    description:
      'Records the outcome of a credential check. While locked the attempt is not counted and a successful one is refused.',
  })
  @ApiErrorCodes([
    ErrorCode.VALIDATION_FAILED,
    ErrorCode.UNAUTHORIZED,
    LockoutErrorCode.LOCKOUT_LOCKED,
    ErrorCode.INTERNAL,
  ])
  @ApiOkResponse({ type: LockoutVerdictEnvelopeDto })
  @ApiTooManyRequestsResponse({ description: 'Locked out (problem details, Retry-After).' })
  async recordAttempt(
    @Body() body: LockoutAttemptRequestDto,
    @ClientContext() client: ClientContextValue,
  ): Promise<LockoutVerdictDto> {
    const verdict = await this.lockout.recordAttempt({
      username: body.username,
      ip: body.ip ?? client.ip,
      userAgent: body.userAgent ?? client.userAgent,
      success: body.success,
      requestId: client.requestId,
    });
    return toVerdictResponse(verdict);
  }

  @Post('logouts')
  @HttpCode(200)
  @ApiOperation({
    operationId: 'lockout.logouts.record',
    summary: 'Record a logout',
    description:
      'Closes the newest open access log entry for the username and ip, and marks the pair as trusted.',
  })
  @ApiErrorCodes([
    ErrorCode.VALIDATION_FAILED,
    ErrorCode.UNAUTHORIZED,
    LockoutErrorCode.LOCKOUT_INVALID_IDENTITY,
    ErrorCode.INTERNAL,
  ])
  @ApiOkResponse({ type: LockoutLogoutEnvelopeDto })
  async recordLogout(
    @Body() body: LockoutLogoutRequestDto,
    @ClientContext() client: ClientContextValue,
  ): Promise<LogoutResult> {
    return this.lockout.recordLogout({ username: body.username, ip: body.ip ?? client.ip });
  }
}
