import { Controller, Delete, Get, Query, UseFilters } from '@nestjs/common';
import { ApiOkResponse, ApiOperation, ApiTags } from '@nestjs/swagger';
import { PinoLogger } from 'nestjs-pino';
import { RequireApiKey } from '../../../../platform/auth/api-key.decorator';
import { ErrorCode } from '../../../../platform/http/errors/error-codes';
import { ApiErrorCodes } from '../../../../platform/http/openapi/api-error-codes.decorator';
import { LockoutAdminService } from '../../app/lockout-admin.service';
import { LockoutService } from '../../app/lockout.service';
import {
  AccessLogListEnvelopeDto,
  AccessLogQueryDto,
  AttemptRecordListEnvelopeDto,
  LockoutIdentityQueryDto,
  RemovedCountEnvelopeDto,
  TrustRecordListEnvelopeDto,
  type AccessLogEntryDto,
  type AttemptRecordDto,
  type RemovedCountDto,
  type TrustRecordDto,
} from './dtos/lockout-admin.dto';
import { LockoutErrorFilter } from './lockout-error.filter';

@ApiTags('Admin')
@Controller('admin/lockout')
@RequireApiKey('admin')
@UseFilters(LockoutErrorFilter)
export class LockoutAdminController {
  constructor(
    private readonly admin: LockoutAdminService,
    private readonly lockout: LockoutService,
    private readonly logger: PinoLogger,
  ) {
    this.logger.setContext(LockoutAdminController.name);
  }

  @Get('attempts')
  @ApiOperation({
    operationId: 'admin.lockout.attempts.list',
    summary: 'List attempt records',
    description: 'Every stored attempt counter, newest failure first, with its current lock state.',
  })
  @ApiErrorCodes([ErrorCode.UNAUTHORIZED, ErrorCode.INTERNAL])
  @ApiOkResponse({ type: AttemptRecordListEnvelopeDto })
  async listAttempts(): Promise<AttemptRecordDto[]> {
    const records = await this.admin.listAttempts();
    return records.map((record) => ({
      ...record,
      firstFailureAt: record.firstFailureAt.toISOString(),
      lastFailureAt: record.lastFailureAt.toISOString(),
    }));
  }

  @Delete('attempts')
  @ApiOperation({
    operationId: 'admin.lockout.attempts.reset',
    summary: 'Reset attempt records',
    description:
      'Without filters removes every record. `ip` and `username` narrow the reset; both given must both match.',
  })
  @ApiErrorCodes([ErrorCode.VALIDATION_FAILED, ErrorCode.UNAUTHORIZED, ErrorCode.INTERNAL])
  @ApiOkResponse({ type: RemovedCountEnvelopeDto })
  async resetAttempts(@Query() query: LockoutIdentityQueryDto): Promise<RemovedCountDto> {
    // LockoutService logs the reset with its filter and count.
    const removed = await this.lockout.reset({ ip: query.ip, username: query.username });
    return { removed };
  }

  @Get('access-logs')
  @ApiOperation({
    operationId: 'admin.lockout.accessLogs.list',
    summary: 'List access log entries',
    description: 'Successful logins, newest first.',
  })
  @ApiErrorCodes([ErrorCode.VALIDATION_FAILED, ErrorCode.UNAUTHORIZED, ErrorCode.INTERNAL])
  @ApiOkResponse({ type: AccessLogListEnvelopeDto })
  async listAccessLogs(@Query() query: AccessLogQueryDto): Promise<AccessLogEntryDto[]> {
    const entries = await this.admin.listAccessLogs(query);
    return entries.map((entry) => ({
      ...entry,
      createdAt: entry.createdAt.toISOString(),
      loginTime: entry.loginTime.toISOString(),
      logoutTime: entry.logoutTime ? entry.logoutTime.toISOString() : null,
    }));
  }

  @Get('trusted')
  @ApiOperation({
    operationId: 'admin.lockout.trusted.list',
    summary: 'List trusted origins',
    description: 'Username and ip pairs that completed a login and logout.',
  })
  @ApiErrorCodes([ErrorCode.VALIDATION_FAILED, ErrorCode.UNAUTHORIZED, ErrorCode.INTERNAL])
  @ApiOkResponse({ type: TrustRecordListEnvelopeDto })
  async listTrusted(@Query() query: LockoutIdentityQueryDto): Promise<TrustRecordDto[]> {
    const records = await this.admin.listTrustRecords(query);
    return records.map((record) => ({
      ...record,
      firstTrustedAt: record.firstTrustedAt.toISOString(),
      lastLogoutAt: record.lastLogoutAt.toISOString(),
    }));
  }

  @Delete('trusted')
  @ApiOperation({
    operationId: 'admin.lockout.trusted.revoke',
    summary: 'Revoke trusted origins',
    description: 'Removes trust records matching `username` and/or `ip`. One of them is required.',
  })
  @ApiErrorCodes([ErrorCode.VALIDATION_FAILED, ErrorCode.UNAUTHORIZED, ErrorCode.INTERNAL])
  @ApiOkResponse({ type: RemovedCountEnvelopeDto })
  async revokeTrusted(@Query() query: LockoutIdentityQueryDto): Promise<RemovedCountDto> {
    const removed = await this.admin.revokeTrust(query);
    this.logger.info({ ip: query.ip, username: query.username, removed }, 'Operator revoked trust');
    return { removed };
  }
}
