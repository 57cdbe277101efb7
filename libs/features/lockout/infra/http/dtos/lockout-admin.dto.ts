import { Transform, Type } from 'class-transformer';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsInt, IsOptional, IsString, Max, Min } from 'class-validator';
import {
  ACCESS_LOG_DEFAULT_LIMIT,
  ACCESS_LOG_MAX_LIMIT,
} from '../../../app/lockout-admin.service';
import { LOCKOUT_SCOPE_VALUES } from './lockout.dto';

const trim = ({ value }: { value: unknown }) => (typeof value === 'string' ? value.trim() : value);

export class LockoutIdentityQueryDto {
  @ApiPropertyOptional({ example: 'bob' })
  @Transform(trim)
  @IsOptional()
  @IsString()
  username?: string;

  @ApiPropertyOptional({ example: '10.0.0.1' })
  @Transform(trim)
  @IsOptional()
  @IsString()
  ip?: string;
}

export class AccessLogQueryDto extends LockoutIdentityQueryDto {
  @ApiPropertyOptional({
    example: ACCESS_LOG_DEFAULT_LIMIT,
    minimum: 1,
    maximum: ACCESS_LOG_MAX_LIMIT,
    default: ACCESS_LOG_DEFAULT_LIMIT,
  })
  @Type(() => Number)
  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(ACCESS_LOG_MAX_LIMIT)
  limit?: number;
}

export class AttemptRecordDto {
  @ApiProperty({ example: 'ip:2b7e1516...' })
  key!: string;

  @ApiProperty({ enum: LOCKOUT_SCOPE_VALUES, example: 'ip' })
  scope!: string;

  @ApiProperty({ type: String, nullable: true, example: 'bob' })
  username!: string | null;

  @ApiProperty({ type: String, nullable: true, example: '10.0.0.1' })
  ipAddress!: string | null;

  @ApiProperty({ type: String, nullable: true, example: 'Mozilla/5.0' })
  userAgent!: string | null;

  @ApiProperty({ example: 3 })
  failureCount!: number;

  @ApiProperty({ format: 'date-time', example: '2026-01-10T12:34:56.789Z' })
  firstFailureAt!: string;

  @ApiProperty({ format: 'date-time', example: '2026-01-10T12:40:00.000Z' })
  lastFailureAt!: string;

  @ApiProperty({ example: true, description: 'Derived from the clock at read time.' })
  locked!: boolean;

  @ApiProperty({ type: Number, nullable: true, example: 3200 })
  retryAfterSeconds!: number | null;
}

export class AttemptRecordListEnvelopeDto {
  @ApiProperty({ type: [AttemptRecordDto] })
  data!: AttemptRecordDto[];
}

export class AccessLogEntryDto {
  @ApiProperty({ example: 42 })
  id!: number;

  @ApiProperty({ type: String, nullable: true, example: 'bob' })
  username!: string | null;

  @ApiProperty({ type: String, nullable: true, example: '10.0.0.1' })
  ipAddress!: string | null;

  @ApiProperty({ type: String, nullable: true, example: 'Mozilla/5.0' })
  userAgent!: string | null;

  @ApiProperty({ format: 'date-time', example: '2026-01-10T12:34:56.789Z' })
  createdAt!: string;

  @ApiProperty({ format: 'date-time', example: '2026-01-10T12:34:56.789Z' })
  loginTime!: string;

  @ApiProperty({ type: String, format: 'date-time', nullable: true, example: null })
  logoutTime!: string | null;
}

export class AccessLogListEnvelopeDto {
  @ApiProperty({ type: [AccessLogEntryDto] })
  data!: AccessLogEntryDto[];
}

export class TrustRecordDto {
  @ApiProperty({ example: 'bob' })
  username!: string;

  @ApiProperty({ example: '10.0.0.1' })
  ipAddress!: string;

  @ApiProperty({ format: 'date-time', example: '2026-01-02T08:00:00.000Z' })
  firstTrustedAt!: string;

  @ApiProperty({ format: 'date-time', example: '2026-01-10T18:00:00.000Z' })
  lastLogoutAt!: string;

  @ApiProperty({ example: 4 })
  sessionCount!: number;
}

export class TrustRecordListEnvelopeDto {
  @ApiProperty({ type: [TrustRecordDto] })
  data!: TrustRecordDto[];
}

export class RemovedCountDto {
  @ApiProperty({ example: 2 })
  removed!: number;
}

export class RemovedCountEnvelopeDto {
  @ApiProperty({ type: RemovedCountDto })
  data!: RemovedCountDto;
}
