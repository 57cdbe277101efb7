import { Transform } from 'class-transformer';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import {
  IsBoolean,
  IsDefined,
  IsIP,
  IsNotEmpty,
  IsOptional,
  IsString,
  MaxLength,
} from 'class-validator';

const MAX_USERNAME_LENGTH = 255;
// User agents are truncated when stored, not rejected.
const MAX_USER_AGENT_LENGTH = 8192;

const trim = ({ value }: { value: unknown }) => (typeof value === 'string' ? value.trim() : value);

const CLIENT_IP_DOC = {
  type: String,
  example: '203.0.113.10',
  description:
    'Address of the end user when the caller proxies the login. Defaults to the address of this request.',
};

export class LockoutCheckRequestDto {
  @ApiPropertyOptional({
    type: String,
    example: 'bob',
    maxLength: MAX_USERNAME_LENGTH,
    description: 'Username being attempted. Blank or missing scopes the attempt by ip only.',
  })
  @Transform(trim)
  @IsOptional()
  @IsString()
  @MaxLength(MAX_USERNAME_LENGTH)
  username?: string;

  @ApiPropertyOptional({
    type: String,
    example: 'Mozilla/5.0',
    description: 'Client user agent. Defaults to the User-Agent header of this request.',
  })
  @IsOptional()
  @IsString()
  @MaxLength(MAX_USER_AGENT_LENGTH)
  userAgent?: string;

  @ApiPropertyOptional(CLIENT_IP_DOC)
  @Transform(trim)
  @IsOptional()
  @IsIP()
  ip?: string;
}

export class LockoutAttemptRequestDto extends LockoutCheckRequestDto {
  @ApiProperty({ example: false, description: 'Whether the credentials were accepted.' })
  @IsDefined()
  @IsBoolean()
  success!: boolean;
}

export class LockoutLogoutRequestDto {
  @ApiProperty({ example: 'bob', maxLength: MAX_USERNAME_LENGTH })
  @Transform(trim)
  @IsString()
  @IsNotEmpty()
  @MaxLength(MAX_USERNAME_LENGTH)
  username!: string;

  @ApiPropertyOptional(CLIENT_IP_DOC)
  @Transform(trim)
  @IsOptional()
  @IsIP()
  ip?: string;
}

export const LOCKOUT_SCOPE_VALUES = ['ip', 'username', 'username-ip'] as const;

export class LockoutVerdictDto {
  @ApiProperty({ enum: ['allowed', 'locked'], example: 'allowed' })
  status!: 'allowed' | 'locked';

  @ApiProperty({
    isArray: true,
    enum: LOCKOUT_SCOPE_VALUES,
    example: ['ip', 'username'],
    description: 'Scopes that were evaluated, or the locked ones when locked.',
  })
  scopes!: string[];

  @ApiPropertyOptional({ example: 3600, description: 'Present when locked.' })
  retryAfterSeconds?: number;
}

export class LockoutVerdictEnvelopeDto {
  @ApiProperty({ type: LockoutVerdictDto })
  data!: LockoutVerdictDto;
}

export class LockoutLogoutResultDto {
  @ApiProperty({ example: true, description: 'Whether an open access log entry was closed.' })
  closed!: boolean;
}

export class LockoutLogoutEnvelopeDto {
  @ApiProperty({ type: LockoutLogoutResultDto })
  data!: LockoutLogoutResultDto;
}
