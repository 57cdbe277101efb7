import type { LoginIdentity } from '../domain/identity';
import type { ScopeKind } from '../domain/scoping-policy';

export type AttemptInput = LoginIdentity &
  Readonly<{
    success: boolean;
    at?: Date;
    requestId?: string;
  }>;

export type CheckInput = LoginIdentity & Readonly<{ at?: Date }>;

export type LogoutInput = Readonly<{
  username?: string | null;
  ip?: string | null;
  at?: Date;
}>;

export type LogoutResult = Readonly<{ closed: boolean }>;

export type LockoutRequestContext = Readonly<{
  username: string | null;
  ipAddress: string | null;
  userAgent: string | null;
  requestId?: string;
  at: Date;
}>;

export type UserLockedOutEvent = Readonly<{
  request: LockoutRequestContext;
  username: string | null;
  ipAddress: string | null;
  /** Scopes whose count reached the limit on this failure. */
  scopes: ScopeKind[];
  failureCount: number;
  occurredAt: Date;
}>;

export type LockoutEventHandler = (event: UserLockedOutEvent) => unknown;

export type TrustRecord = Readonly<{
  username: string;
  ipAddress: string;
  firstTrustedAt: Date;
  lastLogoutAt: Date;
  sessionCount: number;
}>;

export type TrustFilter = Readonly<{
  username?: string;
  ip?: string;
}>;

export type AccessLogEntry = Readonly<{
  id: number;
  username: string | null;
  ipAddress: string | null;
  userAgent: string | null;
  createdAt: Date;
  loginTime: Date;
  logoutTime: Date | null;
}>;

export type AccessLogQuery = Readonly<{
  username?: string;
  ip?: string;
  limit: number;
}>;

export type AttemptRecordView = Readonly<{
  key: string;
  scope: ScopeKind;
  username: string | null;
  ipAddress: string | null;
  userAgent: string | null;
  failureCount: number;
  firstFailureAt: Date;
  lastFailureAt: Date;
  locked: boolean;
  retryAfterSeconds: number | null;
}>;
