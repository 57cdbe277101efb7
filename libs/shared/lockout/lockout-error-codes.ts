export enum LockoutErrorCode {
  LOCKOUT_LOCKED = 'LOCKOUT_LOCKED',
  LOCKOUT_INVALID_IDENTITY = 'LOCKOUT_INVALID_IDENTITY',
}
