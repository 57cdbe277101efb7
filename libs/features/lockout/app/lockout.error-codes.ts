export { LockoutErrorCode } from '../../../shared/lockout/lockout-error-codes';
