export { ErrorCode } from '../../../shared/error-codes';
