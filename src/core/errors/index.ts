export { MotifStatError, ErrorCode, isMotifStatError, wrapError } from './MotifStatError';
