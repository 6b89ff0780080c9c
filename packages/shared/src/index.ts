export { AppError, ValidationError, isAppError, errorMessage } from './errors';
export type { ErrorDetail } from './errors';
export { assertValidated, nameMapSchema, parseNameMap } from './validation';
