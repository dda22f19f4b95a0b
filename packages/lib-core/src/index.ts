/**
 * @endsession/lib-core
 *
 * Constants, errors, logging and configuration shared by every package.
 */

export * from './constants';
export * from './utils/errors';
export * from './utils/logger';
export * from './types/env';
export * from './middleware/request-context';
