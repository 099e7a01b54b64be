/**
 * mediasync errors
 *
 * Barrel export for typed error hierarchy and error handler.
 */

export {
  MediaSyncError,
  TransportUnavailableError,
  AuthenticationRejectedError,
  MalformedResponseError,
  NotConnectedError,
  QueueOverflowError,
  ConfigurationError,
  NotFoundError,
} from './sync-error.js';

export { ErrorHandler } from './error-handler.js';
