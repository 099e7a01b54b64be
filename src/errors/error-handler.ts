/**
 * mediasync error handler
 *
 * Classifies transport failures into the typed hierarchy and suggests what
 * the user can do about each kind.
 */

import { AxiosError } from 'axios';
import {
  MediaSyncError,
  TransportUnavailableError,
  AuthenticationRejectedError,
  MalformedResponseError,
  NotConnectedError,
  ConfigurationError,
  NotFoundError,
} from './sync-error.js';

export { MediaSyncError } from './sync-error.js';

export class ErrorHandler {
  /**
   * What the user can do about `err`, or undefined when nothing specific applies.
   */
  static hintFor(err: unknown): string | undefined {
    if (err instanceof AuthenticationRejectedError) {
      return 'The server rejected the API key. Run `mediasync config set server.apiKey <key>`.';
    }
    if (err instanceof TransportUnavailableError) {
      return 'The media server is unreachable. Check server.host and server.port.';
    }
    if (err instanceof ConfigurationError) {
      return 'Run `mediasync config validate` to list configuration problems.';
    }
    if (err instanceof NotFoundError) {
      return 'Run `mediasync sessions` to list controllable devices.';
    }
    if (err instanceof NotConnectedError) {
      return 'The push connection is not established yet; try again shortly.';
    }
    return undefined;
  }

  /**
   * Map a failure raised by the HTTP layer onto the typed hierarchy.
   * Typed errors pass through untouched.
   */
  static fromTransport(err: unknown, context?: Record<string, unknown>): MediaSyncError {
    if (err instanceof MediaSyncError) return err;

    if (err instanceof AxiosError) {
      const status = err.response?.status;
      const ctx = { ...context, status, code: err.code };
      if (status === 401 || status === 403) {
        return new AuthenticationRejectedError(`Authentication rejected (HTTP ${status})`, ctx);
      }
      if (status === 404) {
        return new NotFoundError(`Resource not found: ${err.config?.url ?? 'unknown'}`, ctx);
      }
      if (status !== undefined && status < 500) {
        return new MalformedResponseError(`Unexpected HTTP ${status}: ${err.message}`, ctx);
      }
      return new TransportUnavailableError(`Media server request failed: ${err.message}`, ctx);
    }

    return new TransportUnavailableError(
      err instanceof Error ? err.message : String(err),
      context
    );
  }
}
