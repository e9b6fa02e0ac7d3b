/**
 * Custom exception classes for the application.
 */

/**
 * Base class for all custom exceptions
 */
export class AppError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = this.constructor.name;
    Error.captureStackTrace?.(this, this.constructor);
  }
}

/**
 * Configuration-related errors
 */
export class ConfigurationError extends AppError {}

/**
 * Job metadata could not be turned into dial info
 */
export class JobMetadataError extends AppError {
  metadata?: string;

  constructor(message: string, metadata?: string) {
    super(message);
    this.metadata = metadata;
  }
}

/**
 * Shape of the Twirp error thrown by livekit-server-sdk when a SIP call fails.
 * The SIP status travels in the error metadata.
 */
interface TwirpLikeError {
  message: string;
  status?: number;
  code?: string;
  metadata?: Record<string, string>;
}

function isTwirpLikeError(error: unknown): error is TwirpLikeError {
  return error instanceof Error && 'metadata' in error;
}

function readMetadata(error: TwirpLikeError): Record<string, string> {
  const metadata = error.metadata;
  if (typeof metadata !== 'object' || metadata === null) return {};
  return metadata;
}

/**
 * Dial attempt rejected by the SIP gateway (busy, no answer, invalid number...)
 */
export class SipDialError extends AppError {
  sipStatusCode?: string;
  sipStatus?: string;

  constructor(message: string, sipStatusCode?: string, sipStatus?: string, options?: { cause?: unknown }) {
    super(message, options);
    this.sipStatusCode = sipStatusCode;
    this.sipStatus = sipStatus;
  }

  static from(error: unknown): SipDialError {
    if (error instanceof SipDialError) return error;
    if (isTwirpLikeError(error)) {
      const metadata = readMetadata(error);
      return new SipDialError(
        error.message,
        metadata['sip_status_code'],
        metadata['sip_status'],
        { cause: error },
      );
    }
    if (error instanceof Error) {
      return new SipDialError(error.message, undefined, undefined, { cause: error });
    }
    return new SipDialError(String(error));
  }
}

/**
 * Stage at which a transfer leg failed
 */
export type TransferStage = 'dial' | 'join' | 'remove';

/**
 * Transfer leg could not be established
 */
export class TransferError extends AppError {
  stage: TransferStage;

  constructor(stage: TransferStage, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Transfer failed at ${stage}: ${reason}`, { cause });
    this.stage = stage;
  }
}

/**
 * Operation attempted in a call state that does not allow it
 */
export class CallStateError extends AppError {
  roomName?: string;

  constructor(message: string, roomName?: string) {
    super(message);
    this.roomName = roomName;
  }
}
