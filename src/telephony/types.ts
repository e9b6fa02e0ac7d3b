/**
 * Telephony Types - outbound call lifecycle over LiveKit SIP
 *
 * Defines:
 * - Call status lifecycle reported by the SIP participant
 * - Dial info carried in the job metadata
 * - Narrow interfaces for the dialing API and room membership
 * - Call outcomes returned by the orchestrator
 */

/**
 * SIP call status lifecycle, as reported in the `sip.callStatus`
 * participant attribute
 */
export enum CallStatus {
  PENDING = 'pending',
  RINGING = 'ringing',
  AUTOMATION = 'automation',
  ACTIVE = 'active',
  HANGUP = 'hangup',
  FAILED = 'failed',
}

/**
 * Participant attribute carrying the SIP call status
 */
export const CALL_STATUS_ATTRIBUTE = 'sip.callStatus';

/**
 * Who to call and what the agent knows about them
 */
export interface DialInfo {
  /** Phone number to call (E.164 format) */
  phoneNumber: string;

  /** Human agent to hand the call to on request (E.164 format) */
  transferTo?: string;

  customerName?: string;

  /** Free-form appointment description, e.g. "next Tuesday at 3pm" */
  appointmentTime?: string;
}

/**
 * Request to place a SIP leg into a room
 */
export interface DialRequest {
  roomName: string;
  trunkId: string;
  phoneNumber: string;
  participantIdentity: string;
  participantName?: string;

  /** Block until the callee answers or the attempt fails */
  waitUntilAnswered: boolean;

  ringingTimeoutSeconds?: number;
}

/**
 * Telephony dialing API (LiveKit SIP + room service in production)
 */
export interface DialingClient {
  createCall(request: DialRequest): Promise<void>;
  removeParticipant(roomName: string, identity: string): Promise<void>;
  deleteRoom(roomName: string): Promise<void>;
}

/**
 * Minimal view of a room participant
 * (avoids a direct rtc-node dependency for testability)
 */
export interface ParticipantLike {
  identity: string;
  readonly attributes: Record<string, string>;
}

/**
 * Room membership service bound to the call's room
 */
export interface RoomMembership {
  readonly roomName: string;

  /** Identity the agent itself joined the room with */
  readonly localIdentity: string;

  waitForParticipant(identity: string): Promise<ParticipantLike>;
}

/**
 * SIP failure details surfaced to operators
 */
export interface DialFailure {
  message: string;
  sipStatusCode?: string;
  sipStatus?: string;
}

/**
 * Why a call session was torn down
 */
export type CallEndReason =
  | 'end_call'
  | 'voicemail'
  | 'transfer_success'
  | 'transfer_failed'
  | 'timeout'
  | 'callee_hangup'
  | 'dial_failed'
  | 'setup_failed'
  | 'worker_shutdown';

/**
 * Result of placing a call
 */
export type CallOutcome =
  | { kind: 'connected'; calleeIdentity: string }
  | { kind: 'dial_failed'; error: DialFailure }
  | { kind: 'hung_up'; status: CallStatus.HANGUP | CallStatus.FAILED }
  | { kind: 'timed_out'; waitedMs: number }
  | { kind: 'setup_failed'; message: string }
  | { kind: 'ended'; reason: CallEndReason };
