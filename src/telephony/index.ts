/**
 * Telephony Module - Main exports
 *
 * Outbound SIP calls placed through LiveKit: dialing, call status
 * monitoring and the per-call lifecycle.
 */

// Configuration
export {
  CALL_ROOM_PREFIX,
  requireOutboundTrunkId,
  validatePhoneNumber,
  generateCallRoomName,
  type PhoneNumberValidation,
} from './config.js';

// Types
export {
  CallStatus,
  CALL_STATUS_ATTRIBUTE,
  type DialInfo,
  type DialRequest,
  type DialingClient,
  type ParticipantLike,
  type RoomMembership,
  type DialFailure,
  type CallEndReason,
  type CallOutcome,
} from './types.js';

// Dialing
export { LiveKitDialer, isNotFoundError } from './dialer.js';

// Call state
export {
  CallSession,
  isTerminalStatus,
  type CallSessionOptions,
  type EndOptions,
  type TeardownHook,
} from './call-session.js';

// Status monitoring
export {
  CallStatusMonitor,
  classifyCallStatus,
  endsAnswerWait,
  type StatusChange,
  type WatchOptions,
  type WatchResult,
  type CallStatusMonitorOptions,
} from './call-status-monitor.js';

// Call lifecycle
export {
  CallOrchestrator,
  type OrchestratorOptions,
  type OrchestratorDependencies,
} from './call-orchestrator.js';
