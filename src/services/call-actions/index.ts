/**
 * Call Actions Module
 *
 * @module call-actions
 */

export type {
  ActionDispatch,
  ActionResult,
  AvailabilityProvider,
  CallAction,
  CallActionArgs,
  CallActionType,
  ConversationControl,
  DispatchContext,
  TransferScript,
} from './types.js';

export {
  CallActionDispatcher,
  DEFAULT_TRANSFER_SCRIPT,
  type CallActionDispatcherOptions,
} from './dispatcher.js';

export { StaticAvailabilityProvider } from './scheduling.js';
