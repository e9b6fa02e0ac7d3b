/**
 * Call Action Types
 *
 * The closed set of actions the conversational agent may invoke mid-call.
 *
 * @module call-actions/types
 */

type NoArgs = Record<string, never>;

/**
 * Arguments carried by each action
 */
export interface CallActionArgs {
  end_call: NoArgs;
  transfer_call: NoArgs;
  look_up_availability: { date: string };
  confirm_appointment: { date: string; time: string };
  detected_answering_machine: NoArgs;
}

export type CallActionType = keyof CallActionArgs;

/**
 * Tagged action variant
 */
export type CallAction<K extends CallActionType = CallActionType> = {
  [P in K]: { type: P; args: CallActionArgs[P] };
}[K];

/**
 * Result reported back to the agent
 */
export interface ActionResult {
  success: boolean;
  message: string;
  data?: Record<string, unknown>;
}

/**
 * The tool call an action was issued from. The speech that issued it
 * cannot be awaited through its own handle while the tool runs.
 */
export interface DispatchContext {
  /** Resolves once the issuing speech has finished playing, up to the tool call */
  waitForPlayout(): Promise<void>;
}

/**
 * Entry point the agent's tools call into
 */
export interface ActionDispatch {
  dispatch(action: CallAction, context?: DispatchContext): Promise<ActionResult>;
}

/**
 * Scheduling lookup behind `look_up_availability`
 */
export interface AvailabilityProvider {
  lookUp(date: string): Promise<string[]>;
}

/**
 * The part of the conversational session the actions drive
 */
export interface ConversationControl {
  drain(): Promise<void>;
  generateReply(instructions: string): Promise<void>;
}

/**
 * Scripted lines spoken around a transfer
 */
export interface TransferScript {
  notice: string;
  apology: string;
}
