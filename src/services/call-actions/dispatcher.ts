/**
 * Call Action Dispatcher
 *
 * Executes agent-invoked actions against the call session through an
 * explicit handler table. Dialing and room errors are turned into results
 * (or a spoken apology followed by a hangup); they never reach the agent.
 *
 * @module call-actions/dispatcher
 */

import { getLogger, describeError, redactPhoneNumber } from '../../core/logging.js';
import { TransferError } from '../../core/exceptions.js';
import type { TransferStage } from '../../core/exceptions.js';
import type { CallSession } from '../../telephony/call-session.js';
import type { DialingClient, RoomMembership } from '../../telephony/types.js';
import type {
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

const logger = getLogger('services.call-actions');

type ActionHandlers = {
  [P in CallActionType]: (args: CallActionArgs[P], context?: DispatchContext) => Promise<ActionResult>;
};

/**
 * Actions that reference the callee and so require a bound session
 */
const CALLEE_BOUND_ACTIONS: ReadonlySet<CallActionType> = new Set<CallActionType>([
  'end_call',
  'transfer_call',
  'detected_answering_machine',
]);

export const DEFAULT_TRANSFER_SCRIPT: TransferScript = {
  notice: 'Let the user know you will be transferring them to a team member now.',
  apology: 'Apologize to the user: the transfer did not go through and the call will end now.',
};

export interface CallActionDispatcherOptions {
  session: CallSession;
  conversation: ConversationControl;
  dialer: DialingClient;
  membership: RoomMembership;
  availability: AvailabilityProvider;
  trunkId: string;
  transferIdentity: string;
  ringingTimeoutSeconds?: number;
  transferScript?: TransferScript;
}

export class CallActionDispatcher implements ActionDispatch {
  private session: CallSession;
  private conversation: ConversationControl;
  private dialer: DialingClient;
  private membership: RoomMembership;
  private availability: AvailabilityProvider;
  private trunkId: string;
  private transferIdentity: string;
  private ringingTimeoutSeconds?: number;
  private transferScript: TransferScript;
  private handlers: ActionHandlers;

  constructor(options: CallActionDispatcherOptions) {
    this.session = options.session;
    this.conversation = options.conversation;
    this.dialer = options.dialer;
    this.membership = options.membership;
    this.availability = options.availability;
    this.trunkId = options.trunkId;
    this.transferIdentity = options.transferIdentity;
    this.ringingTimeoutSeconds = options.ringingTimeoutSeconds;
    this.transferScript = options.transferScript ?? DEFAULT_TRANSFER_SCRIPT;

    this.handlers = {
      end_call: (_args, context) => this.endCall(context),
      transfer_call: (_args, context) => this.transferCall(context),
      look_up_availability: (args) => this.lookUpAvailability(args.date),
      confirm_appointment: (args) => this.confirmAppointment(args.date, args.time),
      detected_answering_machine: (_args, context) => this.detectedAnsweringMachine(context),
    };
  }

  /**
   * Run one action. Throws CallStateError when a callee-bound action
   * runs before the callee was bound.
   *
   * Actions issued from a tool call pass its context: the call then ends
   * without waiting for session teardown, which itself waits for the
   * speech that owns the tool call.
   */
  dispatch(action: CallAction, context?: DispatchContext): Promise<ActionResult> {
    return this.invoke(action.type, action.args, context);
  }

  private async invoke<K extends CallActionType>(
    type: K,
    args: CallActionArgs[K],
    context?: DispatchContext,
  ): Promise<ActionResult> {
    if (this.session.isTerminated()) {
      logger.warning('Action ignored, call has ended', {
        action: type,
        roomName: this.session.roomName,
        status: this.session.status,
      });
      return { success: false, message: 'call has already ended' };
    }

    if (CALLEE_BOUND_ACTIONS.has(type)) {
      this.session.requireBound(type);
    }

    logger.info('🔧 Call action invoked', { action: type, roomName: this.session.roomName });
    this.session.recordAction(type);
    const handler = this.handlers[type];
    return handler(args, context);
  }

  private async endCall(context?: DispatchContext): Promise<ActionResult> {
    logger.info('🔚 Ending call', { participant: this.session.calleeIdentity });
    try {
      await (context ? context.waitForPlayout() : this.conversation.drain());
    } catch (error) {
      logger.warning('Utterance did not finish cleanly before hangup', { error: describeError(error) });
    }
    await this.session.end('end_call', { deleteRoom: true, detachHooks: context !== undefined });
    return { success: true, message: 'call ended' };
  }

  private async transferCall(context?: DispatchContext): Promise<ActionResult> {
    const transferTo = this.session.dialInfo.transferTo;
    if (!transferTo) {
      logger.warning('Transfer requested without a transfer target', { roomName: this.session.roomName });
      return { success: false, message: 'cannot transfer call' };
    }

    logger.info('Transferring call', {
      roomName: this.session.roomName,
      transferTo: redactPhoneNumber(transferTo),
    });

    try {
      await this.conversation.generateReply(this.transferScript.notice);
      await this.stage('dial', () => this.dialer.createCall({
        roomName: this.session.roomName,
        trunkId: this.trunkId,
        phoneNumber: transferTo,
        participantIdentity: this.transferIdentity,
        participantName: 'Human Agent',
        waitUntilAnswered: true,
        ringingTimeoutSeconds: this.ringingTimeoutSeconds,
      }));
      await this.stage('join', () => this.membership.waitForParticipant(this.transferIdentity));
      await this.stage('remove', () => this.dialer.removeParticipant(
        this.session.roomName,
        this.membership.localIdentity,
      ));
    } catch (error) {
      logger.error('Transfer failed', {
        roomName: this.session.roomName,
        stage: error instanceof TransferError ? error.stage : 'notice',
        error: describeError(error),
      });
      await this.apologizeAndHangUp(context);
      return { success: false, message: 'transfer failed' };
    }

    logger.info('✅ Call transferred', { roomName: this.session.roomName });
    await this.session.end('transfer_success', { deleteRoom: false, detachHooks: context !== undefined });
    return { success: true, message: 'call transferred' };
  }

  private async apologizeAndHangUp(context?: DispatchContext): Promise<void> {
    try {
      await this.conversation.generateReply(this.transferScript.apology);
    } catch (error) {
      logger.error('Failed to deliver transfer apology', { error: describeError(error) });
    }
    await this.session.end('transfer_failed', { deleteRoom: true, detachHooks: context !== undefined });
  }

  private async stage<T>(stage: TransferStage, run: () => Promise<T>): Promise<T> {
    try {
      return await run();
    } catch (error) {
      throw new TransferError(stage, error);
    }
  }

  private async lookUpAvailability(date: string): Promise<ActionResult> {
    logger.info('Looking up availability', { date });
    let availableTimes: string[];
    try {
      availableTimes = await this.availability.lookUp(date);
    } catch (error) {
      logger.error('Availability lookup failed', { date, error: describeError(error) });
      return { success: false, message: 'could not look up availability' };
    }
    return {
      success: true,
      message: availableTimes.length > 0
        ? `available times are ${availableTimes.join(', ')}`
        : 'no available times',
      data: { date, availableTimes },
    };
  }

  private async confirmAppointment(date: string, time: string): Promise<ActionResult> {
    logger.info('Confirming appointment', {
      date,
      time,
      participant: this.session.calleeIdentity,
    });
    return {
      success: true,
      message: 'reservation confirmed',
      data: { date, time },
    };
  }

  private async detectedAnsweringMachine(context?: DispatchContext): Promise<ActionResult> {
    logger.info('📭 Voicemail detected, hanging up', { participant: this.session.calleeIdentity });
    await this.session.end('voicemail', { deleteRoom: true, detachHooks: context !== undefined });
    return { success: true, message: 'voicemail detected, call ended' };
  }
}
