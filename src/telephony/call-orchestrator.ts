/**
 * Call Orchestrator - outbound call lifecycle
 *
 * Sequence for one job:
 * 1. Start the conversational session (not awaited)
 * 2. Dial the callee, blocking until answered or failed
 * 3. Await session start + callee join, bind the session to the callee
 * 4. Watch the SIP call status until active, gone, or out of time
 *
 * Every terminal path ends the CallSession, which deletes the room at
 * most once and closes the session.
 */

import { getLogger, describeError, redactPhoneNumber } from '../core/logging.js';
import { CallStateError, SipDialError } from '../core/exceptions.js';
import { buildInstructions } from '../core/prompt-templates.js';
import type { SessionController } from '../agent/session-controller.js';
import { CallActionDispatcher } from '../services/call-actions/index.js';
import type { AvailabilityProvider, TransferScript } from '../services/call-actions/index.js';
import { CallSession } from './call-session.js';
import type { TeardownHook } from './call-session.js';
import { CallStatusMonitor } from './call-status-monitor.js';
import type { StatusChange } from './call-status-monitor.js';
import { CallStatus } from './types.js';
import type { CallOutcome, DialInfo, DialingClient, ParticipantLike, RoomMembership } from './types.js';

const logger = getLogger('telephony.orchestrator');

/**
 * Settle like `promise`, or reject with CallStateError once `ms` has passed
 */
function withinBudget<T>(promise: Promise<T>, ms: number, what: string): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      reject(new CallStateError(`${what} did not complete within ${ms}ms`));
    }, ms);
    void promise.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (error: unknown) => {
        clearTimeout(timer);
        reject(error);
      },
    );
  });
}

/**
 * Per-call settings, passed in explicitly for every job
 */
export interface OrchestratorOptions {
  trunkId: string;
  practiceName: string;
  calleeIdentity: string;
  transferIdentity: string;
  /**
   * Budget for the callee to reach `active` once monitoring is armed.
   * Session start and the callee's join are each bounded by it too.
   */
  answerTimeoutMs: number;
  ringingTimeoutSeconds?: number;
  pollIntervalMs?: number;
  transferScript?: TransferScript;
}

export interface OrchestratorDependencies {
  dialer: DialingClient;
  membership: RoomMembership;
  controller: SessionController;
  availability: AvailabilityProvider;
  /** Extra teardown work, e.g. shutting the job down */
  onCallEnded?: TeardownHook;
  onStatusChange?: (change: StatusChange) => void;
}

export class CallOrchestrator {
  private deps: OrchestratorDependencies;
  private options: OrchestratorOptions;
  private _session: CallSession | null = null;
  private _dispatcher: CallActionDispatcher | null = null;

  constructor(deps: OrchestratorDependencies, options: OrchestratorOptions) {
    this.deps = deps;
    this.options = options;
  }

  /**
   * Session of the call being placed, once `placeCall` has begun
   */
  get session(): CallSession | null {
    return this._session;
  }

  get dispatcher(): CallActionDispatcher | null {
    return this._dispatcher;
  }

  /**
   * Place the call. One call per orchestrator; never retries the dial.
   */
  async placeCall(dialInfo: DialInfo): Promise<CallOutcome> {
    if (this._session) {
      throw new CallStateError('placeCall may only be invoked once per job', this._session.roomName);
    }

    const { dialer, membership, controller } = this.deps;
    const { calleeIdentity } = this.options;

    const session = new CallSession({
      roomName: membership.roomName,
      calleeIdentity,
      dialInfo,
      dialer,
    });
    this._session = session;

    const watchAbort = new AbortController();
    session.onEnd(async () => {
      watchAbort.abort();
    });
    session.onEnd(() => controller.close());
    if (this.deps.onCallEnded) {
      session.onEnd(this.deps.onCallEnded);
    }

    const dispatcher = new CallActionDispatcher({
      session,
      conversation: controller,
      dialer,
      membership,
      availability: this.deps.availability,
      trunkId: this.options.trunkId,
      transferIdentity: this.options.transferIdentity,
      ringingTimeoutSeconds: this.options.ringingTimeoutSeconds,
      transferScript: this.options.transferScript,
    });
    this._dispatcher = dispatcher;

    // Session start races the dial so the agent hears the callee's first words
    const startup = controller.start(
      buildInstructions(this.options.practiceName, dialInfo),
      dispatcher,
    );
    const startupError = startup.then(
      () => null,
      (error: unknown) => error,
    );

    logger.info(`📞 Dialing ${redactPhoneNumber(dialInfo.phoneNumber)}`, {
      roomName: session.roomName,
      calleeIdentity,
    });

    try {
      await dialer.createCall({
        roomName: session.roomName,
        trunkId: this.options.trunkId,
        phoneNumber: dialInfo.phoneNumber,
        participantIdentity: calleeIdentity,
        participantName: dialInfo.customerName,
        waitUntilAnswered: true,
        ringingTimeoutSeconds: this.options.ringingTimeoutSeconds,
      });
    } catch (error) {
      const dialError = SipDialError.from(error);
      logger.error('❌ Dial failed', {
        roomName: session.roomName,
        error: dialError.message,
        sipStatusCode: dialError.sipStatusCode,
        sipStatus: dialError.sipStatus,
      });

      let startError: unknown;
      try {
        startError = await withinBudget(startupError, this.options.answerTimeoutMs, 'Session start');
      } catch (error) {
        startError = error;
      }
      if (startError) {
        logger.error('Session start also failed', { error: describeError(startError) });
      }
      await session.end('dial_failed', { deleteRoom: true });
      return {
        kind: 'dial_failed',
        error: {
          message: dialError.message,
          sipStatusCode: dialError.sipStatusCode,
          sipStatus: dialError.sipStatus,
        },
      };
    }

    let participant: ParticipantLike;
    try {
      const budgetMs = this.options.answerTimeoutMs;
      const startError = await withinBudget(startupError, budgetMs, 'Session start');
      if (startError) throw startError;

      participant = await withinBudget(
        membership.waitForParticipant(calleeIdentity),
        budgetMs,
        'Callee join',
      );
      controller.setParticipant(participant.identity);
      session.bindCallee(participant.identity);
      logger.info('🟢 Callee bound', { roomName: session.roomName, identity: participant.identity });
    } catch (error) {
      // A half-established call cannot be resumed
      logger.error('Call setup failed after answer', {
        roomName: session.roomName,
        error: describeError(error),
      });
      await session.end('setup_failed', { deleteRoom: true });
      return { kind: 'setup_failed', message: describeError(error) };
    }

    const monitor = new CallStatusMonitor(session, { pollIntervalMs: this.options.pollIntervalMs });
    if (this.deps.onStatusChange) {
      monitor.onStatus(this.deps.onStatusChange);
    }

    const result = await monitor.watch(participant, {
      timeoutMs: this.options.answerTimeoutMs,
      signal: watchAbort.signal,
    });

    if (result.aborted) {
      const reason = session.endReason ?? 'worker_shutdown';
      logger.info('Call ended while waiting for answer', { roomName: session.roomName, reason });
      return { kind: 'ended', reason };
    }

    if (result.timedOut) {
      logger.info('⏱️ Session timed out, exiting job', {
        roomName: session.roomName,
        waitedMs: result.waitedMs,
        lastStatus: result.status,
      });
      await session.end('timeout', { deleteRoom: true });
      return { kind: 'timed_out', waitedMs: result.waitedMs };
    }

    if (result.status === CallStatus.HANGUP || result.status === CallStatus.FAILED) {
      logger.info('Callee hung up, exiting job', { roomName: session.roomName, status: result.status });
      await session.end('callee_hangup', { deleteRoom: true });
      return { kind: 'hung_up', status: result.status };
    }

    logger.info('✅ Callee picked up', { roomName: session.roomName });
    return { kind: 'connected', calleeIdentity: participant.identity };
  }

  /**
   * End the call from outside the state machine (worker shutdown)
   */
  async abort(): Promise<void> {
    await this._session?.end('worker_shutdown', { deleteRoom: true });
  }
}
