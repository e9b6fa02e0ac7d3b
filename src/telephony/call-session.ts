/**
 * Call Session - per-call state record
 *
 * One CallSession exists per job/room. It is created before dialing and
 * torn down exactly once, by whichever terminal path gets there first.
 */

import { getLogger, describeError, redactPhoneNumber } from '../core/logging.js';
import { CallStateError } from '../core/exceptions.js';
import { CallStatus } from './types.js';
import type { CallEndReason, DialInfo, DialingClient } from './types.js';

const logger = getLogger('telephony.session');

const STATUS_RANK: Record<CallStatus, number> = {
  [CallStatus.PENDING]: 0,
  [CallStatus.RINGING]: 1,
  [CallStatus.AUTOMATION]: 2,
  [CallStatus.ACTIVE]: 2,
  [CallStatus.HANGUP]: 3,
  [CallStatus.FAILED]: 3,
};

export function isTerminalStatus(status: CallStatus): boolean {
  return status === CallStatus.HANGUP || status === CallStatus.FAILED;
}

export type TeardownHook = (reason: CallEndReason) => Promise<void>;

export interface CallSessionOptions {
  roomName: string;
  calleeIdentity: string;
  dialInfo: DialInfo;
  dialer: DialingClient;
  now?: () => number;
}

export interface EndOptions {
  /** Delete the room, disconnecting everyone still in it */
  deleteRoom: boolean;
  /** Resolve once the room is released, leaving teardown hooks running */
  detachHooks?: boolean;
}

export class CallSession {
  readonly roomName: string;
  readonly calleeIdentity: string;
  readonly dialInfo: Readonly<DialInfo>;
  readonly startedAt: number;

  private dialer: DialingClient;
  private now: () => number;
  private _status: CallStatus = CallStatus.PENDING;
  private bound = false;
  private endPromise: Promise<void> | null = null;
  private _endReason: CallEndReason | null = null;
  private _actions: string[] = [];
  private hooks: TeardownHook[] = [];

  constructor(options: CallSessionOptions) {
    this.roomName = options.roomName;
    this.calleeIdentity = options.calleeIdentity;
    this.dialInfo = Object.freeze({ ...options.dialInfo });
    this.dialer = options.dialer;
    this.now = options.now ?? Date.now;
    this.startedAt = this.now();
  }

  get status(): CallStatus {
    return this._status;
  }

  get isBound(): boolean {
    return this.bound;
  }

  get ended(): boolean {
    return this.endPromise !== null;
  }

  get endReason(): CallEndReason | null {
    return this._endReason;
  }

  get actions(): readonly string[] {
    return this._actions;
  }

  /**
   * True once the callee is gone or the session has been torn down
   */
  isTerminated(): boolean {
    return this.ended || isTerminalStatus(this._status);
  }

  /**
   * Record a status reported by the SIP participant.
   * Returns true when the stored status changed.
   */
  observeStatus(status: CallStatus): boolean {
    const current = this._status;
    if (status === current) return false;

    if (isTerminalStatus(current) || STATUS_RANK[status] < STATUS_RANK[current]) {
      logger.debug('Ignoring call status regression', {
        roomName: this.roomName,
        current,
        reported: status,
      });
      return false;
    }

    this._status = status;
    return true;
  }

  /**
   * Bind the conversation to the callee participant. Happens once.
   */
  bindCallee(identity: string): void {
    if (this.bound) {
      throw new CallStateError(`Callee already bound for room ${this.roomName}`, this.roomName);
    }
    if (identity !== this.calleeIdentity) {
      throw new CallStateError(
        `Participant ${identity} is not the callee (${this.calleeIdentity})`,
        this.roomName,
      );
    }
    this.bound = true;
  }

  /**
   * Fail fast when a callee-bound action runs before binding
   */
  requireBound(action: string): void {
    if (!this.bound) {
      throw new CallStateError(`${action} invoked before the callee was bound`, this.roomName);
    }
  }

  recordAction(name: string): void {
    this._actions.push(name);
  }

  /**
   * Register work to run once when the session ends
   * (closing the agent session, shutting the job down)
   */
  onEnd(hook: TeardownHook): void {
    this.hooks.push(hook);
  }

  /**
   * Tear the call down. Only the first call does anything; later calls
   * get the full teardown promise. Never rejects: teardown failures are logged.
   */
  end(reason: CallEndReason, options: EndOptions): Promise<void> {
    if (this.endPromise) {
      logger.debug('Call session already ending', {
        roomName: this.roomName,
        reason,
        firstReason: this._endReason,
      });
      return this.endPromise;
    }

    this._endReason = reason;
    const released = this.releaseRoom(reason, options);
    this.endPromise = released.then(() => this.runHooks(reason));
    return options.detachHooks ? released : this.endPromise;
  }

  private async releaseRoom(reason: CallEndReason, options: EndOptions): Promise<void> {
    logger.info('Ending call', { roomName: this.roomName, reason, deleteRoom: options.deleteRoom });

    if (options.deleteRoom) {
      try {
        await this.dialer.deleteRoom(this.roomName);
      } catch (error) {
        logger.error('Failed to delete room', {
          roomName: this.roomName,
          error: describeError(error),
        });
      }
    }
  }

  private async runHooks(reason: CallEndReason): Promise<void> {
    for (const hook of this.hooks) {
      try {
        await hook(reason);
      } catch (error) {
        logger.error('Call teardown hook failed', {
          roomName: this.roomName,
          reason,
          error: describeError(error),
        });
      }
    }

    logger.info('📊 Call summary', {
      roomName: this.roomName,
      phoneNumber: redactPhoneNumber(this.dialInfo.phoneNumber),
      reason,
      status: this._status,
      durationMs: this.now() - this.startedAt,
      actions: this._actions,
    });
  }
}
