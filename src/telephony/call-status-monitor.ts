/**
 * Call Status Monitor - classify and watch the callee's SIP call status
 *
 * LiveKit SIP reports progress in the `sip.callStatus` attribute of the
 * SIP participant. The monitor polls that attribute on a short interval,
 * records every change on the CallSession and settles as soon as the call
 * is answered, gone, or the answer budget runs out.
 */

import { EventEmitter } from 'events';
import { getLogger } from '../core/logging.js';
import type { CallSession } from './call-session.js';
import { CALL_STATUS_ATTRIBUTE, CallStatus } from './types.js';
import type { ParticipantLike } from './types.js';

const logger = getLogger('telephony.monitor');

/**
 * Map the reported attribute bag to a call status.
 */
export function classifyCallStatus(attributes: Readonly<Record<string, string>>): CallStatus {
  const reported = attributes[CALL_STATUS_ATTRIBUTE]?.trim().toLowerCase();

  switch (reported) {
    case 'dialing':
    case 'ringing':
      return CallStatus.RINGING;
    case 'automation':
      // DTMF in the dialed number: extension or PIN being entered
      return CallStatus.AUTOMATION;
    case 'active':
      return CallStatus.ACTIVE;
    case 'hangup':
      return CallStatus.HANGUP;
    case 'failed':
    case 'error':
      return CallStatus.FAILED;
    default:
      return CallStatus.PENDING;
  }
}

/**
 * Statuses that end the wait for an answer
 */
export function endsAnswerWait(status: CallStatus): boolean {
  return status === CallStatus.ACTIVE || status === CallStatus.HANGUP || status === CallStatus.FAILED;
}

export interface StatusChange {
  previous: CallStatus;
  status: CallStatus;
  roomName: string;
}

export interface WatchOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

export interface WatchResult {
  status: CallStatus;
  timedOut: boolean;
  aborted: boolean;
  waitedMs: number;
}

export interface CallStatusMonitorOptions {
  pollIntervalMs?: number;
}

export class CallStatusMonitor extends EventEmitter {
  private session: CallSession;
  private pollIntervalMs: number;
  private activeWatch = false;

  constructor(session: CallSession, options: CallStatusMonitorOptions = {}) {
    super();
    this.session = session;
    this.pollIntervalMs = options.pollIntervalMs ?? 100;
  }

  /**
   * True while a watch has live timers
   */
  get isWatching(): boolean {
    return this.activeWatch;
  }

  onStatus(listener: (change: StatusChange) => void): this {
    return this.on('status', listener);
  }

  /**
   * Poll the participant until the call is answered, hung up, failed,
   * aborted, or `timeoutMs` elapses. All timers are cleared on settle.
   */
  watch(participant: ParticipantLike, options: WatchOptions): Promise<WatchResult> {
    if (this.activeWatch) {
      return Promise.reject(new Error('Call status monitor is already watching'));
    }

    const startedAt = Date.now();
    let lastStatus = this.session.status;

    return new Promise<WatchResult>((resolve) => {
      let interval: NodeJS.Timeout | undefined;
      let timeout: NodeJS.Timeout | undefined;

      const settle = (timedOut: boolean, aborted: boolean) => {
        if (!this.activeWatch) return;
        this.activeWatch = false;
        clearInterval(interval);
        clearTimeout(timeout);
        options.signal?.removeEventListener('abort', onAbort);
        resolve({ status: lastStatus, timedOut, aborted, waitedMs: Date.now() - startedAt });
      };

      const onAbort = () => settle(false, true);

      const poll = () => {
        const status = classifyCallStatus(participant.attributes);
        const previous = this.session.status;
        const changed = this.session.observeStatus(status);
        // Regressions are dropped by the session, so report what it holds
        lastStatus = this.session.status;

        if (changed) {
          if (status === CallStatus.AUTOMATION) {
            logger.info('Callee is in automation (DTMF dialing)', { roomName: this.session.roomName });
          } else {
            logger.info('Call status changed', { roomName: this.session.roomName, previous, status });
          }
          this.emit('status', { previous, status, roomName: this.session.roomName } satisfies StatusChange);
        }

        if (endsAnswerWait(lastStatus)) {
          settle(false, false);
        }
      };

      if (options.signal?.aborted) {
        resolve({ status: lastStatus, timedOut: false, aborted: true, waitedMs: 0 });
        return;
      }

      this.activeWatch = true;
      options.signal?.addEventListener('abort', onAbort, { once: true });
      timeout = setTimeout(() => {
        logger.info('Answer wait timed out', {
          roomName: this.session.roomName,
          timeoutMs: options.timeoutMs,
          lastStatus,
        });
        settle(true, false);
      }, options.timeoutMs);

      poll();
      if (this.activeWatch) {
        interval = setInterval(poll, this.pollIntervalMs);
      }
    });
  }
}
