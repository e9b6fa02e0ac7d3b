/**
 * Session Controller
 *
 * Owns the single conversational pipeline of a call:
 * starts it once, binds it to the callee, tracks the utterance that is
 * currently playing and closes it once.
 * @module agent/session-controller
 */

import { getLogger, describeError } from '../core/logging.js';
import { CallStateError } from '../core/exceptions.js';
import type { ActionDispatch } from '../services/call-actions/index.js';

const logger = getLogger('agent.session');

/**
 * One unit of synthesized speech
 */
export interface Utterance {
  readonly id: string;
  /** Resolves once the audio has finished playing (or was interrupted) */
  waitForPlayout(): Promise<void>;
}

export interface PipelineStartOptions {
  instructions: string;
  /** Only audio from this participant is listened to */
  participantIdentity: string;
  /** Target of the agent's tool calls */
  actions: ActionDispatch;
}

/**
 * VAD -> turn detection -> STT -> LLM -> TTS, bound to a room
 */
export interface SpeechPipeline {
  start(options: PipelineStartOptions): Promise<void>;
  generateReply(instructions: string): Utterance;
  onUtterance(listener: (utterance: Utterance) => void): void;
  close(): Promise<void>;
}

export interface SessionControllerOptions {
  participantIdentity: string;
}

export class SessionController {
  private pipeline: SpeechPipeline;
  private participantIdentity: string;
  private startPromise: Promise<void> | null = null;
  private startCompleted = false;
  private boundIdentity: string | null = null;
  private current: Utterance | null = null;
  private closePromise: Promise<void> | null = null;

  constructor(pipeline: SpeechPipeline, options: SessionControllerOptions) {
    this.pipeline = pipeline;
    this.participantIdentity = options.participantIdentity;
    this.pipeline.onUtterance((utterance) => this.track(utterance));
  }

  get started(): boolean {
    return this.startCompleted;
  }

  get closed(): boolean {
    return this.closePromise !== null;
  }

  /**
   * Start the pipeline. Audio from the callee is captured from this call on,
   * so it must be issued no later than the dial request.
   */
  start(instructions: string, actions: ActionDispatch): Promise<void> {
    if (!this.startPromise) {
      logger.info('Starting conversational session', { participantIdentity: this.participantIdentity });
      this.startPromise = this.pipeline
        .start({ instructions, participantIdentity: this.participantIdentity, actions })
        .then(() => {
          this.startCompleted = true;
          logger.info('✅ Conversational session started');
        });
    }
    return this.startPromise;
  }

  /**
   * Bind the running session to the callee that just joined
   */
  setParticipant(identity: string): void {
    if (!this.startCompleted) {
      throw new CallStateError('Cannot bind a participant before the session has started');
    }
    if (this.boundIdentity !== null) {
      throw new CallStateError(`Session already bound to ${this.boundIdentity}`);
    }
    if (identity !== this.participantIdentity) {
      throw new CallStateError(
        `Session listens to ${this.participantIdentity}, cannot bind ${identity}`,
      );
    }
    this.boundIdentity = identity;
    logger.info('Session bound to participant', { identity });
  }

  isBound(): boolean {
    return this.boundIdentity !== null;
  }

  currentUtterance(): Utterance | null {
    return this.current;
  }

  /**
   * Speak a scripted line outside normal turn-taking and wait until
   * it has finished playing
   */
  async generateReply(instructions: string): Promise<void> {
    const utterance = this.pipeline.generateReply(instructions);
    this.track(utterance);
    await utterance.waitForPlayout();
  }

  /**
   * Wait for the in-flight utterance, if any
   */
  async drain(): Promise<void> {
    const utterance = this.current;
    if (utterance) {
      logger.debug('Draining current utterance', { utteranceId: utterance.id });
      await utterance.waitForPlayout();
    }
  }

  close(): Promise<void> {
    if (!this.closePromise) {
      this.closePromise = this.pipeline.close().then(() => {
        this.current = null;
        logger.info('Conversational session closed');
      });
    }
    return this.closePromise;
  }

  private track(utterance: Utterance): void {
    if (this.current === utterance) return;
    this.current = utterance;

    const clear = () => {
      if (this.current === utterance) this.current = null;
    };
    void utterance.waitForPlayout().then(clear, (error: unknown) => {
      logger.debug('Utterance ended with error', { utteranceId: utterance.id, error: describeError(error) });
      clear();
    });
  }
}
