/**
 * LiveKit Speech Pipeline
 *
 * `SpeechPipeline` backed by a `voice.AgentSession`:
 * Silero VAD, multilingual turn detection, OpenAI STT/LLM/TTS and
 * background voice cancellation on the callee's audio.
 * @module agent/livekit-pipeline
 */

import { voice } from '@livekit/agents';
import { AsyncResource } from 'node:async_hooks';
import * as livekit from '@livekit/agents-plugin-livekit';
import { BackgroundVoiceCancellation } from '@livekit/noise-cancellation-node';
import { describeError, getLogger } from '../core/logging.js';
import { buildToolContext } from '../services/tool-handlers/index.js';
import { CONNECTION_OPTIONS, VOICE_OPTIONS } from './config.js';
import type { PipelineStartOptions, SpeechPipeline, Utterance } from './session-controller.js';
import type { PipelineResources } from './types.js';
import { OutboundAssistant } from './voice-assistant.js';

const logger = getLogger('agent.pipeline');

export class LiveKitSpeechPipeline implements SpeechPipeline {
  private resources: PipelineResources;
  private session: voice.AgentSession;
  private utteranceListeners: Array<(utterance: Utterance) => void> = [];
  // Runs outside any tool call's context: a close reached from a tool must
  // not count as that tool waiting on its own speech
  private closeSession: () => Promise<void>;

  constructor(resources: PipelineResources) {
    this.resources = resources;
    this.session = new voice.AgentSession({
      vad: resources.vad,
      stt: resources.plugins.stt,
      llm: resources.plugins.llm,
      tts: resources.plugins.tts,
      turnDetection: new livekit.turnDetector.MultilingualModel(),
      voiceOptions: VOICE_OPTIONS,
      connOptions: CONNECTION_OPTIONS,
    });
    this.closeSession = AsyncResource.bind(() => this.session.close());
    this.setupSessionEvents();
  }

  private get roomName(): string | undefined {
    return this.resources.room.name;
  }

  async start(options: PipelineStartOptions): Promise<void> {
    const tools = buildToolContext({
      roomName: this.roomName ?? 'unknown-room',
      actions: options.actions,
    });
    const agent = new OutboundAssistant(options.instructions, tools);

    await this.session.start({
      agent,
      room: this.resources.room,
      inputOptions: {
        participantIdentity: options.participantIdentity,
        noiseCancellation: BackgroundVoiceCancellation(),
      },
    });
    logger.info('✅ Voice session active', {
      roomName: this.roomName,
      participantIdentity: options.participantIdentity,
    });
  }

  generateReply(instructions: string): Utterance {
    return this.session.generateReply({ instructions });
  }

  onUtterance(listener: (utterance: Utterance) => void): void {
    this.utteranceListeners.push(listener);
  }

  async close(): Promise<void> {
    await this.closeSession();
  }

  private setupSessionEvents(): void {
    const roomName = this.roomName;

    this.session.on(voice.AgentSessionEventTypes.SpeechCreated, (ev) => {
      logger.debug('Speech created', { roomName, speechId: ev.speechHandle.id, source: ev.source });
      for (const listener of this.utteranceListeners) {
        listener(ev.speechHandle);
      }
    });

    this.session.on(voice.AgentSessionEventTypes.UserInputTranscribed, (ev) => {
      if (ev.isFinal && ev.transcript) {
        logger.debug('Callee said', { roomName, transcript: ev.transcript });
      }
    });

    this.session.on(voice.AgentSessionEventTypes.AgentStateChanged, (ev) => {
      logger.debug('Agent state changed', { roomName, oldState: ev.oldState, newState: ev.newState });
    });

    this.session.on(voice.AgentSessionEventTypes.FunctionToolsExecuted, (ev) => {
      const toolNames = ev.functionCalls.map(call => call.name);
      if (toolNames.length > 0) {
        logger.info('Tools executed', { roomName, functions: toolNames });
      }
    });

    this.session.on(voice.AgentSessionEventTypes.Error, (ev) => {
      logger.error('Session error', { roomName, error: describeError(ev.error) });
    });
  }
}
