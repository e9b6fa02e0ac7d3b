/**
 * Outbound Caller Agent - Production Entry Point
 *
 * One job places one outbound call: the dial info arrives as job metadata,
 * the agent dials the callee into the job's room, talks to them and ends
 * the job when the call is over.
 *
 * @module agent
 */

import {
  type JobContext,
  type JobProcess,
  AutoSubscribe,
  WorkerOptions,
  cli,
  defineAgent,
} from '@livekit/agents';
import * as silero from '@livekit/agents-plugin-silero';
import { fileURLToPath } from 'node:url';

// Core
import { config } from '../core/config.js';
import { describeError, logger, redactPhoneNumber } from '../core/logging.js';
import { onShutdown } from '../core/shutdown.js';

// Plugins
import { createPluginsFromEnv } from '../plugins/index.js';

// Services
import { StaticAvailabilityProvider } from '../services/call-actions/index.js';

// Telephony
import { CallOrchestrator, LiveKitDialer, requireOutboundTrunkId } from '../telephony/index.js';

// Agent modules
import { VAD_CONFIG } from './config.js';
import { parseDialInfo } from './job-metadata.js';
import { LiveKitSpeechPipeline } from './livekit-pipeline.js';
import { JobRoomMembership } from './room-utils.js';
import { SessionController } from './session-controller.js';

// ============================================================================
// AGENT DEFINITION
// ============================================================================

async function loadVad(proc: JobProcess): Promise<silero.VAD> {
  const preloaded = proc.userData.sileroVad;
  if (preloaded instanceof silero.VAD) {
    return preloaded;
  }
  logger.warning('Silero VAD was not prewarmed, loading now');
  return silero.VAD.load(VAD_CONFIG);
}

export default defineAgent({
  prewarm: async (proc: JobProcess) => {
    try {
      proc.userData.sileroVad = await silero.VAD.load(VAD_CONFIG);
      logger.info('✅ Agent ready - VAD initialized');
    } catch (error) {
      logger.error('❌ Failed to load Silero VAD', { error: describeError(error) });
      throw error;
    }
  },

  entry: async (ctx: JobContext) => {
    const dialInfo = parseDialInfo(ctx.job.metadata);
    const trunkId = requireOutboundTrunkId(config.telephony);

    await ctx.connect(undefined, AutoSubscribe.AUDIO_ONLY);

    const membership = new JobRoomMembership(ctx);
    logger.info('📞 Outbound call job started', {
      roomName: membership.roomName,
      phoneNumber: redactPhoneNumber(dialInfo.phoneNumber),
    });

    const pipeline = new LiveKitSpeechPipeline({
      room: ctx.room,
      vad: await loadVad(ctx.proc),
      plugins: createPluginsFromEnv(),
    });
    const controller = new SessionController(pipeline, {
      participantIdentity: config.telephony.calleeIdentity,
    });

    const orchestrator = new CallOrchestrator(
      {
        dialer: new LiveKitDialer(config.livekit),
        membership,
        controller,
        availability: new StaticAvailabilityProvider(config.scheduling.availableTimes),
        onCallEnded: async (reason) => {
          ctx.shutdown(reason);
        },
      },
      {
        trunkId,
        practiceName: config.agent.practiceName,
        calleeIdentity: config.telephony.calleeIdentity,
        transferIdentity: config.telephony.transferIdentity,
        answerTimeoutMs: config.telephony.answerTimeoutMs,
        ringingTimeoutSeconds: config.telephony.ringingTimeoutSeconds,
        pollIntervalMs: config.telephony.pollIntervalMs,
      },
    );

    // Worker termination still hangs up on the callee
    const unregister = onShutdown(() => orchestrator.abort());
    ctx.addShutdownCallback(async () => {
      unregister();
      await orchestrator.abort();
    });

    const outcome = await orchestrator.placeCall(dialInfo);
    logger.info('Call placement finished', { roomName: membership.roomName, outcome: outcome.kind });
  },
});

// Jobs are dispatched explicitly by agent name
cli.runApp(new WorkerOptions({
  agent: fileURLToPath(import.meta.url),
  agentName: config.agent.name,
}));
