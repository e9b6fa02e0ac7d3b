/**
 * Agent Configuration Constants
 *
 * Voice pipeline tuning for the outbound caller.
 * @module agent/config
 */

/**
 * Voice Activity Detection (VAD) settings - Silero VAD
 */
export const VAD_CONFIG = {
  minSilenceDuration: 0.4,
  minSpeechDuration: 0.1,
  activationThreshold: 0.5,
  prefixPaddingDuration: 0.2,
} as const;

/**
 * Voice session options for natural conversation flow
 *
 * Phone audio: interruptions stay on so the callee can barge in on the
 * agent, and preemptive generation keeps the first reply fast.
 */
export const VOICE_OPTIONS = {
  preemptiveGeneration: true,
  maxToolSteps: 5,
  allowInterruptions: true,
  minEndpointingDelay: 0.5,
  maxEndpointingDelay: 1.5,
  minInterruptionDuration: 0.3,
  minInterruptionWords: 1,
} as const;

/**
 * Connection retry settings for reliability
 */
export const CONNECTION_OPTIONS = {
  llmConnOptions: { maxRetry: 3, retryIntervalMs: 2000, timeoutMs: 60000 },
  ttsConnOptions: { maxRetry: 3, retryIntervalMs: 1000, timeoutMs: 30000 },
  sttConnOptions: { maxRetry: 3, retryIntervalMs: 1000, timeoutMs: 30000 },
} as const;
