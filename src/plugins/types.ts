/**
 * Plugin Type Definitions
 *
 * @module plugins/types
 */

import type { llm, stt, tts } from '@livekit/agents';

/**
 * Large Language Model plugin configuration
 */
export interface LLMConfig {
  /** Model identifier (e.g., 'gpt-4o-mini') */
  model: string;
  /** Sampling temperature */
  temperature?: number;
}

/**
 * Plugin factory configuration
 */
export interface PluginFactoryConfig {
  apiKey?: string;
  llm: LLMConfig;
}

/**
 * Bundle of speech plugins handed to the agent session
 */
export interface PluginBundle {
  stt: stt.STT;
  llm: llm.LLM;
  tts: tts.TTS;
}
