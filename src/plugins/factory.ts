/**
 * Plugin Factory
 *
 * Creates the STT, LLM and TTS plugin instances for a call.
 *
 * Usage:
 * ```typescript
 * const plugins = createPlugins({
 *   apiKey: config.openaiApiKey,
 *   llm: { model: 'gpt-4o-mini', temperature: 0.3 },
 * });
 * ```
 *
 * @module plugins/factory
 */

import * as openai from '@livekit/agents-plugin-openai';
import { ConfigurationError } from '../core/exceptions.js';
import { config } from '../core/config.js';
import { getLogger } from '../core/logging.js';
import type { LLMConfig, PluginBundle, PluginFactoryConfig } from './types.js';

const logger = getLogger('plugins');

function requireApiKey(apiKey: string | undefined): string {
  if (!apiKey) {
    logger.error('OpenAI API key not configured', {
      hint: 'Set OPENAI_API_KEY environment variable',
    });
    throw new ConfigurationError('OpenAI API key not configured. Please set OPENAI_API_KEY environment variable.');
  }
  return apiKey;
}

function createLLM(apiKey: string, llmConfig: LLMConfig): openai.LLM {
  const llmInstance = new openai.LLM({
    apiKey,
    model: llmConfig.model,
    temperature: llmConfig.temperature,
  });

  logger.info('✅ OpenAI LLM initialized', {
    model: llmConfig.model,
    temperature: llmConfig.temperature,
  });

  return llmInstance;
}

/**
 * Create all plugins based on configuration
 */
export function createPlugins(factoryConfig: PluginFactoryConfig): PluginBundle {
  const apiKey = requireApiKey(factoryConfig.apiKey);

  return {
    stt: new openai.STT({ apiKey }),
    llm: createLLM(apiKey, factoryConfig.llm),
    tts: new openai.TTS({ apiKey }),
  };
}

/**
 * Create plugins from the environment configuration
 */
export function createPluginsFromEnv(): PluginBundle {
  return createPlugins({
    apiKey: config.openaiApiKey,
    llm: {
      model: config.speech.llmModel,
      temperature: config.speech.llmTemperature,
    },
  });
}
