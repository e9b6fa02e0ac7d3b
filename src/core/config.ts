/**
 * Centralized configuration management.
 *
 * Single source of truth for all configuration values,
 * loaded from environment variables with sensible defaults.
 *
 * Usage:
 *   import { config } from './core/config.js';
 *   const trunkId = config.telephony.outboundTrunkId;
 */

import dotenv from 'dotenv';
import { z } from 'zod';
import path from 'path';
import fs from 'fs';
import { fileURLToPath } from 'url';
import { dirname } from 'path';
import { ConfigurationError } from './exceptions.js';

// Load environment variables, .env.local first (local development only)
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

const projectRoot = path.resolve(__dirname, '..', '..');

/**
 * Load `.env.local` then `.env` from the first directory that has either.
 * The compiled build sits one level deeper under dist/, so the working
 * directory is tried after the source root.
 * Returns the files loaded.
 */
export function loadEnvFiles(roots: string[] = [projectRoot, process.cwd()]): string[] {
  for (const root of new Set(roots)) {
    const files = ['.env.local', '.env']
      .map(file => path.join(root, file))
      .filter(file => fs.existsSync(file));
    if (files.length > 0) {
      for (const file of files) {
        dotenv.config({ path: file });
      }
      return files;
    }
  }
  return [];
}

loadEnvFiles();

/**
 * LiveKit service configuration schema
 */
const livekitConfigSchema = z.object({
  url: z.string().url('LIVEKIT_URL must be a valid URL'),
  apiKey: z.string().min(1, 'LIVEKIT_API_KEY is required'),
  apiSecret: z.string().min(1, 'LIVEKIT_API_SECRET is required'),
});

/**
 * Outbound telephony settings
 */
const telephonyConfigSchema = z.object({
  outboundTrunkId: z.string().optional(),
  answerTimeoutMs: z.number().int().positive().default(15000),
  ringingTimeoutSeconds: z.number().int().positive().default(30),
  pollIntervalMs: z.number().int().positive().default(100),
  calleeIdentity: z.string().min(1).default('phone_user'),
  transferIdentity: z.string().min(1).default('transfer_target'),
});

/**
 * Agent worker settings
 */
const agentConfigSchema = z.object({
  name: z.string().min(1).default('outbound-caller'),
  practiceName: z.string().min(1).default('a dental practice'),
});

/**
 * Speech pipeline model settings
 */
const speechConfigSchema = z.object({
  llmModel: z.string().min(1).default('gpt-4o-mini'),
  llmTemperature: z.number().min(0).max(2).default(0.3),
});

const schedulingConfigSchema = z.object({
  availableTimes: z.array(z.string().min(1)).min(1),
});

/**
 * Main application configuration schema
 */
const appConfigSchema = z.object({
  livekit: livekitConfigSchema,
  telephony: telephonyConfigSchema,
  agent: agentConfigSchema,
  scheduling: schedulingConfigSchema,
  speech: speechConfigSchema,
  openaiApiKey: z.string().optional(),
  isDevelopment: z.boolean(),
  logLevel: z.enum(['DEBUG', 'INFO', 'WARNING', 'ERROR']).default('INFO'),
});

function parseOptionalInt(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  return parseInt(value, 10);
}

function parseOptionalFloat(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  return parseFloat(value);
}

function parseList(value: string | undefined, fallback: string[]): string[] {
  if (!value) return fallback;
  return value.split(',').map(item => item.trim()).filter(Boolean);
}

/**
 * Parse and validate configuration from environment variables
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const rawConfig = {
    livekit: {
      url: env.LIVEKIT_URL || '',
      apiKey: env.LIVEKIT_API_KEY || '',
      apiSecret: env.LIVEKIT_API_SECRET || '',
    },
    telephony: {
      outboundTrunkId: env.SIP_OUTBOUND_TRUNK_ID || undefined,
      answerTimeoutMs: parseOptionalInt(env.CALL_ANSWER_TIMEOUT_MS),
      ringingTimeoutSeconds: parseOptionalInt(env.CALL_RINGING_TIMEOUT_SECONDS),
      pollIntervalMs: parseOptionalInt(env.CALL_STATUS_POLL_INTERVAL_MS),
      calleeIdentity: env.CALLEE_IDENTITY || undefined,
      transferIdentity: env.TRANSFER_IDENTITY || undefined,
    },
    agent: {
      name: env.AGENT_NAME || undefined,
      practiceName: env.PRACTICE_NAME || undefined,
    },
    scheduling: {
      availableTimes: parseList(env.AVAILABLE_TIMES, ['1pm', '2pm', '3pm']),
    },
    speech: {
      llmModel: env.LLM_MODEL || undefined,
      llmTemperature: parseOptionalFloat(env.LLM_TEMPERATURE),
    },
    openaiApiKey: env.OPENAI_API_KEY || undefined,
    isDevelopment: env.NODE_ENV !== 'production',
    logLevel: (env.LOG_LEVEL || 'INFO').toUpperCase(),
  };

  const result = appConfigSchema.safeParse(rawConfig);
  if (!result.success) {
    console.error('\n' + '='.repeat(60));
    console.error('❌ Configuration validation failed!');
    console.error('='.repeat(60));
    result.error.errors.forEach((err: z.ZodIssue) => {
      console.error(`  ${err.path.join('.')}: ${err.message}`);
    });
    console.error('='.repeat(60) + '\n');
    throw new ConfigurationError('Invalid configuration. Please check your environment variables.');
  }
  return result.data;
}

/**
 * Type exports for configuration
 */
export type LivekitConfig = z.infer<typeof livekitConfigSchema>;
export type TelephonyConfig = z.infer<typeof telephonyConfigSchema>;
export type AgentWorkerConfig = z.infer<typeof agentConfigSchema>;
export type SchedulingConfig = z.infer<typeof schedulingConfigSchema>;
export type SpeechConfig = z.infer<typeof speechConfigSchema>;
export type AppConfig = z.infer<typeof appConfigSchema>;

/**
 * Validated application configuration
 */
export const config = loadConfig();
