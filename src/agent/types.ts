/**
 * Agent Type Definitions
 * @module agent/types
 */

import type { Room } from '@livekit/rtc-node';
import type * as silero from '@livekit/agents-plugin-silero';
import type { PluginBundle } from '../plugins/index.js';

/**
 * Everything the speech pipeline needs from the job
 */
export interface PipelineResources {
  room: Room;
  vad: silero.VAD;
  plugins: PluginBundle;
}
