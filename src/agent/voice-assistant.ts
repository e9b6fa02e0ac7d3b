/**
 * Outbound Assistant
 *
 * The `voice.Agent` that speaks for the practice on an outbound call.
 * @module agent/voice-assistant
 */

import { voice, llm } from '@livekit/agents';
import { getLogger } from '../core/logging.js';

const logger = getLogger('agent.assistant');

export class OutboundAssistant extends voice.Agent {
  private toolNames: string[];

  constructor(instructions: string, tools: llm.ToolContext) {
    super({ instructions, tools });
    this.toolNames = Object.keys(tools);
  }

  // No greeting on enter: the callee speaks first when they pick up
  async onEnter(): Promise<void> {
    logger.info('Outbound assistant activated', { tools: this.toolNames });
  }

  async onExit(): Promise<void> {
    logger.info('Outbound assistant deactivated');
  }
}
