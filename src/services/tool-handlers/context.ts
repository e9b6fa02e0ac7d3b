/**
 * Tool Context Builder
 *
 * Builds the tool context for the outbound caller agent.
 *
 * @module tool-handlers/tool-context
 */

import type { llm } from '@livekit/agents';
import { logger } from '../../core/logging.js';
import type { ToolExecutionContext } from './types.js';
import { createAnsweringMachineTool, createEndCallTool, createTransferCallTool } from './calls.js';
import { createConfirmAppointmentTool, createLookUpAvailabilityTool } from './scheduling.js';

/**
 * One tool per call action, keyed by the action name the LLM sees
 */
export function buildToolContext(executionContext: ToolExecutionContext): llm.ToolContext {
    const toolContext: llm.ToolContext = {
        end_call: createEndCallTool(executionContext),
        transfer_call: createTransferCallTool(executionContext),
        look_up_availability: createLookUpAvailabilityTool(executionContext),
        confirm_appointment: createConfirmAppointmentTool(executionContext),
        detected_answering_machine: createAnsweringMachineTool(executionContext),
    };

    logger.debug('🔧 Available tools for agent', {
        roomName: executionContext.roomName,
        toolNames: Object.keys(toolContext),
    });

    return toolContext;
}
