/**
 * Call Management Tools
 *
 * Tools for ending, transferring and abandoning the call.
 *
 * @module tool-handlers/call-tools
 */

import { llm } from '@livekit/agents';
import { z } from 'zod';
import { logger } from '../../core/logging.js';
import type { ActionResult, DispatchContext } from '../call-actions/index.js';
import type { ToolExecutionContext } from './types.js';

/**
 * Lets the speech that issued the call finish, then deletes the room
 */
export async function endCall(context: ToolExecutionContext, run: DispatchContext): Promise<ActionResult> {
    logger.info('🔚 End call tool invoked', { roomName: context.roomName });
    return context.actions.dispatch({ type: 'end_call', args: {} }, run);
}

export async function transferCall(context: ToolExecutionContext, run: DispatchContext): Promise<ActionResult> {
    logger.info('Transfer call requested', { roomName: context.roomName });
    return context.actions.dispatch({ type: 'transfer_call', args: {} }, run);
}

export async function detectedAnsweringMachine(
    context: ToolExecutionContext,
    run: DispatchContext,
): Promise<ActionResult> {
    logger.info('Answering machine reported by agent', { roomName: context.roomName });
    return context.actions.dispatch({ type: 'detected_answering_machine', args: {} }, run);
}

export function createEndCallTool(context: ToolExecutionContext) {
    return llm.tool({
        description: 'Called when the user wants to end the call.',
        parameters: z.object({}),
        execute: async (_args, { ctx }) => endCall(context, ctx),
    });
}

/**
 * Hand the callee over to a human agent
 */
export function createTransferCallTool(context: ToolExecutionContext) {
    return llm.tool({
        description: 'Transfer the call to a human agent. Called after confirming with the user that they want to be transferred.',
        parameters: z.object({}),
        execute: async (_args, { ctx }) => transferCall(context, ctx),
    });
}

/**
 * Hang up on a voicemail greeting
 */
export function createAnsweringMachineTool(context: ToolExecutionContext) {
    return llm.tool({
        description: 'Called when the call reaches voicemail. Use this tool AFTER you hear the voicemail greeting.',
        parameters: z.object({}),
        execute: async (_args, { ctx }) => detectedAnsweringMachine(context, ctx),
    });
}
