/**
 * Scheduling Tools
 *
 * Availability lookup and appointment confirmation.
 *
 * @module tool-handlers/scheduling-tools
 */

import { llm } from '@livekit/agents';
import { z } from 'zod';
import type { ActionResult, DispatchContext } from '../call-actions/index.js';
import type { ToolExecutionContext } from './types.js';

export const lookUpAvailabilityParameters = z.object({
    date: z.string().describe('The date of the appointment to check availability for'),
});

export const confirmAppointmentParameters = z.object({
    date: z.string().describe('The date of the appointment'),
    time: z.string().describe('The time of the appointment'),
});

export function lookUpAvailability(
    context: ToolExecutionContext,
    { date }: z.infer<typeof lookUpAvailabilityParameters>,
    run: DispatchContext,
): Promise<ActionResult> {
    return context.actions.dispatch({ type: 'look_up_availability', args: { date } }, run);
}

export function confirmAppointment(
    context: ToolExecutionContext,
    { date, time }: z.infer<typeof confirmAppointmentParameters>,
    run: DispatchContext,
): Promise<ActionResult> {
    return context.actions.dispatch({ type: 'confirm_appointment', args: { date, time } }, run);
}

export function createLookUpAvailabilityTool(context: ToolExecutionContext) {
    return llm.tool({
        description: 'Called when the user asks about alternative appointment availability.',
        parameters: lookUpAvailabilityParameters,
        execute: async (args, { ctx }) => lookUpAvailability(context, args, ctx),
    });
}

export function createConfirmAppointmentTool(context: ToolExecutionContext) {
    return llm.tool({
        description: 'Called when the user confirms their appointment on a specific date. Use this tool only when they are certain about the date and time.',
        parameters: confirmAppointmentParameters,
        execute: async (args, { ctx }) => confirmAppointment(context, args, ctx),
    });
}
