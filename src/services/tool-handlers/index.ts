/**
 * Tool Handlers Module
 *
 * LiveKit tool wrappers around the call action dispatcher.
 * These handlers execute when the LLM decides to call a function.
 *
 * @module tool-handlers
 */

export type { ToolExecutionContext } from './types.js';

export {
    endCall,
    transferCall,
    detectedAnsweringMachine,
    createEndCallTool,
    createTransferCallTool,
    createAnsweringMachineTool,
} from './calls.js';

export {
    lookUpAvailability,
    confirmAppointment,
    lookUpAvailabilityParameters,
    confirmAppointmentParameters,
    createLookUpAvailabilityTool,
    createConfirmAppointmentTool,
} from './scheduling.js';

export { buildToolContext } from './context.js';
