/**
 * Tool Handler Types
 *
 * Type definitions for tool handlers.
 *
 * @module tool-handlers/types
 */

import type { ActionDispatch } from '../call-actions/index.js';

/**
 * Tool execution context passed to handlers
 */
export interface ToolExecutionContext {
    roomName: string;
    /** Every tool forwards to the call's action dispatcher */
    actions: ActionDispatch;
}
