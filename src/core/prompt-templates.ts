/**
 * Prompt Templates
 *
 * Instructions for the outbound scheduling assistant, composed per call
 * from the practice name and the dial info. Nothing here is module state:
 * the composed string is handed to the orchestrator for each call.
 */

import type { DialInfo } from '../telephony/types.js';

// ============================================================================
// PROMPT SECTION TEMPLATES
// ============================================================================

/**
 * Role of the agent on the call
 */
export function roleSection(practiceName: string): string {
  return `You are a scheduling assistant for ${practiceName}. Your interface with the user will be voice.
You are on an outbound call with a patient who has an upcoming appointment. Your goal is to confirm the appointment details.`;
}

/**
 * When to use each tool
 */
export const TOOL_USAGE_SECTION = `TOOL RULES:
- Use 'look_up_availability' when the patient wants to move the appointment, then 'confirm_appointment' once they pick a time.
- Use 'transfer_call' only when the patient asks to speak with a person, and only after confirming they want to be transferred.
- Use 'detected_answering_machine' as soon as you hear a voicemail greeting, before saying anything else.
- Use 'end_call' when the patient wants to end the call, after saying goodbye.`;

/**
 * Voice conversation guidelines for natural phone interactions
 */
export const VOICE_GUIDELINES_SECTION = `VOICE GUIDELINES:
- Speak naturally like a real phone agent
- Short answers (1-3 sentences)
- No markdown, bullets, emojis or code formatting
- Let the patient speak first when the call connects`;

/**
 * What the agent knows about the patient
 */
export function callerContextSection(dialInfo: DialInfo): string | null {
  const lines: string[] = [];
  if (dialInfo.customerName) {
    lines.push(`The patient's name is ${dialInfo.customerName}.`);
  }
  if (dialInfo.appointmentTime) {
    lines.push(`Their appointment is ${dialInfo.appointmentTime}.`);
  }
  if (!dialInfo.transferTo) {
    lines.push('No team member is available for transfers on this call.');
  }
  return lines.length > 0 ? `CALL CONTEXT:\n${lines.join('\n')}` : null;
}

// ============================================================================
// PROMPT BUILDER
// ============================================================================

/**
 * Full instructions for one call
 */
export function buildInstructions(practiceName: string, dialInfo: DialInfo): string {
  return [
    roleSection(practiceName),
    callerContextSection(dialInfo),
    TOOL_USAGE_SECTION,
    VOICE_GUIDELINES_SECTION,
  ]
    .filter((section): section is string => section !== null)
    .join('\n\n');
}
