import { describe, expect, it } from 'vitest';
import {
    TOOL_USAGE_SECTION,
    VOICE_GUIDELINES_SECTION,
    buildInstructions,
    callerContextSection,
    roleSection,
} from '../../src/core/prompt-templates.js';

describe('prompt templates', () => {
    it('describes what the agent knows about the patient', () => {
        expect(callerContextSection({
            phoneNumber: '+15550100123',
            transferTo: '+15550100999',
            customerName: 'Jayden',
            appointmentTime: 'next Tuesday at 3pm',
        })).toBe("CALL CONTEXT:\nThe patient's name is Jayden.\nTheir appointment is next Tuesday at 3pm.");
    });

    it('tells the agent when no transfer is possible', () => {
        expect(callerContextSection({ phoneNumber: '+15550100123' })).toBe(
            'CALL CONTEXT:\nNo team member is available for transfers on this call.',
        );
    });

    it('omits the context section when there is nothing to say', () => {
        expect(callerContextSection({ phoneNumber: '+15550100123', transferTo: '+15550100999' })).toBeNull();
    });

    it('joins the sections in order', () => {
        const dialInfo = { phoneNumber: '+15550100123', transferTo: '+15550100999' };

        expect(buildInstructions('Bright Smile Dental', dialInfo)).toBe(
            [roleSection('Bright Smile Dental'), TOOL_USAGE_SECTION, VOICE_GUIDELINES_SECTION].join('\n\n'),
        );
    });

    it('builds independent instructions for each call', () => {
        const first = buildInstructions('Bright Smile Dental', { phoneNumber: '+15550100123', customerName: 'Jayden' });
        const second = buildInstructions('Bright Smile Dental', { phoneNumber: '+15550100124', customerName: 'Avery' });

        expect(first).toContain("The patient's name is Jayden.");
        expect(first).not.toContain('Avery');
        expect(second).toContain("The patient's name is Avery.");
    });
});
