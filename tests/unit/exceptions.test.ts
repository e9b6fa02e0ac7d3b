import { describe, expect, it } from 'vitest';
import { SipDialError, TransferError } from '../../src/core/exceptions.js';

describe('SipDialError.from', () => {
    it('reads the SIP status from the error metadata', () => {
        const error = Object.assign(new Error('twirp error unknown: Not Found'), {
            metadata: { sip_status_code: '404', sip_status: 'Not Found' },
        });

        const dialError = SipDialError.from(error);

        expect(dialError.message).toBe('twirp error unknown: Not Found');
        expect(dialError.sipStatusCode).toBe('404');
        expect(dialError.sipStatus).toBe('Not Found');
        expect(dialError.cause).toBe(error);
    });

    it('wraps errors without SIP details', () => {
        const dialError = SipDialError.from(new Error('socket hang up'));

        expect(dialError.message).toBe('socket hang up');
        expect(dialError.sipStatusCode).toBeUndefined();
    });

    it('wraps thrown non-errors', () => {
        expect(SipDialError.from('busy').message).toBe('busy');
    });

    it('returns an existing SipDialError unchanged', () => {
        const original = new SipDialError('busy', '486', 'Busy Here');

        expect(SipDialError.from(original)).toBe(original);
    });
});

describe('TransferError', () => {
    it('names the failed stage', () => {
        const error = new TransferError('join', new Error('left the room'));

        expect(error.message).toBe('Transfer failed at join: left the room');
        expect(error.stage).toBe('join');
        expect(error.name).toBe('TransferError');
    });
});
