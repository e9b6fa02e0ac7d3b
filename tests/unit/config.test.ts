import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { loadConfig, loadEnvFiles } from '../../src/core/config.js';
import { ConfigurationError } from '../../src/core/exceptions.js';

const baseEnv = {
    LIVEKIT_URL: 'http://localhost:7880',
    LIVEKIT_API_KEY: 'test-key',
    LIVEKIT_API_SECRET: 'test-secret',
};

describe('loadConfig', () => {
    it('applies call defaults', () => {
        const config = loadConfig(baseEnv);

        expect(config.telephony).toEqual({
            outboundTrunkId: undefined,
            answerTimeoutMs: 15000,
            ringingTimeoutSeconds: 30,
            pollIntervalMs: 100,
            calleeIdentity: 'phone_user',
            transferIdentity: 'transfer_target',
        });
        expect(config.agent).toEqual({ name: 'outbound-caller', practiceName: 'a dental practice' });
        expect(config.scheduling.availableTimes).toEqual(['1pm', '2pm', '3pm']);
        expect(config.speech).toEqual({ llmModel: 'gpt-4o-mini', llmTemperature: 0.3 });
        expect(config.logLevel).toBe('INFO');
    });

    it('reads overrides from the environment', () => {
        const config = loadConfig({
            ...baseEnv,
            SIP_OUTBOUND_TRUNK_ID: 'ST_test',
            CALL_ANSWER_TIMEOUT_MS: '20000',
            AVAILABLE_TIMES: '9am, 11am',
            PRACTICE_NAME: 'Bright Smile Dental',
            LOG_LEVEL: 'debug',
        });

        expect(config.telephony.outboundTrunkId).toBe('ST_test');
        expect(config.telephony.answerTimeoutMs).toBe(20000);
        expect(config.scheduling.availableTimes).toEqual(['9am', '11am']);
        expect(config.agent.practiceName).toBe('Bright Smile Dental');
        expect(config.logLevel).toBe('DEBUG');
    });

    it('throws a ConfigurationError for missing credentials', () => {
        const consoleError = vi.spyOn(console, 'error').mockImplementation(() => undefined);
        try {
            expect(() => loadConfig({ LIVEKIT_URL: 'not a url' })).toThrow(ConfigurationError);
        } finally {
            consoleError.mockRestore();
        }
    });
});

describe('loadEnvFiles', () => {
    const dirs: string[] = [];

    function tempDir(): string {
        const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'outbound-caller-env-'));
        dirs.push(dir);
        return dir;
    }

    afterEach(() => {
        for (const dir of dirs.splice(0)) {
            fs.rmSync(dir, { recursive: true, force: true });
        }
        delete process.env.OUTBOUND_ENV_CHECK;
    });

    it('falls back to the next directory when the first has no env files', () => {
        const buildRoot = tempDir();
        const workingDir = tempDir();
        fs.writeFileSync(path.join(workingDir, '.env'), 'OUTBOUND_ENV_CHECK=from-working-dir\n');

        const loaded = loadEnvFiles([buildRoot, workingDir]);

        expect(loaded).toEqual([path.join(workingDir, '.env')]);
        expect(process.env.OUTBOUND_ENV_CHECK).toBe('from-working-dir');
    });

    it('prefers .env.local over .env in the same directory', () => {
        const root = tempDir();
        fs.writeFileSync(path.join(root, '.env.local'), 'OUTBOUND_ENV_CHECK=local\n');
        fs.writeFileSync(path.join(root, '.env'), 'OUTBOUND_ENV_CHECK=shared\n');

        const loaded = loadEnvFiles([root]);

        expect(loaded).toEqual([path.join(root, '.env.local'), path.join(root, '.env')]);
        expect(process.env.OUTBOUND_ENV_CHECK).toBe('local');
    });
});
