import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { SessionController } from '../../src/agent/session-controller.js';
import { CallStateError } from '../../src/core/exceptions.js';
import { CallOrchestrator } from '../../src/telephony/call-orchestrator.js';
import type { StatusChange } from '../../src/telephony/call-status-monitor.js';
import { CallStatus } from '../../src/telephony/types.js';
import type { CallEndReason, DialInfo } from '../../src/telephony/types.js';
import { FakeAvailability, FakeDialer, FakeMembership, FakeParticipant, FakePipeline } from './helpers/fakes.js';
import type { EventLog } from './helpers/fakes.js';

const DIAL_INFO: DialInfo = {
    phoneNumber: '+15550100123',
    transferTo: '+15550100999',
    customerName: 'Jayden',
    appointmentTime: 'next Tuesday at 3pm',
};

function setup(calleeStatus = 'active') {
    const log: EventLog = [];
    const dialer = new FakeDialer(log);
    const membership = new FakeMembership('room-1', log);
    const callee = membership.add(new FakeParticipant('phone_user', calleeStatus));
    const pipeline = new FakePipeline(log);
    const controller = new SessionController(pipeline, { participantIdentity: 'phone_user' });
    const endReasons: CallEndReason[] = [];
    const statusChanges: StatusChange[] = [];

    const orchestrator = new CallOrchestrator(
        {
            dialer,
            membership,
            controller,
            availability: new FakeAvailability(),
            onCallEnded: async (reason) => {
                endReasons.push(reason);
            },
            onStatusChange: change => statusChanges.push(change),
        },
        {
            trunkId: 'ST_test',
            practiceName: 'Bright Smile Dental',
            calleeIdentity: 'phone_user',
            transferIdentity: 'transfer_target',
            answerTimeoutMs: 15000,
            ringingTimeoutSeconds: 30,
            pollIntervalMs: 100,
        },
    );

    return { log, dialer, membership, callee, pipeline, controller, orchestrator, endReasons, statusChanges };
}

function sipError(message: string, metadata: Record<string, string>): Error {
    return Object.assign(new Error(message), { metadata });
}

describe('CallOrchestrator', () => {
    beforeEach(() => {
        vi.useFakeTimers();
    });

    afterEach(() => {
        vi.useRealTimers();
    });

    it('starts the session before dialing the callee', async () => {
        const { orchestrator, log, dialer, pipeline } = setup();

        await orchestrator.placeCall(DIAL_INFO);

        expect(log.slice(0, 3)).toEqual(['pipeline:start', 'dial:phone_user', 'join:phone_user']);
        expect(dialer.requests).toEqual([
            {
                roomName: 'room-1',
                trunkId: 'ST_test',
                phoneNumber: '+15550100123',
                participantIdentity: 'phone_user',
                participantName: 'Jayden',
                waitUntilAnswered: true,
                ringingTimeoutSeconds: 30,
            },
        ]);
        expect(pipeline.startOptions?.participantIdentity).toBe('phone_user');
        expect(pipeline.startOptions?.instructions).toContain('scheduling assistant for Bright Smile Dental');
        expect(pipeline.startOptions?.instructions).toContain("The patient's name is Jayden.");
    });

    it('connects, confirms and ends the call when the callee is done', async () => {
        const { orchestrator, controller, dialer, pipeline, endReasons } = setup('active');

        const outcome = await orchestrator.placeCall(DIAL_INFO);
        expect(outcome).toEqual({ kind: 'connected', calleeIdentity: 'phone_user' });
        expect(controller.isBound()).toBe(true);
        expect(orchestrator.session?.isBound).toBe(true);

        const actions = pipeline.startOptions?.actions;
        expect(actions).toBe(orchestrator.dispatcher);
        const confirmed = await actions?.dispatch({
            type: 'confirm_appointment',
            args: { date: 'next Tuesday', time: '3pm' },
        });
        expect(confirmed).toEqual({
            success: true,
            message: 'reservation confirmed',
            data: { date: 'next Tuesday', time: '3pm' },
        });

        const ended = await actions?.dispatch({ type: 'end_call', args: {} });
        expect(ended).toEqual({ success: true, message: 'call ended' });
        expect(dialer.deletedRooms).toEqual(['room-1']);
        expect(pipeline.closeCount).toBe(1);
        expect(endReasons).toEqual(['end_call']);
        expect(orchestrator.session?.actions).toEqual(['confirm_appointment', 'end_call']);
    });

    it('waits through automation and hangs up on voicemail', async () => {
        const { orchestrator, callee, dialer, pipeline, endReasons, statusChanges } = setup('automation');

        const placing = orchestrator.placeCall(DIAL_INFO);
        await vi.advanceTimersByTimeAsync(500);
        callee.setStatus('active');
        await vi.advanceTimersByTimeAsync(100);

        expect(await placing).toEqual({ kind: 'connected', calleeIdentity: 'phone_user' });
        expect(statusChanges.map(change => change.status)).toEqual([CallStatus.AUTOMATION, CallStatus.ACTIVE]);

        const result = await pipeline.startOptions?.actions.dispatch({ type: 'detected_answering_machine', args: {} });
        expect(result).toEqual({ success: true, message: 'voicemail detected, call ended' });
        expect(dialer.deletedRooms).toEqual(['room-1']);
        expect(pipeline.replies).toEqual([]);
        expect(endReasons).toEqual(['voicemail']);
    });

    it('ends the job when the callee never picks up within 15 seconds', async () => {
        const { orchestrator, dialer, pipeline, endReasons } = setup('ringing');

        const placing = orchestrator.placeCall(DIAL_INFO);
        await vi.advanceTimersByTimeAsync(15000);

        expect(await placing).toEqual({ kind: 'timed_out', waitedMs: 15000 });
        expect(dialer.deletedRooms).toEqual(['room-1']);
        expect(pipeline.replies).toEqual([]);
        expect(pipeline.closeCount).toBe(1);
        expect(endReasons).toEqual(['timeout']);
        expect(vi.getTimerCount()).toBe(0);
    });

    it('ends the job when the callee hangs up before answering', async () => {
        const { orchestrator, callee, dialer, endReasons } = setup('ringing');

        const placing = orchestrator.placeCall(DIAL_INFO);
        await vi.advanceTimersByTimeAsync(200);
        callee.setStatus('hangup');
        await vi.advanceTimersByTimeAsync(100);

        expect(await placing).toEqual({ kind: 'hung_up', status: CallStatus.HANGUP });
        expect(dialer.deletedRooms).toEqual(['room-1']);
        expect(endReasons).toEqual(['callee_hangup']);
    });

    it('reports a rejected dial with its SIP status and never retries', async () => {
        const { orchestrator, dialer, log, pipeline, endReasons } = setup();
        dialer.dialErrors.set('phone_user', sipError('twirp error unknown: Busy Here', {
            sip_status_code: '486',
            sip_status: 'Busy Here',
        }));

        const outcome = await orchestrator.placeCall(DIAL_INFO);

        expect(outcome).toEqual({
            kind: 'dial_failed',
            error: { message: 'twirp error unknown: Busy Here', sipStatusCode: '486', sipStatus: 'Busy Here' },
        });
        expect(dialer.requests).toHaveLength(1);
        expect(log).not.toContain('join:phone_user');
        expect(dialer.deletedRooms).toEqual(['room-1']);
        expect(pipeline.closeCount).toBe(1);
        expect(endReasons).toEqual(['dial_failed']);
    });

    it('holds the callee join until a slow session start completes', async () => {
        const { orchestrator, log, pipeline, controller } = setup('active');
        const gate = pipeline.holdStart();

        const placing = orchestrator.placeCall(DIAL_INFO);
        await vi.advanceTimersByTimeAsync(0);

        expect(log).toEqual(['pipeline:start', 'dial:phone_user']);
        expect(pipeline.startOptions?.participantIdentity).toBe('phone_user');
        expect(controller.isBound()).toBe(false);

        gate.resolve();
        expect(await placing).toEqual({ kind: 'connected', calleeIdentity: 'phone_user' });
        expect(log.slice(0, 3)).toEqual(['pipeline:start', 'dial:phone_user', 'join:phone_user']);
        expect(controller.isBound()).toBe(true);
    });

    it('stops waiting for a session start that outlasts the answer budget after a failed dial', async () => {
        const { orchestrator, dialer, pipeline, endReasons } = setup();
        pipeline.holdStart();
        dialer.dialErrors.set('phone_user', sipError('twirp error unknown: Busy Here', {
            sip_status_code: '486',
            sip_status: 'Busy Here',
        }));

        const placing = orchestrator.placeCall(DIAL_INFO);
        await vi.advanceTimersByTimeAsync(14999);
        expect(dialer.deletedRooms).toEqual([]);
        await vi.advanceTimersByTimeAsync(1);

        expect(await placing).toEqual({
            kind: 'dial_failed',
            error: { message: 'twirp error unknown: Busy Here', sipStatusCode: '486', sipStatus: 'Busy Here' },
        });
        expect(dialer.deletedRooms).toEqual(['room-1']);
        expect(endReasons).toEqual(['dial_failed']);
        expect(vi.getTimerCount()).toBe(0);
    });

    it('tears down when the session start outlasts the answer budget after an answer', async () => {
        const { orchestrator, pipeline, dialer, log, endReasons } = setup();
        pipeline.holdStart();

        const placing = orchestrator.placeCall(DIAL_INFO);
        await vi.advanceTimersByTimeAsync(15000);

        expect(await placing).toEqual({ kind: 'setup_failed', message: 'Session start did not complete within 15000ms' });
        expect(log).not.toContain('join:phone_user');
        expect(dialer.deletedRooms).toEqual(['room-1']);
        expect(endReasons).toEqual(['setup_failed']);
    });

    it('tears down when the callee join outlasts the answer budget', async () => {
        const { orchestrator, membership, dialer, controller, endReasons } = setup();
        membership.holdJoin('phone_user');

        const placing = orchestrator.placeCall(DIAL_INFO);
        await vi.advanceTimersByTimeAsync(14999);
        expect(dialer.deletedRooms).toEqual([]);
        await vi.advanceTimersByTimeAsync(1);

        expect(await placing).toEqual({ kind: 'setup_failed', message: 'Callee join did not complete within 15000ms' });
        expect(controller.isBound()).toBe(false);
        expect(dialer.deletedRooms).toEqual(['room-1']);
        expect(endReasons).toEqual(['setup_failed']);
        expect(vi.getTimerCount()).toBe(0);
    });

    it('tears down when the session fails to start', async () => {
        const { orchestrator, pipeline, dialer, log, endReasons } = setup();
        const gate = pipeline.holdStart();
        gate.reject(new Error('llm unavailable'));

        const outcome = await orchestrator.placeCall(DIAL_INFO);

        expect(outcome).toEqual({ kind: 'setup_failed', message: 'llm unavailable' });
        expect(log).not.toContain('join:phone_user');
        expect(dialer.deletedRooms).toEqual(['room-1']);
        expect(endReasons).toEqual(['setup_failed']);
    });

    it('tears down when the callee never joins the room', async () => {
        const { orchestrator, membership, dialer, controller, endReasons } = setup();
        membership.joinErrors.set('phone_user', new Error('participant disconnected'));

        const outcome = await orchestrator.placeCall(DIAL_INFO);

        expect(outcome).toEqual({ kind: 'setup_failed', message: 'participant disconnected' });
        expect(controller.isBound()).toBe(false);
        expect(dialer.deletedRooms).toEqual(['room-1']);
        expect(endReasons).toEqual(['setup_failed']);
    });

    it('stops waiting when the worker shuts down', async () => {
        const { orchestrator, dialer, endReasons } = setup('ringing');

        const placing = orchestrator.placeCall(DIAL_INFO);
        await vi.advanceTimersByTimeAsync(300);
        await orchestrator.abort();

        expect(await placing).toEqual({ kind: 'ended', reason: 'worker_shutdown' });
        expect(dialer.deletedRooms).toEqual(['room-1']);
        expect(endReasons).toEqual(['worker_shutdown']);
        expect(vi.getTimerCount()).toBe(0);
    });

    it('places only one call per job', async () => {
        const { orchestrator } = setup();
        await orchestrator.placeCall(DIAL_INFO);

        await expect(orchestrator.placeCall(DIAL_INFO)).rejects.toThrow(CallStateError);
    });
});
