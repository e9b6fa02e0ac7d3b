import { describe, expect, it, vi } from 'vitest';
import { ShutdownManager } from '../../src/core/shutdown.js';

describe('ShutdownManager', () => {
    it('runs callbacks in order, then exits', async () => {
        const exit = vi.fn();
        const manager = new ShutdownManager({ installSignalHandlers: false, exit });
        const order: string[] = [];
        manager.register(async () => {
            order.push('first');
        });
        manager.register(async () => {
            order.push('second');
        });

        await manager.shutdown('SIGTERM');

        expect(order).toEqual(['first', 'second']);
        expect(exit).toHaveBeenCalledWith(0);
    });

    it('keeps going when a callback fails', async () => {
        const exit = vi.fn();
        const manager = new ShutdownManager({ installSignalHandlers: false, exit });
        const later = vi.fn(async () => undefined);
        manager.register(async () => {
            throw new Error('room service unavailable');
        });
        manager.register(later);

        await manager.shutdown('SIGINT', 2);

        expect(later).toHaveBeenCalledTimes(1);
        expect(exit).toHaveBeenCalledWith(2);
    });

    it('shuts down only once', async () => {
        const exit = vi.fn();
        const manager = new ShutdownManager({ installSignalHandlers: false, exit });
        const callback = vi.fn(async () => undefined);
        manager.register(callback);

        await Promise.all([manager.shutdown('SIGTERM'), manager.shutdown('SIGTERM')]);

        expect(callback).toHaveBeenCalledTimes(1);
        expect(exit).toHaveBeenCalledTimes(1);
    });

    it('skips unregistered callbacks', async () => {
        const manager = new ShutdownManager({ installSignalHandlers: false, exit: vi.fn() });
        const callback = vi.fn(async () => undefined);
        const unregister = manager.register(callback);

        unregister();
        await manager.shutdown('SIGTERM');

        expect(callback).not.toHaveBeenCalled();
    });

    it('forces exit when callbacks hang', async () => {
        vi.useFakeTimers();
        try {
            const exit = vi.fn();
            const manager = new ShutdownManager({ installSignalHandlers: false, exit, timeoutMs: 1000 });
            manager.register(() => new Promise<void>(() => undefined));

            void manager.shutdown('SIGTERM');
            await vi.advanceTimersByTimeAsync(1000);

            expect(exit).toHaveBeenCalledWith(1);
        } finally {
            vi.useRealTimers();
        }
    });
});
