import { AsyncLocalStorage } from 'node:async_hooks';
import { CurveError } from './CurveError.js';

interface GuardFrame {
    readonly operation: string;
    active: boolean;
}

/**
 * ReentrancyGuard — one lock per curve.
 *
 * A call that arrives from inside the async chain of a running operation
 * (a recipient hook calling back into the curve, say) is rejected on the
 * spot. Calls from unrelated callers wait their turn instead, so operations
 * on one curve never interleave.
 *
 * Timers and callbacks scheduled during an operation inherit its frame; the
 * frame is marked inactive once the operation ends, so work they run later
 * is treated as an ordinary caller.
 */
export class ReentrancyGuard {
    private readonly context = new AsyncLocalStorage<GuardFrame>();
    private tail: Promise<void> = Promise.resolve();

    async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
        const running = this.context.getStore();
        if (running?.active) {
            throw new CurveError(
                'REENTRANCY',
                `Reentrant call to ${operation} while ${running.operation} is executing`,
            );
        }

        let release: () => void = () => undefined;
        const turn = new Promise<void>((resolve) => { release = resolve; });
        const previous = this.tail;
        this.tail = previous.then(() => turn);

        await previous;
        const frame: GuardFrame = { operation, active: true };
        try {
            return await this.context.run(frame, fn);
        } finally {
            frame.active = false;
            release();
        }
    }
}
