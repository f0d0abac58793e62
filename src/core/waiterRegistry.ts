import { Logger } from 'winston';
import { MutationEvent, WaitTarget, WindowSnapshot } from '../types';
import { RequestAbandonedError, StaleOrEvictedDataError } from './errors';
import { findSegment, isEvicted } from './windowSnapshot';
import logger from '../utils/logger';

type Evaluation =
    | { status: 'pending' }
    | { status: 'ready' }
    | { status: 'rejected'; error: Error };

interface PendingWait {
    target: WaitTarget;
    key: string;
    resolve: (window: WindowSnapshot) => void;
    reject: (error: Error) => void;
    detach: () => void;
}

const PENDING: Evaluation = { status: 'pending' };
const READY: Evaluation = { status: 'ready' };

/**
 * Rewrites a part target past the end of a sealed segment into part 0 of the
 * following segment, repeatedly, so that `(S, partCount(S))` and `(S + 1, 0)`
 * name the same condition once S is sealed.
 */
export function canonicalPart(window: WindowSnapshot, sequence: number, part: number): { sequence: number; part: number } {
    let current = { sequence, part };
    let segment = findSegment(window, current.sequence);
    while (segment && segment.complete && current.part >= segment.parts.length) {
        current = { sequence: current.sequence + 1, part: 0 };
        segment = findSegment(window, current.sequence);
    }
    return current;
}

export function waitKey(target: WaitTarget, window: WindowSnapshot): string {
    switch (target.kind) {
        case 'live':
        case 'production':
            return target.kind;
        case 'part': {
            const canonical = canonicalPart(window, target.sequence, target.part);
            return `part:${canonical.sequence}.${canonical.part}`;
        }
        case 'bytes':
            return `bytes:${target.sequence}@${target.offset}`;
        default:
            return `${target.kind}:${target.sequence}`;
    }
}

export function evaluateTarget(target: WaitTarget, window: WindowSnapshot, event?: MutationEvent): Evaluation {
    switch (target.kind) {
        case 'live':
            return window.segments.length > 0 ? READY : PENDING;
        case 'production':
            return event === 'put' || event === 'part' ? READY : PENDING;
        case 'part': {
            const canonical = canonicalPart(window, target.sequence, target.part);
            if (isEvicted(window, canonical.sequence)) {
                return { status: 'rejected', error: new StaleOrEvictedDataError(canonical.sequence) };
            }
            const segment = findSegment(window, canonical.sequence);
            return segment && segment.parts.length > canonical.part ? READY : PENDING;
        }
        default: {
            if (isEvicted(window, target.sequence)) {
                return { status: 'rejected', error: new StaleOrEvictedDataError(target.sequence) };
            }
            const segment = findSegment(window, target.sequence);
            if (!segment) {
                return PENDING;
            }
            if (target.kind === 'segment') {
                return READY;
            }
            if (target.kind === 'complete') {
                return segment.complete ? READY : PENDING;
            }
            return segment.complete || segment.dataSize > target.offset ? READY : PENDING;
        }
    }
}

/**
 * Requests parked until the buffer reaches some state. After every mutation
 * the buffer broadcasts its new snapshot; every waiter is re-evaluated against
 * that one snapshot and the satisfied ones are resolved with it.
 */
export class WaiterRegistry {
    private readonly waiters = new Set<PendingWait>();
    private closedWith: Error | undefined;
    private logger: Logger;
    private label: string;

    constructor(label: string, loggerInstance?: Logger) {
        this.label = label;
        this.logger = loggerInstance || logger;
    }

    public get size(): number {
        return this.waiters.size;
    }

    /**
     * Resolves with the first snapshot (starting with `window`) in which
     * `target` holds. Rejects on eviction, on `close()`, or with
     * `RequestAbandonedError` when `signal` aborts.
     */
    public wait(target: WaitTarget, window: WindowSnapshot, signal?: AbortSignal): Promise<WindowSnapshot> {
        if (this.closedWith) {
            return Promise.reject(this.closedWith);
        }
        if (signal?.aborted) {
            return Promise.reject(new RequestAbandonedError());
        }

        const evaluation = evaluateTarget(target, window);
        if (evaluation.status === 'ready') {
            return Promise.resolve(window);
        }
        if (evaluation.status === 'rejected') {
            return Promise.reject(evaluation.error);
        }

        return new Promise<WindowSnapshot>((resolve, reject) => {
            const onAbort = (): void => {
                this.waiters.delete(waiter);
                this.logger.debug(`[${this.label}] Waiter ${waiter.key} abandoned by client`);
                reject(new RequestAbandonedError());
            };
            const waiter: PendingWait = {
                target,
                key: waitKey(target, window),
                resolve,
                reject,
                detach: () => signal?.removeEventListener('abort', onAbort),
            };
            signal?.addEventListener('abort', onAbort, { once: true });
            this.waiters.add(waiter);
            this.logger.debug(`[${this.label}] Parked waiter ${waiter.key} (${this.waiters.size} pending)`);
        });
    }

    public broadcast(window: WindowSnapshot, event: MutationEvent): void {
        for (const waiter of Array.from(this.waiters)) {
            const evaluation = evaluateTarget(waiter.target, window, event);
            if (evaluation.status === 'pending') {
                waiter.key = waitKey(waiter.target, window);
                continue;
            }
            this.waiters.delete(waiter);
            waiter.detach();
            if (evaluation.status === 'ready') {
                waiter.resolve(window);
            } else {
                this.logger.debug(`[${this.label}] Waiter ${waiter.key} rejected: ${evaluation.error.message}`);
                waiter.reject(evaluation.error);
            }
        }
    }

    /** Rejects every pending waiter and all future waits with `error`. */
    public close(error: Error): void {
        this.closedWith = error;
        for (const waiter of Array.from(this.waiters)) {
            this.waiters.delete(waiter);
            waiter.detach();
            waiter.reject(error);
        }
    }

    /** Pending waiter count per canonical wait key. */
    public pendingByKey(): Map<string, number> {
        const counts = new Map<string, number>();
        for (const waiter of this.waiters) {
            counts.set(waiter.key, (counts.get(waiter.key) ?? 0) + 1);
        }
        return counts;
    }
}
