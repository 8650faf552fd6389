/**
 * Product Regeneration Lock
 *
 * Serializes variant regeneration per product.
 *
 * Two-tier locking strategy:
 * 1. In-process queue: callers for the same product wait their turn instead
 *    of racing inside one instance
 * 2. Database lock: pg_advisory_xact_lock taken by the store inside the
 *    regeneration transaction, for mutual exclusion across instances
 */

interface LockState {
    /** Resolves when the last queued caller finishes */
    tail: Promise<void>;
    /** Callers running or waiting */
    queued: number;
    source: string;
    acquiredAt: number;
}

const productLocks = new Map<string, LockState>();

/**
 * Run `fn` once every earlier caller for the same product has finished.
 * A failure of an earlier caller does not block later ones.
 */
export async function withProductLock<T>(
    productId: string,
    source: string,
    fn: () => Promise<T>
): Promise<T> {
    let state = productLocks.get(productId);
    if (!state) {
        state = { tail: Promise.resolve(), queued: 0, source, acquiredAt: Date.now() };
        productLocks.set(productId, state);
    }

    let release: () => void = () => undefined;
    const current = new Promise<void>(resolve => {
        release = resolve;
    });
    const previous = state.tail;
    state.tail = current;
    state.queued += 1;

    try {
        await previous;
        state.source = source;
        state.acquiredAt = Date.now();
        return await fn();
    } finally {
        release();
        state.queued -= 1;
        if (state.queued === 0 && productLocks.get(productId) === state) {
            productLocks.delete(productId);
        }
    }
}

/**
 * Get current lock status for debugging
 */
export function getProductLockStatus(): Array<{ productId: string; source: string; queued: number; age: number }> {
    const now = Date.now();
    return [...productLocks.entries()].map(([productId, state]) => ({
        productId,
        source: state.source,
        queued: state.queued,
        age: Math.round((now - state.acquiredAt) / 1000),
    }));
}

/**
 * Clear all locks (for testing only)
 */
export function clearAllProductLocks(): void {
    productLocks.clear();
}
