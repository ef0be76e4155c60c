/**
 * SPDX-License-Identifier: Apache-2.0
 */
export interface NonceStore {
    consume: (agentAddress: string, nonce: string, ttlSeconds: number) => Promise<boolean>;
    close: () => Promise<void>;
}

export interface InMemoryNonceStoreOptions {
    maxEntries?: number;
    nowMs?: () => number;
}

export interface InMemoryNonceStore extends NonceStore {
    size: () => number;
}

export function createInMemoryNonceStore(options: InMemoryNonceStoreOptions = {}): InMemoryNonceStore {
    const maxEntries = options.maxEntries ?? 10000;
    const nowMs = options.nowMs ?? (() => Date.now());
    const store = new Map<string, number>();

    const pruneExpired = (currentTime: number): void => {
        for (const [key, expiresAt] of store) {
            if (expiresAt <= currentTime) {
                store.delete(key);
            }
        }
    };

    // Map iteration follows insertion order, so the oldest nonce goes first.
    const capStoreSize = (): void => {
        for (const key of store.keys()) {
            if (store.size <= maxEntries) {
                return;
            }
            store.delete(key);
        }
    };

    return {
        consume: async (agentAddress: string, nonce: string, ttlSeconds: number): Promise<boolean> => {
            if (!Number.isInteger(ttlSeconds) || ttlSeconds <= 0) {
                throw new Error('nonce ttlSeconds must be a positive integer');
            }

            const currentTime = nowMs();
            pruneExpired(currentTime);

            const key = `${agentAddress}:${nonce}`;
            const expiresAt = store.get(key);
            if (expiresAt && expiresAt > currentTime) {
                return false;
            }

            store.set(key, currentTime + ttlSeconds * 1000);
            capStoreSize();
            return true;
        },
        close: async () => {
            store.clear();
        },
        size: () => store.size,
    };
}
