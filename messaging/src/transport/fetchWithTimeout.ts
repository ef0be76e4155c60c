/**
 * SPDX-License-Identifier: Apache-2.0
 */
import { DeliveryError, DeliveryTimeoutError } from '../utils/errors';

export async function fetchWithTimeout(url: string, init: RequestInit, timeoutMs: number): Promise<Response> {
    const controller = new AbortController();
    const timeoutHandle = setTimeout(() => controller.abort(), timeoutMs);

    try {
        return await fetch(url, {
            ...init,
            signal: controller.signal,
        });
    } catch (error) {
        if (error instanceof Error && error.name === 'AbortError') {
            throw new DeliveryTimeoutError(url, timeoutMs);
        }

        const message = error instanceof Error ? error.message : String(error);
        throw new DeliveryError(`Network request to ${url} failed: ${message}`, false, { endpoint: url });
    } finally {
        clearTimeout(timeoutHandle);
    }
}
