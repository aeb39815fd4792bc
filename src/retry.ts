import { setTimeout } from 'node:timers/promises';

import { RetryExhaustedError } from './errors.js';

export interface RetryPolicy {
    baseDelayMs: number;
    multiplier: number;
    maxDelayMs: number;
    maxAttempts: number;
}

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = async (ms) => {
    await setTimeout(ms);
};

export interface RetryOptions {
    sleep?: Sleep;
    /** Return false to give up immediately and rethrow the error as is. */
    shouldRetry?: (error: unknown) => boolean;
    onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

/** Wait before retry number `retry` (1-based): base * multiplier^(retry - 1), capped. */
export const backoffDelay = (policy: RetryPolicy, retry: number): number =>
    Math.min(policy.baseDelayMs * policy.multiplier ** (retry - 1), policy.maxDelayMs);

export const withRetry = async <T>(
    task: (attempt: number) => Promise<T>,
    policy: RetryPolicy,
    { sleep: wait = sleep, shouldRetry = () => true, onRetry }: RetryOptions = {},
): Promise<T> => {
    let lastError: unknown;

    for (let attempt = 1; attempt <= policy.maxAttempts; attempt++) {
        try {
            return await task(attempt);
        } catch (error) {
            if (!shouldRetry(error)) throw error;
            lastError = error;
            if (attempt === policy.maxAttempts) break;

            const delayMs = backoffDelay(policy, attempt);
            onRetry?.(error, attempt, delayMs);
            await wait(delayMs);
        }
    }

    throw new RetryExhaustedError(policy.maxAttempts, lastError);
};
