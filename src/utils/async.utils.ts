/**
 * Async helpers.
 *
 * @module async-utils
 */

/**
 * Resolve after the given number of milliseconds.
 *
 * @param ms - Delay in milliseconds
 */
export function delay(ms: number): Promise<void> {
	return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Signature of an injectable sleep, so poll loops can run on a fake clock */
export type SleepFn = (ms: number) => Promise<void>;

/** Signature of an injectable clock returning epoch milliseconds */
export type NowFn = () => number;
