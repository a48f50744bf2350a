import type { RandomSource } from '../core/random';

export const EPSILON = 1e-9;

export function assertClose(actual: number, expected: number, epsilon: number = EPSILON): void {
    if (!(Math.abs(actual - expected) <= epsilon)) {
        throw new Error(`Expected ${actual} to be within ${epsilon} of ${expected}`);
    }
}

export function constantRandom(value: number): RandomSource {
    return () => value;
}

/**
 * Small LCG so property checks run over the same inputs every time.
 */
export function seededRandom(seed: number): RandomSource {
    let state = seed >>> 0;
    return () => {
        state = (Math.imul(state, 1664525) + 1013904223) >>> 0;
        return state / 0x100000000;
    };
}

/**
 * Clock advancing by `stepMs` on every read.
 */
export function steppingClock(stepMs: number): () => number {
    let now = 0;
    return () => {
        const current = now;
        now += stepMs;
        return current;
    };
}

export function pixelAt(pixels: Uint8Array, width: number, column: number, row: number): number[] {
    const offset = (row * width + column) * 4;
    return Array.from(pixels.subarray(offset, offset + 4));
}
