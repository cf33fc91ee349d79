import type { RandomSource } from "../divination";

/**
 * Replays a fixed sequence of coin flips, cycling when it runs out.
 */
export function scriptedSource(flips: readonly boolean[]): RandomSource & {
    readonly calls: number;
} {
    let calls = 0;
    return {
        flip() {
            const value = flips[calls % flips.length];
            calls++;
            return value;
        },
        get calls() {
            return calls;
        },
    };
}

export function constantSource(value: boolean): RandomSource {
    return { flip: () => value };
}
