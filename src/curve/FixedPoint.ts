import { SCALE } from './constants.js';

/** Largest cube the sizer ever asks for: (1 + 1)^3 at full sellout. */
export const MAX_CUBE = 8n * SCALE;
export const CUBE_ROOT_ITERATIONS = 10;

/**
 * (1 + p)^3 for a fixed-point value, truncating after each product.
 * Never exceeds the exact cube, which the sizer relies on.
 */
export function cube(value: bigint): bigint {
    return (((value * value) / SCALE) * value) / SCALE;
}

/**
 * Fixed-point cube root on [1, 8].
 *
 * Integer Newton iteration on N = x * SCALE^2, started on the tangent line of
 * the root at 1, which lies on or above the curve. Every step therefore lands
 * on or above floor(cbrt(N)) and strictly decreases until it reaches it; the
 * first non-decreasing step ends the loop. From the worst starting point
 * (x = 8) the error squares each round and settles within seven steps, so
 * the result satisfies y^3 <= N < (y + 1)^3.
 */
export function cubeRoot(x: bigint): bigint {
    if (x < SCALE || x > MAX_CUBE) {
        throw new RangeError(`cubeRoot domain is [1, 8] in fixed point, got ${x}`);
    }

    const target = x * SCALE * SCALE;
    let y = SCALE + (x - SCALE) / 3n;

    for (let i = 0; i < CUBE_ROOT_ITERATIONS; i++) {
        const next = (2n * y + target / (y * y)) / 3n;
        if (next >= y) break;
        y = next;
    }
    return y;
}
