/**
 * Returns the current Unix time in whole seconds, the resolution event
 * timestamps are reported in.
 */
export const nowSeconds = (): number => Math.floor(Date.now() / 1000);
