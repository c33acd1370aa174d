/**
 * Minimal logging contract accepted by the compiler core.
 *
 * The CLI passes its `DebugLogger`; library callers may pass `console` or nothing.
 */
export interface Logger {
    log(...args: unknown[]): void;
    group?(title: string): void;
}

export const silentLogger: Logger = {
    log() {},
};
