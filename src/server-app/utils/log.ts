/**
 * Diagnostics sink for repair progress (versions, sizes, offsets found).
 * Output is informational only; nothing reads it back.
 */
export type Log = (message: string) => void;

export const consoleLog: Log = (message) => console.log(message);

export const silentLog: Log = () => {};
