/** Default listen address for `serve`. */
export const DEFAULT_LISTEN = "127.0.0.1:4321";

/** Read deadline applied to the framed connection while a bridge runs. */
export const TICK_DURATION_MS = 10;
/** Session ends after this long without data in either direction. */
export const INACTIVITY_TIMEOUT_MS = 60 * 1000;
/** Upper bound for one chunk read from the local byte source. */
export const TRANSFER_BUFFER_SIZE = 1 << 20;

export const VERSION = "0.3.0";
