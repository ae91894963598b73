import { debuglog } from "node:util";

/**
 * Trace output for the package, enabled with `NODE_DEBUG=zipstamp`.
 */
export const debug = debuglog("zipstamp");
