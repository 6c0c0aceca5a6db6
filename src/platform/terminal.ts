/**
 * Terminal detection utilities for berth.
 *
 * Decides whether progress can be repainted in place and whether a
 * container gets a TTY.
 */

import { env } from "node:process";

/** Anything that may be attached to a terminal. */
export interface MaybeTerminal {
  isTTY?: boolean;
}

/**
 * Check if a stream is attached to a terminal.
 *
 * TERM=dumb disables terminal handling even on a TTY.
 */
export function isTerminal(stream: MaybeTerminal): boolean {
  return stream.isTTY === true && env.TERM !== "dumb";
}
