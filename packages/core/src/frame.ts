/**
 * Evaluation frames
 *
 * A frame is the only per-call state threaded through evaluation. It is
 * immutable: descending through a forward reference creates a new frame.
 */

import { config } from "./config.js";
import type { Cursor } from "./cursor.js";
import { DepthLimitError } from "./errors.js";

export interface Frame {
  /** Forward references entered between the root and this point. */
  readonly depth: number;
  /** 0 means unbounded. */
  readonly maxDepth: number;
}

export function rootFrame(maxDepth: number = config.get().limits.depth): Frame {
  return { depth: 0, maxDepth };
}

/** Frame one level deeper; throws `DepthLimitError` past the bound. */
export function descend(frame: Frame, at: Cursor<unknown>): Frame {
  const depth = frame.depth + 1;
  if (frame.maxDepth > 0 && depth > frame.maxDepth) {
    throw new DepthLimitError(frame.maxDepth, at);
  }
  return { depth, maxDepth: frame.maxDepth };
}
