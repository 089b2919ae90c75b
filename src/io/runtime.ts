/**
 * Effect platform layer selection
 *
 * All file access goes through `@effect/platform`'s FileSystem service; this
 * module decides which implementation backs it.
 */

import { NodeContext } from "@effect/platform-node";

/**
 * Get the Effect platform layer providing FileSystem and Path
 */
export function getPlatform(): typeof NodeContext.layer {
  return NodeContext.layer;
}
