/**
 * Effect platform layer selection
 *
 * Returns the Layer that provides FileSystem, Path and the other platform
 * services to every file operation in this package.
 */

import { NodeContext } from "@effect/platform-node";

/**
 * Get the Effect platform layer for file I/O
 *
 * @returns Node.js platform layer
 */
export function getPlatform() {
  return NodeContext.layer;
}
