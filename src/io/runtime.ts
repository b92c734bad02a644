/**
 * Effect platform layer selection
 *
 * File access and process execution go through @effect/platform services.
 * This module is the one place that decides which implementation provides
 * them, so tests and alternative hosts only need to swap it here.
 */

import { NodeContext } from "@effect/platform-node";
import type { Layer } from "effect";

/**
 * Get the Effect platform layer for the current runtime
 *
 * @returns Layer providing FileSystem, Path and CommandExecutor
 */
export function getPlatform(): Layer.Layer<NodeContext.NodeContext> {
  return NodeContext.layer;
}
