/**
 * @checkpoint-guide/types
 *
 * Shared domain types for the checkpoint navigation engine.
 *
 * - Location: checkpoints and the graph query surface
 * - Route: calculated paths and their instructions
 * - Session: the live navigation state
 * - Tag: checkpoint tag payloads and the reader boundary
 */

export * from "./location.js";
export * from "./route.js";
export * from "./session.js";
export * from "./tag.js";
