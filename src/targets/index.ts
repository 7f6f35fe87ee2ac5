/**
 * Text targets - Files and in-memory buffers behind one interface
 */

export type { TextTarget, TextTargetKind } from './text-target.js';
export { FileTarget } from './file-target.js';
export { BufferStore, BufferTarget, BufferNotFoundError } from './buffer-store.js';
