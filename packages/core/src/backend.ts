/**
 * Rendering backend contract.
 *
 * The core hands geometry to a backend and never touches devices, surfaces,
 * shaders or buffers itself. `Pass` is whatever per-frame handle the backend
 * needs (a render pass, a command encoder, a test recorder).
 */

import type { RectMesh } from "./geometry/types.js";
import type { Rgb24 } from "./widgets/style.js";

export interface RenderBackend<Pass> {
  /** Fill the whole target with the background color. Called once per frame, first. */
  clear(color: Rgb24, pass: Pass): void;
  /** Submit one rectangle's geometry. Called in paint order. */
  submit(mesh: RectMesh, pass: Pass): void;
  /** Optional end-of-frame hook, called after the last submit. */
  present?(pass: Pass): void;
}
