import { assert, describe, test } from "@tessel/testkit";
import type { RenderBackend } from "../../backend.js";
import { computeLayout } from "../../layout/engine/layoutEngine.js";
import { type BuiltTree, buildTree } from "../../layout/engine/arena.js";
import { GROW, type Size, fixed, sizing } from "../../layout/types.js";
import { createRecordingBackend } from "../../testing/recordingBackend.js";
import { colors } from "../../widgets/style.js";
import type { NodeSpec } from "../../widgets/types.js";
import { ui } from "../../widgets/ui.js";
import { drawTree } from "../drawTree.js";

function laidOut(spec: NodeSpec, viewport: Size = { w: 100, h: 100 }): BuiltTree {
  const built = buildTree(spec);
  if (!built.ok) throw new Error(built.fatal.detail);
  const res = computeLayout(built.value.arena, built.value.root, viewport);
  if (!res.ok) throw new Error(res.fatal.detail);
  return built.value;
}

describe("drawTree", () => {
  test("submits parents before children, siblings in order", () => {
    const { arena, root } = laidOut(
      ui.row({ sizing: sizing(fixed(40), fixed(20)), color: colors.gray }, [
        ui.column({ color: colors.red }, [ui.leaf({ minWidth: 1, minHeight: 1 })]),
        ui.leaf({ minWidth: 2, minHeight: 2, color: colors.blue }),
      ]),
    );
    const backend = createRecordingBackend();
    const n = drawTree(arena, root, backend, "main");
    assert.equal(n, 4);
    assert.deepEqual(backend.submittedRects(), [
      { x: 0, y: 0, w: 40, h: 20 },
      { x: 0, y: 0, w: 1, h: 1 },
      { x: 0, y: 0, w: 1, h: 1 },
      { x: 1, y: 0, w: 2, h: 2 },
    ]);
    const colorsSeen = backend.calls.map((c) =>
      c.kind === "submit" ? c.mesh.vertices[0]?.color : null,
    );
    assert.deepEqual(colorsSeen, [
      [128 / 255, 128 / 255, 128 / 255],
      [1, 0, 0],
      [0, 0, 0],
      [0, 0, 1],
    ]);
  });

  test("passes the caller's pass handle through unchanged", () => {
    const { arena, root } = laidOut(ui.leaf({ minWidth: 3, minHeight: 3 }));
    const passes: string[] = [];
    const backend: RenderBackend<string> = {
      clear: () => undefined,
      submit: (_mesh, pass) => {
        passes.push(pass);
      },
    };
    drawTree(arena, root, backend, "offscreen");
    assert.deepEqual(passes, ["offscreen"]);
  });

  test("never calls clear or present", () => {
    const { arena, root } = laidOut(ui.leaf());
    const backend = createRecordingBackend();
    drawTree(arena, root, backend, "p");
    assert.deepEqual(backend.calls.map((c) => c.kind), ["submit"]);
  });

  test("clip space output covers the viewport for a full-size root", () => {
    const { arena, root } = laidOut(ui.row({ sizing: sizing(GROW) }), { w: 800, h: 600 });
    const backend = createRecordingBackend();
    drawTree(arena, root, backend, "p", { space: "clip", viewport: { w: 800, h: 600 } });
    assert.deepEqual(backend.submittedRects(), [{ x: -1, y: -1, w: 2, h: 2 }]);
  });

  test("deep trees do not exhaust the call stack", () => {
    let spec: NodeSpec = ui.leaf();
    for (let i = 0; i < 1000; i++) spec = ui.column({}, [spec]);
    const { arena, root } = laidOut(spec);
    const backend = createRecordingBackend();
    assert.equal(drawTree(arena, root, backend, "p"), 1001);
  });
});
