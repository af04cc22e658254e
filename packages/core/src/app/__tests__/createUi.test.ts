import { mock } from "node:test";
import { assert, describe, test } from "@tessel/testkit";
import { TesselError } from "../../abi.js";
import { GROW, sizing } from "../../layout/types.js";
import { mm } from "../../layout/units.js";
import { createRecordingBackend } from "../../testing/recordingBackend.js";
import { colors, rgb } from "../../widgets/style.js";
import { ui } from "../../widgets/ui.js";
import { createUi, resolveUiConfig } from "../createUi.js";
import type { UiLayoutSnapshot } from "../types.js";

const threeColumns = ui.row(
  { key: "root", sizing: sizing(GROW), padding: 16, childGap: 16, color: colors.white },
  [
    ui.leaf({ key: "a", sizing: sizing(GROW), color: colors.green }),
    ui.leaf({ key: "b", sizing: sizing(GROW), color: colors.purple }),
    ui.leaf({ key: "c", sizing: sizing(GROW), color: colors.aqua }),
  ],
);

function isInvalidProps(message: string): (err: unknown) => boolean {
  return (err) =>
    err instanceof TesselError && err.code === "TESSEL_INVALID_PROPS" && err.message === message;
}

describe("resolveUiConfig", () => {
  test("fills defaults", () => {
    const cfg = resolveUiConfig(undefined);
    assert.equal(cfg.background, 0);
    assert.deepEqual(cfg.viewport, { w: 0, h: 0 });
    assert.equal(cfg.dpi, 96);
    assert.equal(cfg.maxGrowIterations, 10_000);
    assert.equal(cfg.coordinateSpace, "pixels");
    assert.equal(Object.isFrozen(cfg), true);
  });

  test("keeps provided values", () => {
    const cfg = resolveUiConfig({
      background: colors.blue,
      viewport: { w: 320, h: 240 },
      dpi: 144,
      maxGrowIterations: 8,
      coordinateSpace: "clip",
    });
    assert.equal(cfg.background, 0x0000ff);
    assert.deepEqual(cfg.viewport, { w: 320, h: 240 });
    assert.equal(cfg.dpi, 144);
    assert.equal(cfg.maxGrowIterations, 8);
    assert.equal(cfg.coordinateSpace, "clip");
  });

  test("rejects invalid values", () => {
    assert.throws(
      () => resolveUiConfig({ viewport: { w: -1, h: 10 } }),
      isInvalidProps("viewport must be non-negative int32 pixels, got -1x10"),
    );
    assert.throws(
      () => resolveUiConfig({ dpi: 0 }),
      isInvalidProps("dpi must be a positive finite number"),
    );
    assert.throws(
      () => resolveUiConfig({ maxGrowIterations: 2.5 }),
      isInvalidProps("maxGrowIterations must be a positive integer"),
    );
    assert.throws(
      () => resolveUiConfig({ background: -3 }),
      isInvalidProps("background must be an Rgb24 (0x000000..0xffffff)"),
    );
  });
});

describe("createUi", () => {
  test("frame clears, draws in pre-order and presents", () => {
    const app = createUi({ viewport: { w: 800, h: 600 }, background: rgb(10, 20, 30) });
    assert.equal(app.setRoot(threeColumns).ok, true);
    const backend = createRecordingBackend();
    const res = app.frame(backend, "frame-1");
    assert.equal(res.ok, true);

    assert.deepEqual(
      backend.calls.map((c) => c.kind),
      ["clear", "submit", "submit", "submit", "submit", "present"],
    );
    assert.deepEqual(backend.calls[0], { kind: "clear", color: rgb(10, 20, 30), pass: "frame-1" });
    assert.deepEqual(backend.submittedRects(), [
      { x: 0, y: 0, w: 800, h: 600 },
      { x: 16, y: 16, w: 246, h: 568 },
      { x: 278, y: 16, w: 245, h: 568 },
      { x: 539, y: 16, w: 245, h: 568 },
    ]);
    assert.equal(backend.frames(), 1);
  });

  test("findRect reads the last layout", () => {
    const app = createUi({ viewport: { w: 800, h: 600 } });
    app.setRoot(threeColumns);
    assert.equal(app.findRect("b"), null);
    app.computeLayout();
    assert.deepEqual(app.findRect("b"), { x: 278, y: 16, w: 245, h: 568 });
    assert.equal(app.findRect("missing"), null);
  });

  test("resizing re-seeds the root on the next layout", () => {
    const app = createUi({ viewport: { w: 800, h: 600 } });
    app.setRoot(threeColumns);
    app.computeLayout();
    app.setViewport({ w: 400, h: 300 });
    assert.deepEqual(app.getViewport(), { w: 400, h: 300 });
    const res = app.computeLayout();
    if (!res.ok || res.value === null) throw new Error("expected a layout");
    assert.deepEqual(res.value.rect, { x: 0, y: 0, w: 400, h: 300 });
    // 400 - 32 - 32 = 336 split three ways.
    assert.deepEqual(app.findRect("a"), { x: 16, y: 16, w: 112, h: 268 });
    assert.deepEqual(app.findRect("c"), { x: 272, y: 16, w: 112, h: 268 });
  });

  test("setViewport rejects negative or fractional sizes", () => {
    const app = createUi();
    assert.throws(
      () => app.setViewport({ w: 10.5, h: 10 }),
      isInvalidProps("setViewport(size) must be non-negative int32 pixels, got 10.5x10"),
    );
    assert.deepEqual(app.getViewport(), { w: 0, h: 0 });
  });

  test("no root: layout is null and draw only clears, warning once", () => {
    const warn = mock.method(console, "warn", () => undefined);
    try {
      const app = createUi({ viewport: { w: 10, h: 10 } });
      assert.equal(app.hasRoot(), false);
      assert.deepEqual(app.computeLayout(), { ok: true, value: null });
      const backend = createRecordingBackend();
      assert.equal(app.draw(backend, "p"), 0);
      assert.equal(app.draw(backend, "p"), 0);
      assert.deepEqual(
        backend.calls.map((c) => c.kind),
        ["clear", "present", "clear", "present"],
      );
      assert.equal(warn.mock.callCount(), 1);
      assert.deepEqual(warn.mock.calls[0]?.arguments, [
        "[tessel][ui] draw() called with no root; only the background was cleared.",
      ]);
    } finally {
      warn.mock.restore();
    }
  });

  test("a failed setRoot keeps the previous tree", () => {
    const app = createUi({ viewport: { w: 800, h: 600 } });
    app.setRoot(threeColumns);
    const res = app.setRoot(ui.leaf({ minWidth: 5, maxWidth: 1 }));
    assert.deepEqual(res, {
      ok: false,
      fatal: {
        code: "TESSEL_INVALID_PROPS",
        detail: "leaf: <leaf> minWidth (5) must not exceed maxWidth (1)",
      },
    });
    assert.equal(app.hasRoot(), true);
    app.computeLayout();
    assert.deepEqual(app.findRect("root"), { x: 0, y: 0, w: 800, h: 600 });
  });

  test("setRoot(null) clears the tree", () => {
    const app = createUi({ viewport: { w: 800, h: 600 } });
    app.setRoot(threeColumns);
    app.computeLayout();
    assert.deepEqual(app.setRoot(null), { ok: true, value: null });
    assert.equal(app.hasRoot(), false);
    assert.equal(app.findRect("root"), null);
  });

  test("setBackground changes the clear color of later frames", () => {
    const app = createUi({ viewport: { w: 8, h: 8 } });
    app.setRoot(ui.leaf());
    app.setBackground(colors.red);
    const backend = createRecordingBackend();
    app.frame(backend, "p");
    assert.deepEqual(backend.calls[0], { kind: "clear", color: 0xff0000, pass: "p" });
    assert.throws(() => app.setBackground(0x1000000), TesselError);
  });

  test("internal_onLayout reports stats for each layout", () => {
    const snapshots: UiLayoutSnapshot[] = [];
    const app = createUi({
      viewport: { w: 800, h: 600 },
      internal_onLayout: (s) => snapshots.push(s),
    });
    app.setRoot(threeColumns);
    app.computeLayout();
    assert.equal(snapshots.length, 1);
    const snap = snapshots[0];
    if (snap === undefined) throw new Error("missing snapshot");
    assert.deepEqual(snap.viewport, { w: 800, h: 600 });
    assert.deepEqual(snap.stats, {
      nodeCount: 4,
      growIterations: 1,
      overflowingContainers: 0,
      unconsumed: 0,
    });
    assert.ok(snap.layoutTimeMs >= 0);
  });

  test("clip coordinate space submits normalized meshes", () => {
    const app = createUi({ viewport: { w: 800, h: 600 }, coordinateSpace: "clip" });
    app.setRoot(threeColumns);
    const backend = createRecordingBackend();
    app.frame(backend, "p");
    const first = backend.submittedRects()[0];
    assert.deepEqual(first, { x: -1, y: -1, w: 2, h: 2 });
  });

  test("clip space with an empty viewport clears and presents without submitting", () => {
    const warn = mock.method(console, "warn", () => undefined);
    try {
      const app = createUi({ coordinateSpace: "clip" });
      app.setRoot(ui.leaf());
      const backend = createRecordingBackend();
      const res = app.frame(backend, "p");
      assert.equal(res.ok, true);
      assert.equal(app.draw(backend, "p"), 0);
      assert.deepEqual(
        backend.calls.map((c) => c.kind),
        ["clear", "present", "clear", "present"],
      );
      assert.equal(warn.mock.callCount(), 1);
      assert.deepEqual(warn.mock.calls[0]?.arguments, [
        "[tessel][ui] clip-space draw skipped: viewport is 0x0; call setViewport() first.",
      ]);
    } finally {
      warn.mock.restore();
    }
  });

  test("dpi resolves physical lengths in setRoot", () => {
    const app = createUi({ viewport: { w: 800, h: 600 }, dpi: 254 });
    app.setRoot(ui.row({}, [ui.leaf({ key: "bar", minWidth: mm(10), minHeight: 1 })]));
    app.computeLayout();
    assert.deepEqual(app.findRect("bar"), { x: 0, y: 0, w: 100, h: 1 });
  });
});
