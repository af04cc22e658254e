import { assert, describe, test } from "@tessel/testkit";
import { colors, isRgb24, rgb, rgbB, rgbG, rgbR, rgbToFloats } from "../style.js";

describe("rgb", () => {
  test("packs channels as 0xRRGGBB", () => {
    assert.equal(rgb(0x12, 0x34, 0x56), 0x123456);
    assert.equal(rgbR(0x123456), 0x12);
    assert.equal(rgbG(0x123456), 0x34);
    assert.equal(rgbB(0x123456), 0x56);
  });

  test("clamps and rounds channels", () => {
    assert.equal(rgb(300, -4, 127.6), 0xff0080);
    assert.equal(rgb(Number.NaN, Number.POSITIVE_INFINITY, 0), 0x000000);
  });

  test("converts to unit floats", () => {
    assert.deepEqual(rgbToFloats(colors.white), [1, 1, 1]);
    assert.deepEqual(rgbToFloats(rgb(0, 255, 0)), [0, 1, 0]);
  });

  test("isRgb24 accepts 24-bit integers only", () => {
    assert.equal(isRgb24(0), true);
    assert.equal(isRgb24(0xffffff), true);
    assert.equal(isRgb24(0x1000000), false);
    assert.equal(isRgb24(-1), false);
    assert.equal(isRgb24(1.5), false);
    assert.equal(isRgb24("0xffffff"), false);
  });

  test("palette values", () => {
    assert.equal(colors.green, 0x008000);
    assert.equal(colors.purple, 0x800080);
    assert.equal(colors.aqua, 0x00ffff);
  });
});
