import { assert, describe, test } from "@tessel/testkit";
import { type GrowItem, distributeGrow, splitEvenly } from "../engine/grow.js";

function growItem(size: number, max: number | null = null, min = size): GrowItem {
  return { size, min, max, grow: true };
}

function fixedItem(size: number): GrowItem {
  return { size, min: size, max: null, grow: false };
}

describe("splitEvenly", () => {
  test("hands the remainder to the earliest shares", () => {
    assert.deepEqual(splitEvenly(10, 3), [4, 3, 3]);
    assert.deepEqual(splitEvenly(736, 3), [246, 245, 245]);
  });

  test("zero total yields zero shares", () => {
    assert.deepEqual(splitEvenly(0, 2), [0, 0]);
  });
});

describe("distributeGrow", () => {
  test("splits evenly among equal growable items", () => {
    const res = distributeGrow(736, [growItem(0), growItem(0), growItem(0)]);
    assert.deepEqual(res.sizes, [246, 245, 245]);
    assert.equal(res.remaining, 0);
    assert.equal(res.iterations, 1);
    assert.equal(res.exhausted, false);
  });

  test("raises the smallest tier to the next before growing both", () => {
    const res = distributeGrow(100, [growItem(10), growItem(40), fixedItem(0)]);
    assert.deepEqual(res.sizes, [50, 50, 0]);
    assert.equal(res.remaining, 0);
    assert.equal(res.iterations, 2);
  });

  test("a capped item stops at its max and the other absorbs the rest", () => {
    const res = distributeGrow(500, [growItem(0, 200), growItem(0)]);
    assert.deepEqual(res.sizes, [200, 300]);
    assert.equal(res.remaining, 0);
    assert.equal(res.iterations, 2);
  });

  test("a cap above the even share is never reached", () => {
    const res = distributeGrow(300, [growItem(0, 200), growItem(0)]);
    assert.deepEqual(res.sizes, [150, 150]);
    assert.equal(res.remaining, 0);
  });

  test("an item already at its max drops out on its first turn", () => {
    const res = distributeGrow(50, [growItem(10, 10), growItem(0)]);
    assert.deepEqual(res.sizes, [10, 40]);
    assert.equal(res.remaining, 0);
    assert.equal(res.iterations, 3);
  });

  test("leaves space unconsumed when every growable item is capped", () => {
    const res = distributeGrow(100, [growItem(0, 10), growItem(0, 20)]);
    assert.deepEqual(res.sizes, [10, 20]);
    assert.equal(res.remaining, 70);
    assert.equal(res.iterations, 1);
  });

  test("fewer pixels than tied items go to the earliest items", () => {
    const res = distributeGrow(2, [growItem(0), growItem(0), growItem(0)]);
    assert.deepEqual(res.sizes, [1, 1, 0]);
    assert.equal(res.remaining, 0);
  });

  test("no growable items leaves sizes untouched", () => {
    const res = distributeGrow(100, [fixedItem(30)]);
    assert.deepEqual(res.sizes, [30]);
    assert.equal(res.remaining, 70);
    assert.equal(res.iterations, 0);
  });

  test("negative remaining is reported and not distributed", () => {
    const res = distributeGrow(10, [growItem(20)]);
    assert.deepEqual(res.sizes, [20]);
    assert.equal(res.remaining, -10);
    assert.equal(res.iterations, 0);
  });

  test("unequal starting sizes converge to equal sizes", () => {
    const res = distributeGrow(30, [growItem(0, null, 0), growItem(10, null, 10)]);
    assert.deepEqual(res.sizes, [15, 15]);
  });

  test("stops on the iteration cap", () => {
    const res = distributeGrow(100, [growItem(10), growItem(40), fixedItem(0)], 1);
    assert.deepEqual(res.sizes, [40, 40, 0]);
    assert.equal(res.remaining, 20);
    assert.equal(res.iterations, 1);
    assert.equal(res.exhausted, true);
  });

  test("empty item list", () => {
    const res = distributeGrow(50, []);
    assert.deepEqual(res.sizes, []);
    assert.equal(res.remaining, 50);
  });
});
