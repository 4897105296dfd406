import assert from "node:assert/strict";
import { dsl } from "../dsl.js";
import { CompileError } from "../errors.js";
import {
  identityMatrix,
  invertRigidMatrix,
  matrixFromTranslation,
  matrixTranslation,
  multiplyMatrices,
  normalizeTransform,
  transformDirection,
  transformPoint,
} from "../transform.js";
import { runTests } from "./test_utils.js";

const closeAll = (actual: number[], expected: number[], label: string) => {
  assert.equal(actual.length, expected.length, label);
  actual.forEach((value, i) =>
    assert.ok(Math.abs(value - (expected[i] ?? 0)) < 1e-9, `${label}[${i}]: ${value}`)
  );
};

const tests = [
  {
    name: "transform: translations move points but not directions",
    fn: async () => {
      const matrix = matrixFromTranslation([10, -5, 2]);
      assert.deepEqual(matrixTranslation(matrix), [10, -5, 2]);
      assert.deepEqual(transformPoint(matrix, [1, 1, 1]), [11, -4, 3]);
      assert.deepEqual(transformDirection(matrix, [0, 1, 0]), [0, 1, 0]);
    },
  },
  {
    name: "transform: rigid inverse undoes the placement",
    fn: async () => {
      // Quarter turn about +Z, then a shift.
      const matrix = normalizeTransform({
        matrix: [0, 1, 0, 0, -1, 0, 0, 0, 0, 0, 1, 0, 12, -3, 4, 1],
      });
      closeAll(transformPoint(matrix, [1, 0, 0]), [12, -2, 4], "placed point");
      closeAll(transformDirection(matrix, [0, 1, 0]), [-1, 0, 0], "placed direction");
      const inverse = invertRigidMatrix(matrix);
      closeAll(multiplyMatrices(matrix, inverse), identityMatrix(), "m * m^-1");
      closeAll(transformPoint(inverse, transformPoint(matrix, [5, 6, 7])), [5, 6, 7], "round trip");
    },
  },
  {
    name: "transform: inverting a slot translation keeps zero components positive",
    fn: async () => {
      const inverse = invertRigidMatrix(matrixFromTranslation([0, 85.2, 0]));
      assert.deepEqual(inverse, matrixFromTranslation([0, -85.2, 0]));
      assert.ok(!Object.is(inverse[12], -0), "x translation is +0");
      assert.ok(!Object.is(inverse[14], -0), "z translation is +0");
    },
  },
  {
    name: "transform: assembly transforms carry a full matrix",
    fn: async () => {
      const placed = dsl.transform({ translation: [0, 85.2, 0] });
      assert.deepEqual(placed.matrix, matrixFromTranslation([0, 85.2, 0]));
      assert.deepEqual(normalizeTransform(), identityMatrix());
      assert.throws(
        () => normalizeTransform({ matrix: [1, 2, 3] }),
        (err: unknown) => err instanceof CompileError && err.code === "transform_invalid"
      );
    },
  },
];

runTests(tests).catch((err) => {
  console.error(err);
  process.exitCode = 1;
});
