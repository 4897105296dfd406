import assert from "node:assert/strict";
import { UnknownAssemblyType, UnknownSlot } from "../errors.js";
import {
  ASSEMBLY_LAYOUTS,
  parseAssemblyType,
  positionOf,
  resolveAssembly,
  slotPositions,
} from "../hub/layout.js";
import { composeVariant } from "../hub/variants.js";
import { invertRigidMatrix, matrixTranslation, transformPoint } from "../transform.js";
import { buildSlot, hubFixture } from "./hub_test_utils.js";
import { runTests } from "./test_utils.js";

const close = (actual: number, expected: number, label: string) =>
  assert.ok(Math.abs(actual - expected) < 1e-9, `${label}: expected ${expected}, got ${actual}`);

const tests = [
  {
    name: "layout: type A puts the controller at slot 2 and usb at slot 3",
    fn: async () => {
      const { config, library } = await hubFixture();
      const slots = resolveAssembly(config, library, "A");
      assert.deepEqual(
        slots.map((slot) => slot.position.label),
        [1, 2, 3, 4, 5, 6]
      );
      assert.equal(slots[1]?.position.variant, "controller");
      assert.equal(slots[2]?.position.variant, "usb");
      assert.deepEqual(
        slots.map((slot) => slot.position.variant),
        ["basic", "controller", "usb", "basic", "basic", "basic"]
      );
    },
  },
  {
    name: "layout: type B puts the controller at slot 5 and usb at slot 3",
    fn: async () => {
      const { config, library } = await hubFixture();
      const slots = resolveAssembly(config, library, "B");
      assert.deepEqual(
        slots.map((slot) => slot.position.variant),
        ["basic", "basic", "usb", "basic", "controller", "basic"]
      );
    },
  },
  {
    name: "layout: both types place one controller, one usb and four basic slots",
    fn: async () => {
      for (const layout of Object.values(ASSEMBLY_LAYOUTS)) {
        const variants = Object.values(layout.slots).map((slot) => slot.variant);
        assert.equal(variants.filter((v) => v === "controller").length, 1, layout.type);
        assert.equal(variants.filter((v) => v === "usb").length, 1, layout.type);
        assert.equal(variants.filter((v) => v === "basic").length, 4, layout.type);
      }
    },
  },
  {
    name: "layout: slots sit on the hexagonal grid",
    fn: async () => {
      const { config } = await hubFixture();
      const { columnPitch, rowPitch, columnOffset } = config.grid;
      const positions = slotPositions(config, "A");
      const expected: Array<[number, number]> = [
        [0, 0],
        [columnPitch, columnOffset],
        [2 * columnPitch, 0],
        [0, -rowPitch],
        [columnPitch, -rowPitch + columnOffset],
        [2 * columnPitch, -rowPitch],
      ];
      positions.forEach((position, index) => {
        const [x, y] = expected[index] ?? [0, 0];
        close(position.translation[0], x, `slot ${position.label} x`);
        close(position.translation[1], y, `slot ${position.label} y`);
        assert.equal(position.translation[2], 0);
        assert.deepEqual(matrixTranslation(position.matrix), position.translation);
      });
      assert.equal(positions[0]?.columnOffset, 0);
      assert.equal(positions[1]?.row, 0);
      assert.equal(positions[4]?.column, 1);
    },
  },
  {
    name: "layout: the middle column moves 2h between type A and type B",
    fn: async () => {
      const { config, library } = await hubFixture();
      const a = resolveAssembly(config, library, "A");
      const b = resolveAssembly(config, library, "B");
      const h = config.grid.columnOffset;
      const slotA = positionOf(a, 5);
      const slotB = positionOf(b, 5);
      close(slotA.columnOffset - slotB.columnOffset, 2 * h, "offset difference");
      close(slotA.translation[1] - slotB.translation[1], 2 * h, "translation difference");
      close(slotA.translation[0], slotB.translation[0], "same column");
      assert.equal(positionOf(a, 4).columnOffset, positionOf(b, 4).columnOffset);
    },
  },
  {
    name: "layout: slots of one variant share a single composed recipe",
    fn: async () => {
      const { config, library } = await hubFixture();
      const slots = resolveAssembly(config, library, "A");
      assert.deepEqual(
        slots.map((slot) => slot.body.part.id),
        ["slot-1", "slot-2", "slot-3", "slot-4", "slot-5", "slot-6"]
      );
      // Slots 4 and 6 are basic with no rails; slot 1 carries the SE socket.
      assert.equal(slots[3]?.body.part.features, slots[5]?.body.part.features);
      assert.notEqual(slots[0]?.body.part.features, slots[3]?.body.part.features);
      assert.notEqual(slots[0]?.body.part.features, slots[1]?.body.part.features);
    },
  },
  {
    name: "layout: rails pair each male wall with its neighbour's socket",
    fn: async () => {
      const { config } = await hubFixture();
      const rails = (type: string) =>
        slotPositions(config, type).map((position) => position.connectors.join("+"));
      assert.deepEqual(rails("A"), ["SE", "", "SW", "", "NE+NW", ""]);
      assert.deepEqual(rails("B"), ["", "SE+SW", "", "NE", "", "NW"]);
    },
  },
  {
    name: "layout: a male pin lands in its mate's socket",
    fn: async () => {
      const { config, library, backend } = await hubFixture();
      const slots = resolveAssembly(config, library, "A");
      const male = slots[4];
      const female = slots[2];
      if (!male || !female) throw new Error("slots 5 and 3 expected");
      const rail = library.get("connector-ne");
      if (rail.kind !== "connector-ne") throw new Error("expected connector-ne");
      const [ax, ay] = rail.parameters.anchor;
      const tip = transformPoint(male.position.matrix, [ax, ay + 8, 2.5]);
      const local = transformPoint(invertRigidMatrix(female.position.matrix), tip);
      assert.equal(backend.contains(buildSlot(backend, male.body), [ax, ay + 8, 2.5]), true);
      assert.equal(backend.contains(buildSlot(backend, female.body), local), false);
      const plain = composeVariant(library, female.position.variant);
      assert.equal(backend.contains(buildSlot(backend, plain), local), true);
    },
  },
  {
    name: "layout: a usb wall on a socket side drops the whole rail pair",
    fn: async () => {
      const { config } = await hubFixture({ "usb.wallAngle": { value: -60, unit: "deg" } });
      const rails = slotPositions(config, "A").map((position) => position.connectors.join("+"));
      assert.deepEqual(rails, ["SE", "", "", "", "NW", ""]);
    },
  },
  {
    name: "layout: unknown types and labels are rejected",
    fn: async () => {
      const { config, library } = await hubFixture();
      assert.throws(
        () => resolveAssembly(config, library, "C"),
        (err: unknown) => err instanceof UnknownAssemblyType && err.assemblyType === "C"
      );
      const slots = resolveAssembly(config, library, "B");
      assert.throws(
        () => positionOf(slots, 7),
        (err: unknown) => err instanceof UnknownSlot && err.slot === 7
      );
    },
  },
  {
    name: "layout: assembly type names parse loosely",
    fn: async () => {
      assert.equal(parseAssemblyType("A"), "A");
      assert.equal(parseAssemblyType("b"), "B");
      assert.equal(parseAssemblyType("type-a"), "A");
      assert.equal(parseAssemblyType("Type B"), "B");
      assert.throws(() => parseAssemblyType("type-c"), UnknownAssemblyType);
    },
  },
];

runTests(tests).catch((err) => {
  console.error(err);
  process.exitCode = 1;
});
