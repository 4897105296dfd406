import assert from "node:assert/strict";
import { InvalidPlacement, UnknownFeature } from "../errors.js";
import {
  applyFeature,
  emptySlotBody,
  FEATURE_KINDS,
  isFeatureKind,
} from "../hub/feature_library.js";
import { composeFeatures } from "../hub/variants.js";
import { buildSlot, hubFixture, sample } from "./hub_test_utils.js";
import type { Point3D } from "../ir.js";
import { runTests } from "./test_utils.js";

const placementOf = (kind: string, detail: RegExp) => (err: unknown) =>
  err instanceof InvalidPlacement && err.kind === kind && detail.test(err.message);

const tests = [
  {
    name: "features: the library defines every kind once and freezes it",
    fn: async () => {
      const { library } = await hubFixture();
      assert.deepEqual(library.kinds, [
        "base-shell",
        "floor-holes",
        "magnet-bosses",
        "pogo-bosses",
        "controller-bosses",
        "usb-bosses",
        "usb-cutout",
        "connector-ne",
        "connector-nw",
        "connector-se",
        "connector-sw",
      ]);
      assert.deepEqual(FEATURE_KINDS, library.kinds);
      const holes = library.get("floor-holes");
      assert.equal(holes.effect, "subtractive");
      assert.equal(holes.phase, "structural");
      assert.ok(Object.isFrozen(holes));
      assert.ok(Object.isFrozen(holes.parameters));
      assert.equal(isFeatureKind("usb-cutout"), true);
      assert.equal(isFeatureKind("fan-mount"), false);
    },
  },
  {
    name: "features: unknown kinds fail with UnknownFeature",
    fn: async () => {
      const { library } = await hubFixture();
      assert.throws(
        () => library.get("fan-mount"),
        (err: unknown) => err instanceof UnknownFeature && err.kind === "fan-mount"
      );
    },
  },
  {
    name: "features: resolved positions follow the parameters",
    fn: async () => {
      const { library } = await hubFixture();
      const holes = library.get("floor-holes");
      assert.equal(holes.kind, "floor-holes");
      if (holes.kind !== "floor-holes") return;
      assert.equal(holes.parameters.positions.length, 6);
      assert.deepEqual(holes.parameters.positions[0], [40, 0]);

      const usb = library.get("usb-bosses");
      if (usb.kind !== "usb-bosses") throw new Error("expected usb-bosses");
      assert.equal(usb.parameters.holeStart, 1);
      const [x, y] = usb.parameters.positions[3] ?? [0, 0];
      assert.equal(x, 7);
      assert.ok(Math.abs(y - -36.7) < 1e-9);
    },
  },
  {
    name: "features: non-shell features need the base shell",
    fn: async () => {
      const { library } = await hubFixture();
      assert.throws(
        () => applyFeature(emptySlotBody(), library.get("floor-holes")),
        placementOf("floor-holes", /base shell must be applied first/)
      );
    },
  },
  {
    name: "features: a feature cannot be applied twice",
    fn: async () => {
      const { library } = await hubFixture();
      const shell = applyFeature(emptySlotBody(), library.get("base-shell"));
      const holes = applyFeature(shell, library.get("floor-holes"));
      assert.throws(
        () => applyFeature(holes, library.get("floor-holes")),
        placementOf("floor-holes", /already applied/)
      );
      assert.throws(
        () => applyFeature(holes, library.get("base-shell")),
        placementOf("base-shell", /already applied/)
      );
    },
  },
  {
    name: "features: applying returns a new body and leaves the input alone",
    fn: async () => {
      const { library } = await hubFixture();
      const shell = applyFeature(emptySlotBody("slot-x"), library.get("base-shell"));
      const count = shell.part.features.length;
      const drilled = applyFeature(shell, library.get("floor-holes"));
      assert.equal(shell.part.features.length, count);
      assert.deepEqual(shell.applied, ["base-shell"]);
      assert.deepEqual(drilled.applied, ["base-shell", "floor-holes"]);
      assert.equal(drilled.part.id, "slot-x");
      assert.notEqual(drilled.output, shell.output);
      assert.equal(drilled.envelope, shell.envelope);
    },
  },
  {
    name: "features: base shell has floor, walls, slope, groove and rim",
    fn: async () => {
      const { library, backend } = await hubFixture();
      const shell = applyFeature(emptySlotBody(), library.get("base-shell"));
      const solid = buildSlot(backend, shell);
      const inside = (x: number, y: number, z: number) => backend.contains(solid, [x, y, z]);
      assert.equal(inside(0, 0, 1), true, "floor");
      assert.equal(inside(0, 0, 5), false, "interior");
      assert.equal(inside(0, 41, 10), true, "north wall");
      assert.equal(inside(0, 41, 15), true, "north wall beside the groove");
      assert.equal(inside(0, 40, 15), false, "lid groove");
      assert.equal(inside(0, 41, 17), false, "above the wall");
      assert.equal(inside(0, -41, 10), true, "south wall below the slope");
      assert.equal(inside(0, -41, 12), false, "south wall above the slope");
      assert.equal(inside(0, -42.4, 5), true, "rim");
      assert.equal(inside(0, -42.4, 10.5), false, "above the rim");
      const rim = shell.envelope?.rimApothem ?? 0;
      assert.ok(Math.abs(rim - 42.6) < 1e-9, `rim apothem ${rim}`);
    },
  },
  {
    name: "features: floor holes are countersunk on the underside",
    fn: async () => {
      const { library, backend } = await hubFixture();
      const shell = applyFeature(emptySlotBody(), library.get("base-shell"));
      const plain = buildSlot(backend, shell);
      const drilled = buildSlot(backend, applyFeature(shell, library.get("floor-holes")));
      // 1.6 from the hole axis: inside the 45 degree sink near z = 0, solid above it.
      const points: Point3D[] = [
        [41.6, 0, 0.1],
        [41.6, 0, 1.5],
        [40, 0, 1.9],
      ];
      assert.deepEqual(sample(backend, plain, points), [true, true, true]);
      assert.deepEqual(sample(backend, drilled, points), [false, true, false]);

      const deep = await hubFixture({ "floorHoles.chamfer": 2.5 });
      const deepShell = applyFeature(emptySlotBody(), deep.library.get("base-shell"));
      assert.throws(
        () => applyFeature(deepShell, deep.library.get("floor-holes")),
        placementOf("floor-holes", /countersink is deeper than the floor/)
      );
    },
  },
  {
    name: "features: a male rail leaves the wall and stays out of the interior",
    fn: async () => {
      const { library, backend } = await hubFixture();
      const rail = library.get("connector-ne");
      if (rail.kind !== "connector-ne") throw new Error("expected connector-ne");
      const [ax, ay] = rail.parameters.anchor;
      assert.ok(Math.abs(ax - 31.8064) < 1e-3, `anchor x ${ax}`);
      assert.ok(Math.abs(ay - 25.1096) < 1e-3, `anchor y ${ay}`);
      const points: Point3D[] = [
        [ax, 33, 2],
        [ax - 1.5, 25.5, 3],
      ];
      const basic = buildSlot(backend, composeFeatures(library, ["base-shell"], "plain"));
      const railed = buildSlot(backend, composeFeatures(library, ["base-shell", "connector-ne"], "ne"));
      assert.deepEqual(sample(backend, basic, points), [false, false]);
      assert.deepEqual(sample(backend, railed, points), [true, false]);
    },
  },
  {
    name: "features: a female rail adds a housing and opens a socket through the wall",
    fn: async () => {
      const { library, backend } = await hubFixture();
      const socket = library.get("connector-sw");
      if (socket.kind !== "connector-sw") throw new Error("expected connector-sw");
      const [cx, cy] = socket.parameters.center;
      assert.ok(Math.abs(cx - -41.9790) < 1e-3, `center x ${cx}`);
      assert.ok(Math.abs(cy - -9.4904) < 1e-3, `center y ${cy}`);
      // Housing beside the socket, then the socket inside the SW wall.
      const points: Point3D[] = [
        [-39, -5.5, 3],
        [-41.98, -8, 2.5],
      ];
      const basic = buildSlot(backend, composeFeatures(library, ["base-shell"], "plain"));
      const socketed = buildSlot(
        backend,
        composeFeatures(library, ["base-shell", "connector-sw"], "sw")
      );
      assert.deepEqual(sample(backend, basic, points), [false, true]);
      assert.deepEqual(sample(backend, socketed, points), [true, false]);
    },
  },
  {
    name: "features: a turned usb wall moves the opening to that wall",
    fn: async () => {
      const south = await hubFixture();
      const west = await hubFixture({ "usb.wallAngle": { value: -60, unit: "deg" } });
      const cutout = west.library.get("usb-cutout");
      if (cutout.kind !== "usb-cutout") throw new Error("expected usb-cutout");
      assert.equal(cutout.parameters.side, "SW");
      const points: Point3D[] = [
        [0, -41, 5],
        [-35.507, -20.5, 5],
      ];
      const usb = ["base-shell", "usb-bosses", "usb-cutout"];
      const southSolid = buildSlot(south.backend, composeFeatures(south.library, usb, "usb"));
      const westSolid = buildSlot(west.backend, composeFeatures(west.library, usb, "usb"));
      assert.deepEqual(sample(south.backend, southSolid, points), [false, true]);
      assert.deepEqual(sample(west.backend, westSolid, points), [true, false]);
    },
  },
  {
    name: "features: oversized or misplaced features are rejected",
    fn: async () => {
      const tall = await hubFixture({ "pogo.height": 20 });
      const shell = applyFeature(emptySlotBody(), tall.library.get("base-shell"));
      const withHoles = applyFeature(shell, tall.library.get("floor-holes"));
      assert.throws(
        () => applyFeature(withHoles, tall.library.get("pogo-bosses")),
        placementOf("pogo-bosses", /taller than the wall/)
      );

      const wide = await hubFixture({ "floorHoles.distance": 45 });
      const wideShell = applyFeature(emptySlotBody(), wide.library.get("base-shell"));
      assert.throws(
        () => applyFeature(wideShell, wide.library.get("floor-holes")),
        (err: unknown) => err instanceof InvalidPlacement && err.kind === "floor-holes"
      );

      const corner = await hubFixture({ "usbCutout.cornerRadius": 4 });
      const cornerShell = applyFeature(emptySlotBody(), corner.library.get("base-shell"));
      assert.throws(
        () => applyFeature(cornerShell, corner.library.get("usb-cutout")),
        placementOf("usb-cutout", /corner radius/)
      );
    },
  },
];

runTests(tests).catch((err) => {
  console.error(err);
  process.exitCode = 1;
});
