import assert from "node:assert/strict";
import { unzipSync } from "fflate";
import { defaultHubConfig } from "../config.js";
import { export3mf } from "../export/three_mf.js";
import { exportStl } from "../export/stl.js";
import { placeMesh } from "../export/hub.js";
import { buildPart, finalOutput } from "../executor.js";
import { applyChannels, planChannels } from "../hub/channels.js";
import { createFeatureLibrary, type SlotBody } from "../hub/feature_library.js";
import { generateHub } from "../hub/generate.js";
import { resolveAssembly, type ResolvedSlot } from "../hub/layout.js";
import { composeFeatures, composeVariant, VARIANT_FEATURES } from "../hub/variants.js";
import { getBackendContext, type BackendContext } from "./occt_test_utils.js";
import { runTests } from "./test_utils.js";

function volumeOf({ backend }: BackendContext, body: SlotBody): number {
  const solid = finalOutput(buildPart(body.part, backend), body.output);
  assert.equal(backend.checkValid(solid), true, `${body.part.id} is valid`);
  return backend.volume(solid);
}

function slotBody(slots: readonly ResolvedSlot[], label: number): SlotBody {
  const slot = slots.find((candidate) => candidate.position.label === label);
  if (!slot) throw new Error(`slot ${label} missing`);
  return slot.body;
}

const near = (actual: number, expected: number, tolerance: number, label: string) =>
  assert.ok(
    Math.abs(actual - expected) <= tolerance,
    `${label}: expected ${expected} +- ${tolerance}, got ${actual}`
  );

const tests = [
  {
    name: "occt hub: variants build valid solids and add material",
    fn: async () => {
      const { backend } = await getBackendContext();
      const library = createFeatureLibrary(await defaultHubConfig());
      const volumes = new Map<string, number>();
      for (const name of ["basic", "controller", "usb"]) {
        const body = composeVariant(library, name);
        const solid = finalOutput(buildPart(body.part, backend), body.output);
        assert.equal(backend.checkValid(solid), true, `${name} is valid`);
        volumes.set(name, backend.volume(solid));
      }
      const basic = volumes.get("basic") ?? 0;
      assert.ok(basic > 0, "basic has volume");
      assert.ok((volumes.get("controller") ?? 0) > basic, "controller bosses add volume");
    },
  },
  {
    name: "occt hub: channels remove material the same way in either order",
    fn: async () => {
      const context = await getBackendContext();
      const config = await defaultHubConfig();
      const placed = resolveAssembly(config, createFeatureLibrary(config), "A");
      const cutouts = planChannels(config, placed);
      const forward = applyChannels(placed, cutouts);
      const backward = applyChannels(placed, [...cutouts].reverse());
      for (const label of [1, 5]) {
        const uncut = volumeOf(context, slotBody(placed, label));
        const a = volumeOf(context, slotBody(forward, label));
        const b = volumeOf(context, slotBody(backward, label));
        assert.ok(a < uncut - 50, `slot ${label}: channels remove material (${uncut} -> ${a})`);
        near(a, b, 1e-6 * uncut, `slot ${label} forward vs reverse`);
      }
    },
  },
  {
    name: "occt hub: the usb opening and the countersinks remove their own volume",
    fn: async () => {
      const context = await getBackendContext();
      const library = createFeatureLibrary(await defaultHubConfig());
      const withoutCutout = VARIANT_FEATURES.usb.filter((kind) => kind !== "usb-cutout");
      const opened = volumeOf(context, composeVariant(library, "usb"));
      const closed = volumeOf(context, composeFeatures(library, withoutCutout, "usb-closed"));
      // Rounded 13 x 7 opening through 2.9 mm of wall and rim.
      near(closed - opened, 254, 5, "usb opening");

      const shell = volumeOf(context, composeFeatures(library, ["base-shell"], "shell"));
      const drilled = volumeOf(
        context,
        composeFeatures(library, ["base-shell", "floor-holes"], "drilled")
      );
      // Six 1.2 mm holes through the 2 mm floor, each with a 0.8 mm 45 degree sink.
      const hole = Math.PI * 1.2 * 1.2 * 2;
      const sink = ((Math.PI * 0.8) / 3) * (2 * 2 + 2 * 1.2 + 1.2 * 1.2) - Math.PI * 1.2 * 1.2 * 0.8;
      near(shell - drilled, 6 * (hole + sink), 0.5, "floor holes");
    },
  },
  {
    name: "occt hub: rails add a pin and sockets stay valid",
    fn: async () => {
      const context = await getBackendContext();
      const library = createFeatureLibrary(await defaultHubConfig());
      const shell = volumeOf(context, composeFeatures(library, ["base-shell"], "shell"));
      const male = volumeOf(
        context,
        composeFeatures(library, ["base-shell", "connector-ne", "connector-nw"], "male")
      );
      assert.ok(male > shell, `rails add material (${shell} -> ${male})`);
      const female = volumeOf(
        context,
        composeFeatures(library, ["base-shell", "connector-se", "connector-sw"], "female")
      );
      assert.ok(female > 0, "socket slot has volume");
    },
  },
  {
    name: "occt hub: type A exports meshes and STEP for every slot",
    fn: async () => {
      const { backend } = await getBackendContext();
      const build = generateHub(await defaultHubConfig(), "A", backend);
      const objects = build.slots.map((slot) => {
        assert.equal(backend.checkValid(slot.solid), true, `slot ${slot.position.label}`);
        const mesh = backend.mesh(slot.solid, { linearDeflection: 0.2 });
        assert.ok((mesh.indices?.length ?? 0) > 0, "mesh has triangles");
        assert.ok(exportStl(mesh).byteLength > 84);
        const step = backend.exportStep(slot.solid);
        assert.ok(new TextDecoder().decode(step.slice(0, 64)).includes("ISO-10303-21"));
        return { name: `slot-${slot.position.label}`, mesh: placeMesh(mesh, slot.position.matrix) };
      });
      const files = unzipSync(export3mf(objects));
      assert.ok(files["3D/3dmodel.model"]);
    },
  },
];

runTests(tests).catch((err) => {
  console.error(err);
  process.exitCode = 1;
});
