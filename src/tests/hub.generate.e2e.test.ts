import assert from "node:assert/strict";
import type { BackendCapabilities } from "../backend.js";
import { CsgBackend } from "../csg_backend.js";
import {
  BackendError,
  ChannelPlacementError,
  HubGenerationError,
  UnknownAssemblyType,
} from "../errors.js";
import { generateHub, HUB_STAGES, type HubStage } from "../hub/generate.js";
import { hubFixture } from "./hub_test_utils.js";
import { runTests } from "./test_utils.js";

class ExtrudeOnlyBackend extends CsgBackend {
  override capabilities(): BackendCapabilities {
    return { ...super.capabilities(), featureKinds: ["feature.extrude"] };
  }
}

const tests = [
  {
    name: "generate: runs every stage and returns the placed hub",
    fn: async () => {
      const { config, backend } = await hubFixture();
      const stages: HubStage[] = [];
      const build = generateHub(config, "a", backend, {
        onStage: (stage) => stages.push(stage),
      });
      assert.deepEqual(stages, HUB_STAGES);
      assert.equal(build.type, "A");
      assert.equal(build.slots.length, 6);
      assert.equal(build.edges.length, 9);
      for (const slot of build.slots) {
        assert.equal(backend.checkValid(slot.solid), true);
        assert.equal(slot.build.partId, `slot-${slot.position.label}`);
      }
      const first = build.slots[0];
      assert.ok(first);
      assert.equal(backend.contains(first.solid, [13, -41, 3]), false);
      assert.equal(backend.contains(first.solid, [-13, -41, 3]), true);
    },
  },
  {
    name: "generate: the assembly has one placed instance per slot",
    fn: async () => {
      const { config, backend } = await hubFixture();
      const build = generateHub(config, "B", backend);
      assert.equal(build.assembly.id, "hub-B");
      assert.deepEqual(
        build.assembly.instances.map((instance) => instance.part),
        ["slot-1", "slot-2", "slot-3", "slot-4", "slot-5", "slot-6"]
      );
      const fifth = build.assembly.instances[4];
      assert.ok(fifth);
      assert.equal(fifth.id, "hub-B.slot-5");
      assert.deepEqual(fifth.tags, ["controller"]);
      assert.deepEqual(fifth.transform?.matrix, build.slots[4]?.position.matrix);
    },
  },
  {
    name: "generate: failures report the stage they happened in",
    fn: async () => {
      const { config, backend } = await hubFixture();
      const stages: HubStage[] = [];
      assert.throws(
        () => generateHub(config, "C", backend, { onStage: (stage) => stages.push(stage) }),
        (err: unknown) =>
          err instanceof HubGenerationError &&
          err.stage === "layout" &&
          err.cause instanceof UnknownAssemblyType &&
          /Hub type C failed during layout/.test(err.message)
      );
      assert.deepEqual(stages, ["library", "layout"]);
    },
  },
  {
    name: "generate: channel placement problems stop the channels stage",
    fn: async () => {
      const { config, backend } = await hubFixture({ "channel.tangentOffset": -20 });
      assert.throws(
        () => generateHub(config, "A", backend),
        (err: unknown) =>
          err instanceof HubGenerationError &&
          err.stage === "channels" &&
          err.cause instanceof ChannelPlacementError
      );
    },
  },
  {
    name: "generate: kernel problems stop the build stage",
    fn: async () => {
      const { config } = await hubFixture();
      assert.throws(
        () => generateHub(config, "A", new ExtrudeOnlyBackend()),
        (err: unknown) =>
          err instanceof HubGenerationError &&
          err.stage === "build" &&
          err.cause instanceof BackendError &&
          err.cause.code === "backend_unsupported_feature"
      );
    },
  },
];

runTests(tests).catch((err) => {
  console.error(err);
  process.exitCode = 1;
});
