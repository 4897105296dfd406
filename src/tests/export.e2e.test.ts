import assert from "node:assert/strict";
import { mkdtemp, readFile, readdir, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { strFromU8, unzipSync } from "fflate";
import type { BackendCapabilities, MeshData } from "../backend.js";
import { CsgBackend } from "../csg_backend.js";
import { BackendError, HubGenerationError } from "../errors.js";
import { exportHub, generateAndExport, placeMesh } from "../export/hub.js";
import { exportStl } from "../export/stl.js";
import { export3mf, formatNum } from "../export/three_mf.js";
import { generateHub } from "../hub/generate.js";
import { matrixFromTranslation } from "../transform.js";
import { hubFixture } from "./hub_test_utils.js";
import { runTests } from "./test_utils.js";

const TRIANGLE: MeshData = {
  positions: [0, 0, 0, 1, 0, 0, 0, 1, 0],
  indices: [0, 1, 2],
};

/** CSG solids with a stand-in triangle mesh. */
class TriangleMeshBackend extends CsgBackend {
  override capabilities(): BackendCapabilities {
    return { ...super.capabilities(), mesh: true };
  }

  override mesh(): MeshData {
    return TRIANGLE;
  }
}

function modelXml(data: Uint8Array): string {
  const model = unzipSync(data)["3D/3dmodel.model"];
  assert.ok(model, "3MF model file missing");
  return strFromU8(model);
}

const tests = [
  {
    name: "export stl: writes a binary facet with its normal",
    fn: async () => {
      const stl = exportStl(TRIANGLE, "tri");
      assert.equal(stl.byteLength, 80 + 4 + 50);
      assert.equal(new TextDecoder().decode(stl.slice(0, 3)), "tri");
      const view = new DataView(stl.buffer, stl.byteOffset, stl.byteLength);
      assert.equal(view.getUint32(80, true), 1);
      const floats = Array.from({ length: 12 }, (_, i) => view.getFloat32(84 + i * 4, true));
      assert.deepEqual(floats, [0, 0, 1, 0, 0, 0, 1, 0, 0, 0, 1, 0]);
      assert.equal(view.getUint16(84 + 48, true), 0);
    },
  },
  {
    name: "export stl: rejects incomplete meshes",
    fn: async () => {
      assert.throws(() => exportStl({ positions: [0, 0] }), /divisible by 3/);
      assert.throws(() => exportStl({ positions: [0, 0, 0], indices: [0, 0, 5] }), /out of range/);
    },
  },
  {
    name: "export 3mf: one object and build item per mesh with colors",
    fn: async () => {
      const data = export3mf([
        { name: "left", mesh: TRIANGLE, color: "#ff0000" },
        { name: "right & up", mesh: placeMesh(TRIANGLE, matrixFromTranslation([1.25, 0, 0])) },
      ]);
      const xml = modelXml(data);
      assert.ok(xml.includes('unit="millimeter"'));
      assert.ok(xml.includes('<basematerials id="1">'));
      assert.ok(xml.includes('<base name="material-0" displaycolor="#FF0000FF"/>'));
      assert.ok(xml.includes('<object id="2" type="model" name="left" pid="1" pindex="0">'));
      assert.ok(xml.includes('<object id="3" type="model" name="right &amp; up">'));
      assert.ok(xml.includes('<vertex x="2.25" y="0" z="0"/>'));
      assert.ok(xml.includes('<item objectid="2"/>'));
      assert.ok(xml.includes('<item objectid="3"/>'));
      assert.equal(xml.split("<triangle ").length - 1, 2);
    },
  },
  {
    name: "export 3mf: rejects empty packages and bad colors",
    fn: async () => {
      assert.throws(() => export3mf([]), /no objects/);
      assert.throws(() => export3mf([{ name: "x", mesh: TRIANGLE, color: "red" }]), /invalid color/);
    },
  },
  {
    name: "export: numbers are written without trailing zeros",
    fn: async () => {
      assert.equal(formatNum(2), "2");
      assert.equal(formatNum(1.25), "1.25");
      assert.equal(formatNum(-0.5), "-0.5");
      assert.equal(formatNum(100), "100");
      assert.equal(formatNum(0.1234567), "0.123457");
      assert.equal(formatNum(Number.NaN), "0");
    },
  },
  {
    name: "export: placeMesh moves positions and leaves normals of a translation alone",
    fn: async () => {
      const placed = placeMesh(
        { positions: [1, 2, 3], normals: [0, 0, 1], indices: [0, 0, 0] },
        matrixFromTranslation([10, -5, 0])
      );
      assert.deepEqual(placed.positions, [11, -3, 3]);
      assert.deepEqual(placed.normals, [0, 0, 1]);
      assert.deepEqual(placed.indices, [0, 0, 0]);
    },
  },
  {
    name: "export hub: refuses a backend that cannot mesh",
    fn: async () => {
      const { config, backend } = await hubFixture();
      const build = generateHub(config, "A", backend);
      await assert.rejects(
        exportHub(build, backend, path.join(os.tmpdir(), "hub-never-written")),
        (err: unknown) => err instanceof BackendError && err.code === "export_unsupported"
      );
    },
  },
  {
    name: "export hub: writes slot meshes and the assembled package",
    fn: async () => {
      const { config } = await hubFixture();
      const backend = new TriangleMeshBackend();
      const build = generateHub(config, "B", backend);
      const dir = await mkdtemp(path.join(os.tmpdir(), "hub-export-"));
      try {
        const { files } = await exportHub(build, backend, dir);
        assert.deepEqual(
          files.map((file) => path.basename(file)),
          [
            "hub-B-slot-1.stl",
            "hub-B-slot-2.stl",
            "hub-B-slot-3.stl",
            "hub-B-slot-4.stl",
            "hub-B-slot-5.stl",
            "hub-B-slot-6.stl",
            "hub-B.3mf",
          ]
        );
        assert.equal((await readdir(dir)).length, 7);
        const stl = await readFile(path.join(dir, "hub-B-slot-1.stl"));
        assert.equal(stl.byteLength, 134);
        const xml = modelXml(await readFile(path.join(dir, "hub-B.3mf")));
        assert.equal(xml.split("<item ").length - 1, 6);
        assert.ok(xml.includes('name="slot-5" pid="1" pindex="4"'));
        assert.ok(xml.includes('displaycolor="#3A6FB0FF"'));
        assert.ok(xml.includes('displaycolor="#C4572EFF"'));
      } finally {
        await rm(dir, { recursive: true, force: true });
      }
    },
  },
  {
    name: "export hub: every type is generated before the first file is written",
    fn: async () => {
      const { config } = await hubFixture();
      const backend = new TriangleMeshBackend();
      const dir = await mkdtemp(path.join(os.tmpdir(), "hub-run-"));
      try {
        const outDir = path.join(dir, "out");
        const built: string[] = [];
        await assert.rejects(
          generateAndExport(config, ["A", "C"], backend, outDir, {
            onBuilt: (build) => built.push(build.type),
          }),
          (err: unknown) => err instanceof HubGenerationError && err.stage === "layout"
        );
        assert.deepEqual(built, ["A"]);
        assert.deepEqual(await readdir(dir), []);

        const order: string[] = [];
        const { files } = await generateAndExport(config, ["A", "B"], backend, outDir, {
          onBuilt: (build) => order.push(`built ${build.type}`),
          onWritten: (build) => order.push(`wrote ${build.type}`),
        });
        assert.deepEqual(order, ["built A", "built B", "wrote A", "wrote B"]);
        assert.equal(files.length, 14);
        assert.equal((await readdir(outDir)).length, 14);
      } finally {
        await rm(dir, { recursive: true, force: true });
      }
    },
  },
];

runTests(tests).catch((err) => {
  console.error(err);
  process.exitCode = 1;
});
