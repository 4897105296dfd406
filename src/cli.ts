#!/usr/bin/env node
import path from "node:path";
import { parseArgs } from "node:util";
import type { Backend } from "./backend.js";
import { OcctBackend } from "./backend_occt.js";
import { loadHubConfig, DEFAULT_CONFIG_PATH } from "./config.js";
import { CsgBackend } from "./csg_backend.js";
import { describeCause, HubError, HubGenerationError } from "./errors.js";
import { generateAndExport } from "./export/hub.js";
import { parseAssemblyType, type AssemblyType } from "./hub/layout.js";

const USAGE = `Usage: hubforge [options]

  --type A|B|both     assembly types to generate (default: both)
  --config <file>     parameter file (default: bundled defaults)
  --out <dir>         output directory (default: ./out)
  --backend occt|csg  geometry kernel (default: occt)
  --no-step           skip STEP files
  -h, --help          show this message`;

type BackendName = "occt" | "csg";

function parseTypes(value: string): AssemblyType[] {
  return value.toLowerCase() === "both" ? ["A", "B"] : [parseAssemblyType(value)];
}

function parseBackendName(value: string): BackendName {
  if (value === "occt" || value === "csg") return value;
  throw new Error(`Unknown backend ${value}; expected occt or csg`);
}

async function createBackend(name: BackendName): Promise<Backend> {
  if (name === "csg") return new CsgBackend();
  const { default: initOpenCascade } = await import("opencascade.js/dist/node.js");
  return new OcctBackend({ occt: await initOpenCascade() });
}

async function main(argv: string[]): Promise<number> {
  const { values } = parseArgs({
    args: argv,
    options: {
      type: { type: "string", default: "both" },
      config: { type: "string", default: DEFAULT_CONFIG_PATH },
      out: { type: "string", default: "out" },
      backend: { type: "string", default: "occt" },
      "no-step": { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
    strict: true,
  });
  if (values.help) {
    console.log(USAGE);
    return 0;
  }

  const types = parseTypes(values.type);
  const config = await loadHubConfig(values.config);
  const backend = await createBackend(parseBackendName(values.backend));
  const outDir = path.resolve(values.out);

  await generateAndExport(config, types, backend, outDir, {
    step: !values["no-step"],
    onStage: (stage, type) => console.log(`[hub ${type}] ${stage}`),
    onBuilt: (build, elapsedMs) =>
      console.log(
        `[hub ${build.type}] built ${build.slots.length} slots, ${build.edges.length} channels in ${elapsedMs}ms`
      ),
    onWritten: (build, files) => {
      for (const file of files) console.log(`[hub ${build.type}] wrote ${file}`);
    },
  });
  return 0;
}

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    if (err instanceof HubGenerationError) {
      console.error(`hubforge: stage ${err.stage} failed: ${err.message}`);
    } else if (err instanceof HubError) {
      console.error(`hubforge: ${err.code}: ${err.message}`);
    } else {
      console.error(`hubforge: ${describeCause(err)}`);
    }
    if (err instanceof Error && err.cause !== undefined) {
      console.error(`  caused by: ${describeCause(err.cause)}`);
    }
    process.exitCode = 1;
  }
);
