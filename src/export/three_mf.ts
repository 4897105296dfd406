import { strToU8, zipSync } from "fflate";
import type { MeshData } from "../backend.js";

export type ThreeMfUnit = "mm" | "cm" | "m" | "in";

export type ThreeMfObject = {
  name: string;
  mesh: MeshData;
  /** sRGB color as `#RRGGBB`; objects without one get no material. */
  color?: string;
};

export type ThreeMfExportOptions = {
  unit?: ThreeMfUnit;
};

const UNIT_TOKENS: Readonly<Record<ThreeMfUnit, string>> = {
  mm: "millimeter",
  cm: "centimeter",
  m: "meter",
  in: "inch",
};

// Base materials take resource id 1; objects follow from 2.
const MATERIALS_ID = 1;

/** Package meshes as separate objects, each with its own build item. */
export function export3mf(
  objects: readonly ThreeMfObject[],
  opts: ThreeMfExportOptions = {}
): Uint8Array {
  if (objects.length === 0) {
    throw new Error("3MF export: no objects to write");
  }
  const colors = objects.flatMap((object) => (object.color ? [object.color] : []));
  for (const color of colors) {
    if (!/^#[0-9a-fA-F]{6}$/.test(color)) {
      throw new Error(`3MF export: invalid color ${color}`);
    }
  }

  const resources: string[] = [];
  if (colors.length > 0) {
    resources.push(`    <basematerials id="${MATERIALS_ID}">`);
    colors.forEach((color, index) => {
      resources.push(
        `      <base name="material-${index}" displaycolor="${color.toUpperCase()}FF"/>`
      );
    });
    resources.push("    </basematerials>");
  }

  const items: string[] = [];
  let materialIndex = 0;
  objects.forEach((object, index) => {
    const id = index + 2;
    const material = object.color ? ` pid="${MATERIALS_ID}" pindex="${materialIndex++}"` : "";
    resources.push(
      `    <object id="${id}" type="model" name="${escapeXml(object.name)}"${material}>`,
      ...meshXml(object.mesh, object.name),
      "    </object>"
    );
    items.push(`    <item objectid="${id}"/>`);
  });

  const model = [
    '<?xml version="1.0" encoding="UTF-8"?>',
    `<model xmlns="http://schemas.microsoft.com/3dmanufacturing/core/2015/02" unit="${
      UNIT_TOKENS[opts.unit ?? "mm"]
    }" xml:lang="en-US">`,
    "  <resources>",
    ...resources,
    "  </resources>",
    "  <build>",
    ...items,
    "  </build>",
    "</model>",
  ].join("\n");

  return zipSync(
    {
      "[Content_Types].xml": strToU8(CONTENT_TYPES_XML),
      "_rels/.rels": strToU8(RELATIONSHIPS_XML),
      "3D/3dmodel.model": strToU8(model),
    },
    { level: 0 }
  );
}

function meshXml(mesh: MeshData, name: string): string[] {
  const { positions } = mesh;
  if (positions.length === 0 || positions.length % 3 !== 0) {
    throw new Error(`3MF export: ${name} has no complete vertices`);
  }
  const vertexCount = positions.length / 3;
  const indices = mesh.indices ?? Array.from({ length: vertexCount }, (_, i) => i);
  if (indices.length % 3 !== 0) {
    throw new Error(`3MF export: ${name} indices are not triangles`);
  }

  const lines = ["      <mesh>", "        <vertices>"];
  for (let i = 0; i < positions.length; i += 3) {
    lines.push(
      `          <vertex x="${formatNum(positions[i] ?? 0)}" y="${formatNum(
        positions[i + 1] ?? 0
      )}" z="${formatNum(positions[i + 2] ?? 0)}"/>`
    );
  }
  lines.push("        </vertices>", "        <triangles>");
  for (let i = 0; i < indices.length; i += 3) {
    const tri = [indices[i] ?? 0, indices[i + 1] ?? 0, indices[i + 2] ?? 0];
    if (tri.some((v) => v >= vertexCount)) {
      throw new Error(`3MF export: ${name} index out of range`);
    }
    lines.push(`          <triangle v1="${tri[0]}" v2="${tri[1]}" v3="${tri[2]}"/>`);
  }
  lines.push("        </triangles>", "      </mesh>");
  return lines;
}

const CONTENT_TYPES_XML = [
  '<?xml version="1.0" encoding="UTF-8"?>',
  '<Types xmlns="http://schemas.openxmlformats.org/package/2006/content-types">',
  '  <Default Extension="rels" ContentType="application/vnd.openxmlformats-package.relationships+xml"/>',
  '  <Default Extension="model" ContentType="application/vnd.ms-package.3dmanufacturing-3dmodel+xml"/>',
  "</Types>",
].join("\n");

const RELATIONSHIPS_XML = [
  '<?xml version="1.0" encoding="UTF-8"?>',
  '<Relationships xmlns="http://schemas.openxmlformats.org/package/2006/relationships">',
  '  <Relationship Id="rel0" Type="http://schemas.microsoft.com/3dmanufacturing/2013/01/3dmodel" Target="/3D/3dmodel.model"/>',
  "</Relationships>",
].join("\n");

export function formatNum(value: number): string {
  if (!Number.isFinite(value)) return "0";
  return value.toFixed(6).replace(/\.?0+$/, "");
}

const XML_ENTITIES: Readonly<Record<string, string>> = {
  "<": "&lt;",
  ">": "&gt;",
  "&": "&amp;",
  '"': "&quot;",
  "'": "&apos;",
};

function escapeXml(value: string): string {
  return value.replace(/[<>&"']/g, (ch) => XML_ENTITIES[ch] ?? ch);
}
