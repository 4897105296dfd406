import type { MeshData } from "../backend.js";

const HEADER_BYTES = 80;
const TRIANGLE_BYTES = 50;

/** Binary STL: 80-byte header, triangle count, then normal + 3 vertices per facet. */
export function exportStl(mesh: MeshData, name = "hubforge"): Uint8Array {
  const { positions } = mesh;
  if (positions.length % 3 !== 0) {
    throw new Error("STL export: positions length must be divisible by 3");
  }
  const vertexCount = positions.length / 3;
  const indices = mesh.indices ?? Array.from({ length: vertexCount }, (_, i) => i);
  if (indices.length % 3 !== 0) {
    throw new Error("STL export: indices length must be divisible by 3");
  }
  const triangles = indices.length / 3;
  const bytes = new Uint8Array(HEADER_BYTES + 4 + triangles * TRIANGLE_BYTES);
  bytes.set(new TextEncoder().encode(name.slice(0, HEADER_BYTES)), 0);
  const view = new DataView(bytes.buffer);
  view.setUint32(HEADER_BYTES, triangles, true);

  const vertex = (index: number): [number, number, number] => {
    if (index >= vertexCount) {
      throw new Error(`STL export: index ${index} out of range`);
    }
    return [positions[index * 3] ?? 0, positions[index * 3 + 1] ?? 0, positions[index * 3 + 2] ?? 0];
  };

  let offset = HEADER_BYTES + 4;
  for (let i = 0; i < indices.length; i += 3) {
    const a = vertex(indices[i] ?? 0);
    const b = vertex(indices[i + 1] ?? 0);
    const c = vertex(indices[i + 2] ?? 0);
    for (const value of [...facetNormal(a, b, c), ...a, ...b, ...c]) {
      view.setFloat32(offset, value, true);
      offset += 4;
    }
    // Attribute byte count stays zero.
    offset += 2;
  }
  return bytes;
}

function facetNormal(
  a: [number, number, number],
  b: [number, number, number],
  c: [number, number, number]
): [number, number, number] {
  const ux = b[0] - a[0];
  const uy = b[1] - a[1];
  const uz = b[2] - a[2];
  const vx = c[0] - a[0];
  const vy = c[1] - a[1];
  const vz = c[2] - a[2];
  const nx = uy * vz - uz * vy;
  const ny = uz * vx - ux * vz;
  const nz = ux * vy - uy * vx;
  const len = Math.hypot(nx, ny, nz);
  return len === 0 ? [0, 0, 0] : [nx / len, ny / len, nz / len];
}
