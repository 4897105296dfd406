import type { Point2D, Profile } from "../ir.js";
import { profilePoly } from "../dsl/geometry.js";

/** Wall sides of a flat-top hexagon, clockwise from north. */
export type Side = "N" | "NE" | "SE" | "S" | "SW" | "NW";

/** Outward normal angle of each side, in degrees from +X. */
export const SIDE_ANGLES: Readonly<Record<Side, number>> = Object.freeze({
  N: 90,
  NE: 30,
  SE: 330,
  S: 270,
  SW: 210,
  NW: 150,
});

export const SIDES: readonly Side[] = Object.freeze(["N", "NE", "SE", "S", "SW", "NW"]);

const OPPOSITE: Readonly<Record<Side, Side>> = Object.freeze({
  N: "S",
  NE: "SW",
  SE: "NW",
  S: "N",
  SW: "NE",
  NW: "SE",
});

export function oppositeSide(side: Side): Side {
  return OPPOSITE[side];
}

export function sideNormal(side: Side): Point2D {
  const rad = (SIDE_ANGLES[side] * Math.PI) / 180;
  return [Math.cos(rad), Math.sin(rad)];
}

/** Hexagon prism profile with a vertex on +X and flats facing north and south. */
export function hexagonProfile(flatToFlat: number, z: number): Profile {
  return profilePoly(6, flatToFlat / Math.sqrt(3), [0, 0, z], 0);
}

/** True when the whole circle lies inside the hexagon with the given apothem. */
export function circleInsideHexagon(center: Point2D, radius: number, apothem: number): boolean {
  return SIDES.every((side) => {
    const [nx, ny] = sideNormal(side);
    return center[0] * nx + center[1] * ny + radius <= apothem + 1e-9;
  });
}

export function rotate2d(point: Point2D, angle: number): Point2D {
  const c = Math.cos(angle);
  const s = Math.sin(angle);
  return [point[0] * c - point[1] * s, point[0] * s + point[1] * c];
}
