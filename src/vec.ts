import type { Point3D } from "./ir.js";

export const add = (a: Point3D, b: Point3D): Point3D => [a[0] + b[0], a[1] + b[1], a[2] + b[2]];
export const sub = (a: Point3D, b: Point3D): Point3D => [a[0] - b[0], a[1] - b[1], a[2] - b[2]];
export const scale = (a: Point3D, s: number): Point3D => [a[0] * s, a[1] * s, a[2] * s];
export const dot = (a: Point3D, b: Point3D): number => a[0] * b[0] + a[1] * b[1] + a[2] * b[2];
export const cross = (a: Point3D, b: Point3D): Point3D => [
  a[1] * b[2] - a[2] * b[1],
  a[2] * b[0] - a[0] * b[2],
  a[0] * b[1] - a[1] * b[0],
];
export const length = (a: Point3D): number => Math.hypot(a[0], a[1], a[2]);

export function normalize(a: Point3D): Point3D {
  const len = length(a);
  if (len === 0) throw new Error("Cannot normalize a zero vector");
  return [a[0] / len, a[1] / len, a[2] / len];
}
