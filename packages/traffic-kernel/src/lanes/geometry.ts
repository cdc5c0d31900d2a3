import type { BBoxV1, PointV1 } from "@lanewatch/contracts";

const EPS = 1e-9;

/**
 * Bottom-center of the box: the closest image point to where the vehicle
 * touches the road, and the least sensitive to vehicle height.
 */
export function referencePoint(bbox: BBoxV1): PointV1 {
  return { x: bbox.x + bbox.w / 2, y: bbox.y + bbox.h };
}

export function distance(a: PointV1, b: PointV1): number {
  return Math.hypot(b.x - a.x, b.y - a.y);
}

// Shoelace formula; sign follows vertex winding.
export function signedArea(polygon: ReadonlyArray<PointV1>): number {
  let sum = 0;
  for (let i = 0; i < polygon.length; i++) {
    const a = polygon[i];
    const b = polygon[(i + 1) % polygon.length];
    sum += a.x * b.y - b.x * a.y;
  }
  return sum / 2;
}

function cross(o: PointV1, a: PointV1, b: PointV1): number {
  return (a.x - o.x) * (b.y - o.y) - (a.y - o.y) * (b.x - o.x);
}

export function onSegment(p: PointV1, a: PointV1, b: PointV1): boolean {
  if (Math.abs(cross(a, b, p)) > EPS) return false;
  return (
    p.x >= Math.min(a.x, b.x) - EPS &&
    p.x <= Math.max(a.x, b.x) + EPS &&
    p.y >= Math.min(a.y, b.y) - EPS &&
    p.y <= Math.max(a.y, b.y) + EPS
  );
}

export function segmentsIntersect(p1: PointV1, p2: PointV1, q1: PointV1, q2: PointV1): boolean {
  const d1 = cross(q1, q2, p1);
  const d2 = cross(q1, q2, p2);
  const d3 = cross(p1, p2, q1);
  const d4 = cross(p1, p2, q2);

  if (((d1 > EPS && d2 < -EPS) || (d1 < -EPS && d2 > EPS)) && ((d3 > EPS && d4 < -EPS) || (d3 < -EPS && d4 > EPS))) {
    return true;
  }
  // Collinear / touching cases.
  return onSegment(p1, q1, q2) || onSegment(p2, q1, q2) || onSegment(q1, p1, p2) || onSegment(q2, p1, p2);
}

/**
 * Even-odd ray casting. Points lying on an edge count as inside so that the
 * answer never depends on floating-point luck along a shared border.
 */
export function pointInPolygon(p: PointV1, polygon: ReadonlyArray<PointV1>): boolean {
  let inside = false;
  for (let i = 0, j = polygon.length - 1; i < polygon.length; j = i++) {
    const a = polygon[i];
    const b = polygon[j];
    if (onSegment(p, a, b)) return true;
    const crosses = a.y > p.y !== b.y > p.y && p.x < ((b.x - a.x) * (p.y - a.y)) / (b.y - a.y) + a.x;
    if (crosses) inside = !inside;
  }
  return inside;
}
