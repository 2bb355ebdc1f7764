// Planar geometry helpers for GeoJSON coordinates ([lng, lat] in degrees)

export type Position = [lng: number, lat: number];
export type Ring = Position[];
export type PolygonCoords = Ring[];
export type MultiPolygonCoords = PolygonCoords[];

export type BBox = {
  minLng: number;
  minLat: number;
  maxLng: number;
  maxLat: number;
};

export type PointLocation = 'inside' | 'outside' | 'boundary';

const EPSILON = 1e-12;

export function bboxOf(coords: MultiPolygonCoords): BBox | null {
  let box: BBox | null = null;
  for (const polygon of coords) {
    // Holes lie inside the outer ring, so the outer ring bounds the polygon
    const outer = polygon[0];
    if (!outer) continue;
    for (const [lng, lat] of outer) {
      if (!box) {
        box = { minLng: lng, minLat: lat, maxLng: lng, maxLat: lat };
        continue;
      }
      box.minLng = Math.min(box.minLng, lng);
      box.minLat = Math.min(box.minLat, lat);
      box.maxLng = Math.max(box.maxLng, lng);
      box.maxLat = Math.max(box.maxLat, lat);
    }
  }
  return box;
}

export function bboxContains(box: BBox, [lng, lat]: Position): boolean {
  return lng >= box.minLng && lng <= box.maxLng && lat >= box.minLat && lat <= box.maxLat;
}

function onSegment([px, py]: Position, [ax, ay]: Position, [bx, by]: Position): boolean {
  const cross = (bx - ax) * (py - ay) - (by - ay) * (px - ax);
  if (Math.abs(cross) > EPSILON) return false;
  return (
    px >= Math.min(ax, bx) - EPSILON &&
    px <= Math.max(ax, bx) + EPSILON &&
    py >= Math.min(ay, by) - EPSILON &&
    py <= Math.max(ay, by) + EPSILON
  );
}

// Ray casting; works for closed and unclosed rings alike
export function locateInRing(point: Position, ring: Ring): PointLocation {
  const [x, y] = point;
  let inside = false;
  for (let i = 0, j = ring.length - 1; i < ring.length; j = i++) {
    const a = ring[i];
    const b = ring[j];
    if (onSegment(point, a, b)) return 'boundary';
    const [xi, yi] = a;
    const [xj, yj] = b;
    if (yi > y !== yj > y && x < ((xj - xi) * (y - yi)) / (yj - yi) + xi) {
      inside = !inside;
    }
  }
  return inside ? 'inside' : 'outside';
}

/** Interior test: a point on an outer ring or a hole boundary is not contained. */
export function polygonContains(polygon: PolygonCoords, point: Position): boolean {
  const [outer, ...holes] = polygon;
  if (!outer || locateInRing(point, outer) !== 'inside') return false;
  return holes.every((hole) => locateInRing(point, hole) === 'outside');
}

export function multiPolygonContains(coords: MultiPolygonCoords, point: Position): boolean {
  return coords.some((polygon) => polygonContains(polygon, point));
}

export function planarDistance([ax, ay]: Position, [bx, by]: Position): number {
  return Math.hypot(bx - ax, by - ay);
}
