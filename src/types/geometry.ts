export interface Point {
  x: number;
  y: number;
}

export interface Size {
  width: number;
  height: number;
}

/**
 * Axis-aligned bounding box. `min` is the top-left corner in image space,
 * `max` the bottom-right one.
 */
export interface Aabb {
  min: Point;
  max: Point;
}

export function mergeAabb(a: Aabb, b: Aabb): Aabb {
  return {
    min: { x: Math.min(a.min.x, b.min.x), y: Math.min(a.min.y, b.min.y) },
    max: { x: Math.max(a.max.x, b.max.x), y: Math.max(a.max.y, b.max.y) },
  };
}

export function translateAabb(aabb: Aabb, offset: Point): Aabb {
  return {
    min: { x: aabb.min.x + offset.x, y: aabb.min.y + offset.y },
    max: { x: aabb.max.x + offset.x, y: aabb.max.y + offset.y },
  };
}

export function aabbCenter(aabb: Aabb): Point {
  return {
    x: (aabb.min.x + aabb.max.x) / 2,
    y: (aabb.min.y + aabb.max.y) / 2,
  };
}
