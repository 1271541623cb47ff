import {
  Diagnostics,
  Path,
  Point3,
  PointCheck,
  PointWarning,
  ReachabilityModel,
  Segment,
  STATUS_OK,
  ViolationCode,
} from "./ir.js";
import { midpoint } from "./geometry.js";

const OUTLINE_CIRCLE_SEGMENTS = 72;

export function validatePoint(point: Point3, model: ReachabilityModel): PointCheck {
  const [x, y, z] = point;
  const reasons: ViolationCode[] = [];
  switch (model.kind) {
    case "bed.rectangular":
      if (x < 0) reasons.push("X<0");
      if (y < 0) reasons.push("Y<0");
      if (z < 0) reasons.push("Z<0");
      if (x > model.maxX) reasons.push("X>BedX");
      if (y > model.maxY) reasons.push("Y>BedY");
      if (z > model.maxZ) reasons.push("Z>BedZ");
      break;
    case "bed.cylindrical":
      if (Math.hypot(x, y) > model.radius) reasons.push("r>BedRadius");
      if (z < 0) reasons.push("Z<0");
      if (z > model.maxZ) reasons.push("Z>BedZ");
      break;
  }
  return { ok: reasons.length === 0, reasons };
}

/**
 * Both endpoints must be reachable. The rectangular model also checks the
 * midpoint; the cylindrical model checks endpoints only.
 */
export function validateSegment(a: Point3, b: Point3, model: ReachabilityModel): boolean {
  if (!validatePoint(a, model).ok || !validatePoint(b, model).ok) return false;
  if (model.kind === "bed.rectangular") {
    return validatePoint(midpoint(a, b), model).ok;
  }
  return true;
}

export function validatePaths(paths: readonly Path[], model: ReachabilityModel): Diagnostics {
  const badPoints: Point3[] = [];
  const badSegments: Segment[] = [];
  const warnings: PointWarning[] = [];

  for (const path of paths) {
    for (const point of path) {
      const check = validatePoint(point, model);
      if (check.ok) continue;
      badPoints.push(point);
      warnings.push({ text: check.reasons.join(", "), reasons: check.reasons, point });
    }
    for (let i = 1; i < path.length; i += 1) {
      const a = path[i - 1];
      const b = path[i];
      if (!validateSegment(a, b, model)) badSegments.push([a, b]);
    }
  }

  return deepFreeze({
    violationCount: badPoints.length,
    badPoints,
    badSegments,
    warnings,
    status: statusFor(badPoints.length),
  });
}

export function statusFor(violationCount: number): string {
  return violationCount === 0 ? STATUS_OK : `Out of bounds: ${violationCount} point(s)`;
}

/** Closed outline of the bed at z = 0. */
export function bedOutline(model: ReachabilityModel): Path {
  switch (model.kind) {
    case "bed.rectangular":
      return [
        [0, 0, 0],
        [model.maxX, 0, 0],
        [model.maxX, model.maxY, 0],
        [0, model.maxY, 0],
        [0, 0, 0],
      ];
    case "bed.cylindrical": {
      const points: Path = [];
      for (let i = 0; i < OUTLINE_CIRCLE_SEGMENTS; i += 1) {
        const t = (i / OUTLINE_CIRCLE_SEGMENTS) * Math.PI * 2;
        points.push([model.radius * Math.cos(t), model.radius * Math.sin(t), 0]);
      }
      points.push([model.radius, 0, 0]);
      return points;
    }
  }
}

export function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const key of Object.keys(value)) {
      deepFreeze((value as Record<string, unknown>)[key]);
    }
  }
  return value;
}
