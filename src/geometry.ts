import { COORD_DECIMALS, CurveSource, Path, Point3 } from "./ir.js";

const COORD_SCALE = 10 ** COORD_DECIMALS;

/**
 * Round to COORD_DECIMALS places against the exact binary value. Exact
 * halfway values (1.0625) round to even, giving 1.062.
 */
export function roundCoord(value: number): number {
  const rounded = isDecimalTie(value)
    ? roundHalfEven(value * COORD_SCALE) / COORD_SCALE
    : Number(value.toFixed(COORD_DECIMALS));
  return rounded === 0 ? 0 : rounded;
}

// A value lies exactly halfway between two COORD_DECIMALS steps only when it
// is an odd multiple of 2^-(COORD_DECIMALS + 1); scaling by a power of two is exact.
function isDecimalTie(value: number): boolean {
  const scaled = value * 2 ** (COORD_DECIMALS + 1);
  return Number.isInteger(scaled) && scaled % 2 !== 0;
}

function roundHalfEven(scaled: number): number {
  const floor = Math.floor(scaled);
  return floor % 2 === 0 ? floor : floor + 1;
}

/**
 * Extract an ordered, rounded point list from a raw path. Returns null when
 * the input cannot be read as points or yields none; callers skip the path.
 */
export function normalizePath(raw: unknown): Path | null {
  const source = readRawPoints(raw);
  if (!source || source.length === 0) return null;
  const points: Path = [];
  for (const entry of source) {
    const point = readPoint(entry);
    if (!point) return null;
    points.push(point);
  }
  return points;
}

export function normalizePaths(raw: readonly unknown[] | null | undefined): Path[] {
  const paths: Path[] = [];
  for (const entry of raw ?? []) {
    const path = normalizePath(entry);
    if (path) paths.push(path);
  }
  return paths;
}

export function distance(a: Point3, b: Point3): number {
  return Math.hypot(b[0] - a[0], b[1] - a[1], b[2] - a[2]);
}

export function midpoint(a: Point3, b: Point3): Point3 {
  return [(a[0] + b[0]) / 2, (a[1] + b[1]) / 2, (a[2] + b[2]) / 2];
}

function readRawPoints(raw: unknown): unknown[] | null {
  if (Array.isArray(raw)) {
    // A bare coordinate triple is a single point, not a path.
    if (raw.length > 0 && raw.every((entry) => typeof entry === "number")) return null;
    return raw;
  }
  if (isCurveSource(raw)) {
    try {
      const polyline = raw.tryGetPolyline();
      return Array.isArray(polyline) ? polyline : null;
    } catch {
      return null;
    }
  }
  return null;
}

function readPoint(entry: unknown): Point3 | null {
  let coords: unknown[];
  if (Array.isArray(entry)) {
    if (entry.length !== 3) return null;
    coords = entry;
  } else if (entry !== null && typeof entry === "object") {
    const obj = entry as Partial<Record<"x" | "y" | "z", unknown>>;
    coords = [obj.x, obj.y, obj.z];
  } else {
    return null;
  }
  const [x, y, z] = coords;
  if (!isFiniteNumber(x) || !isFiniteNumber(y) || !isFiniteNumber(z)) return null;
  return [roundCoord(x), roundCoord(y), roundCoord(z)];
}

function isCurveSource(value: unknown): value is CurveSource {
  return (
    Boolean(value) &&
    typeof value === "object" &&
    (value as { kind?: unknown }).kind === "curve" &&
    typeof (value as { tryGetPolyline?: unknown }).tryGetPolyline === "function"
  );
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value);
}
