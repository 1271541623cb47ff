export type Point3 = [number, number, number];

/** Ordered, non-empty sequence of points for one continuous tool motion. */
export type Path = Point3[];

export type Segment = [Point3, Point3];

export type RawPoint = Point3 | { x: number; y: number; z: number };

/**
 * A curve that may be converted to an ordered point list. Conversion is
 * allowed to fail by returning null (or throwing); the path is then skipped.
 */
export type CurveSource = {
  kind: "curve";
  tryGetPolyline: () => RawPoint[] | null | undefined;
};

export type RawPath = RawPoint[] | CurveSource;

export type ReachabilityModel =
  | { kind: "bed.rectangular"; maxX: number; maxY: number; maxZ: number }
  | { kind: "bed.cylindrical"; radius: number; maxZ: number };

export type ReachabilityKind = ReachabilityModel["kind"];

export type ProcessMode = "thermoplastic" | "paste" | "motion";

export type ThermoplasticParams = {
  mode: "thermoplastic";
  nozzleTemp: number;
  bedTemp: number;
  extrusionMultiplier: number;
  feedRate: number;
  clearanceHeight: number;
};

export type PasteParams = {
  mode: "paste";
  pressure: number;
  flowRate: number;
  retractionDelay: number;
  curePause: number;
  feedRate: number;
  clearanceHeight: number;
};

export type MotionParams = {
  mode: "motion";
  penUpHeight: number;
  penDownOffset: number;
  penDownDelay: number;
  feedRate: number;
  clearanceHeight: number;
};

export type ProcessParams = ThermoplasticParams | PasteParams | MotionParams;

export type MachineProfile = {
  process: ProcessParams;
  bed: ReachabilityModel;
  /** Caller-supplied bed outline; the model's default outline is used when absent. */
  bedShape?: Path;
};

export type FieldLetter = "X" | "Y" | "Z" | "E" | "F" | "S";

export type InstructionField = {
  letter: FieldLetter;
  value: number;
  /** Fixed decimal digits; plain decimal form when omitted. */
  digits?: number;
};

export type Instruction =
  | { kind: "comment"; text: string }
  | { kind: "command"; code: string; fields: InstructionField[]; comment?: string }
  | { kind: "raw"; text: string };

export type ViolationCode =
  | "X<0"
  | "Y<0"
  | "Z<0"
  | "X>BedX"
  | "Y>BedY"
  | "Z>BedZ"
  | "r>BedRadius";

export type PointCheck = {
  ok: boolean;
  reasons: ViolationCode[];
};

export type PointWarning = {
  text: string;
  reasons: ViolationCode[];
  point: Point3;
};

export type Diagnostics = {
  violationCount: number;
  badPoints: Point3[];
  badSegments: Segment[];
  warnings: PointWarning[];
  status: string;
};

export const STATUS_OK = "OK";

/** Feed rate used for moves that clear the work (approach and lift). */
export const RAPID_FEED_RATE = 2000;

export const COORD_DECIMALS = 3;
export const EXTRUSION_DECIMALS = 4;
