import {
  MachineProfile,
  MotionParams,
  PasteParams,
  Path,
  ProcessMode,
  ProcessParams,
  ReachabilityModel,
  ThermoplasticParams,
} from "./ir.js";
import { ConfigError } from "./errors.js";
import { normalizePath } from "./geometry.js";

export const THERMOPLASTIC_DEFAULTS: ThermoplasticParams = Object.freeze({
  mode: "thermoplastic",
  nozzleTemp: 210,
  bedTemp: 30,
  extrusionMultiplier: 0.2,
  feedRate: 1500,
  clearanceHeight: 5,
});

export const PASTE_DEFAULTS: PasteParams = Object.freeze({
  mode: "paste",
  pressure: 4.0,
  flowRate: 10.0,
  retractionDelay: 0.5,
  curePause: 0.0,
  feedRate: 800,
  clearanceHeight: 5,
});

export const MOTION_DEFAULTS: MotionParams = Object.freeze({
  mode: "motion",
  penUpHeight: 5,
  penDownOffset: 0.2,
  penDownDelay: 100,
  feedRate: 1000,
  clearanceHeight: 5,
});

export const DEFAULT_BED_SIZE = { x: 300, y: 300, z: 300, radius: 150 } as const;

/** Legacy parameter keys, per field. Keys not listed here are ignored. */
const PARAM_KEYS = {
  nozzleTemp: "NozzleTemp",
  bedTemp: "BedTemp",
  extrusionMultiplier: "ExtrusionMultiplier",
  feedRate: "FeedRate",
  clearanceHeight: "ClearanceHeight",
  pressure: "ExtrusionPressure",
  flowRate: "FlowRate",
  retractionDelay: "RetractionDelay",
  curePause: "CurePause",
  penUpHeight: "PenUpHeight",
  penDownOffset: "PenDownOffset",
  penDownDelay: "PenDownDelay",
} as const;

type ParamField = keyof typeof PARAM_KEYS;

const MODE_TOKENS: Record<string, ProcessMode> = {
  hot: "thermoplastic",
  thermoplastic: "thermoplastic",
  clay: "paste",
  paste: "paste",
  pen: "motion",
  motion: "motion",
};

const BED_TOKENS: Record<string, ReachabilityModel["kind"]> = {
  cartesian: "bed.rectangular",
  rectangular: "bed.rectangular",
  delta: "bed.cylindrical",
  cylindrical: "bed.cylindrical",
};

export type LegacyParams = Record<string, unknown>;

export function defaultsFor(mode: ProcessMode): ProcessParams {
  switch (mode) {
    case "thermoplastic":
      return THERMOPLASTIC_DEFAULTS;
    case "paste":
      return PASTE_DEFAULTS;
    case "motion":
      return MOTION_DEFAULTS;
  }
}

type FieldReader = (field: ParamField, fallback: number) => number;

/**
 * Build the typed parameter variant for a mode from a loose key/value map,
 * filling absent or unreadable values from the mode's defaults.
 */
export function resolveProcessParams(
  mode: ProcessMode,
  params: LegacyParams = {}
): ProcessParams {
  return buildProcessParams(mode, (field, fallback) =>
    readNumber(params[PARAM_KEYS[field]], fallback, `param ${PARAM_KEYS[field]}`)
  );
}

function buildProcessParams(mode: ProcessMode, read: FieldReader): ProcessParams {
  switch (mode) {
    case "thermoplastic": {
      const d = THERMOPLASTIC_DEFAULTS;
      return Object.freeze({
        mode,
        nozzleTemp: read("nozzleTemp", d.nozzleTemp),
        bedTemp: read("bedTemp", d.bedTemp),
        extrusionMultiplier: read("extrusionMultiplier", d.extrusionMultiplier),
        feedRate: read("feedRate", d.feedRate),
        clearanceHeight: read("clearanceHeight", d.clearanceHeight),
      });
    }
    case "paste": {
      const d = PASTE_DEFAULTS;
      return Object.freeze({
        mode,
        pressure: read("pressure", d.pressure),
        flowRate: read("flowRate", d.flowRate),
        retractionDelay: read("retractionDelay", d.retractionDelay),
        curePause: read("curePause", d.curePause),
        feedRate: read("feedRate", d.feedRate),
        clearanceHeight: read("clearanceHeight", d.clearanceHeight),
      });
    }
    case "motion": {
      const d = MOTION_DEFAULTS;
      return Object.freeze({
        mode,
        penUpHeight: read("penUpHeight", d.penUpHeight),
        penDownOffset: read("penDownOffset", d.penDownOffset),
        penDownDelay: read("penDownDelay", d.penDownDelay),
        feedRate: read("feedRate", d.feedRate),
        clearanceHeight: read("clearanceHeight", d.clearanceHeight),
      });
    }
  }
}

export function defaultProfile(): MachineProfile {
  return makeProfile(MOTION_DEFAULTS, {
    kind: "bed.rectangular",
    maxX: DEFAULT_BED_SIZE.x,
    maxY: DEFAULT_BED_SIZE.y,
    maxZ: DEFAULT_BED_SIZE.z,
  });
}

export function makeProfile(
  process: ProcessParams,
  bed: ReachabilityModel,
  bedShape?: Path
): MachineProfile {
  const profile: MachineProfile = bedShape
    ? { process: Object.freeze({ ...process }), bed: Object.freeze({ ...bed }), bedShape }
    : { process: Object.freeze({ ...process }), bed: Object.freeze({ ...bed }) };
  return Object.freeze(profile);
}

type LegacyFields = {
  mode: unknown;
  printerType: unknown;
  params: unknown;
  bedX: unknown;
  bedY: unknown;
  bedZ: unknown;
  bedRadius: unknown;
  bedShape: unknown;
};

/** `{ Mode, PrinterType, Params, BedX, BedY, BedZ, BedRadius, BedShape }` */
export function decodeProfileRecord(record: Record<string, unknown>): MachineProfile {
  return decodeLegacyFields({
    mode: record.Mode,
    printerType: record.PrinterType,
    params: record.Params,
    bedX: record.BedX,
    bedY: record.BedY,
    bedZ: record.BedZ,
    bedRadius: record.BedRadius,
    bedShape: record.BedShape,
  });
}

/** `[mode, printerType, params, bedX, bedY, bedZ, bedRadius, bedShape]` */
export function decodeProfileList(list: readonly unknown[]): MachineProfile {
  const [mode, printerType, params, bedX, bedY, bedZ, bedRadius, bedShape] = list;
  return decodeLegacyFields({ mode, printerType, params, bedX, bedY, bedZ, bedRadius, bedShape });
}

/**
 * Decode a profile carried as text: JSON, or a single-quoted literal list or map. Text
 * that cannot be decoded yields the default profile.
 */
export function decodeProfileString(text: string): MachineProfile {
  const parsed = parseLiteral(text);
  if (parsed === undefined || !(Array.isArray(parsed) || isRecord(parsed))) {
    console.warn("plotcast: Could not decode profile text; using the default profile.");
    return defaultProfile();
  }
  return decodeProfile(parsed);
}

/**
 * Accept a typed profile or any of the legacy encodings. Empty input (null,
 * undefined, empty string, empty list) yields the default profile.
 */
export function decodeProfile(input: unknown): MachineProfile {
  if (input === null || input === undefined || input === "") return defaultProfile();
  if (typeof input === "string") return decodeProfileString(input);
  if (Array.isArray(input)) {
    return input.length === 0 ? defaultProfile() : decodeProfileList(input);
  }
  if (isTypedProfile(input)) return decodeTypedProfile(input);
  if (isRecord(input)) {
    return Object.keys(input).length === 0 ? defaultProfile() : decodeProfileRecord(input);
  }
  console.warn(`plotcast: Unsupported profile input of type ${typeof input}; using the default profile.`);
  return defaultProfile();
}

/**
 * Typed profiles are rebuilt field by field so partial input gets the same
 * defaults as the legacy encodings.
 */
function decodeTypedProfile(input: TypedProfileInput): MachineProfile {
  const { process: params, bed } = input;
  const process = buildProcessParams(params.mode, (field, fallback) =>
    readNumber(params[field], fallback, `process.${field}`)
  );
  const maxZ = readNumber(bed.maxZ, DEFAULT_BED_SIZE.z, "bed.maxZ");
  const model: ReachabilityModel =
    bed.kind === "bed.cylindrical"
      ? {
          kind: bed.kind,
          radius: readNumber(bed.radius, DEFAULT_BED_SIZE.radius, "bed.radius"),
          maxZ,
        }
      : {
          kind: bed.kind,
          maxX: readNumber(bed.maxX, DEFAULT_BED_SIZE.x, "bed.maxX"),
          maxY: readNumber(bed.maxY, DEFAULT_BED_SIZE.y, "bed.maxY"),
          maxZ,
        };
  const bedShape = input.bedShape === undefined ? null : normalizePath(input.bedShape);
  return makeProfile(process, model, bedShape ?? undefined);
}

function decodeLegacyFields(fields: LegacyFields): MachineProfile {
  const mode = decodeMode(fields.mode);
  const params = isRecord(fields.params) ? fields.params : {};
  const process = resolveProcessParams(mode, params);
  const bed = decodeBed(fields);
  const bedShape = fields.bedShape === undefined ? null : normalizePath(fields.bedShape);
  return makeProfile(process, bed, bedShape ?? undefined);
}

function decodeMode(value: unknown): ProcessMode {
  if (value === undefined || value === null) return "motion";
  const mode = typeof value === "string" ? lookupToken(MODE_TOKENS, value) : undefined;
  if (!mode) {
    console.warn(`plotcast: Unknown process mode ${String(value)}; using motion-only.`);
    return "motion";
  }
  return mode;
}

function decodeBed(fields: LegacyFields): ReachabilityModel {
  const kind = decodeBedKind(fields);
  const maxZ = readNumber(fields.bedZ, DEFAULT_BED_SIZE.z, "BedZ");
  if (kind === "bed.cylindrical") {
    return {
      kind,
      radius: readNumber(fields.bedRadius, DEFAULT_BED_SIZE.radius, "BedRadius"),
      maxZ,
    };
  }
  return {
    kind,
    maxX: readNumber(fields.bedX, DEFAULT_BED_SIZE.x, "BedX"),
    maxY: readNumber(fields.bedY, DEFAULT_BED_SIZE.y, "BedY"),
    maxZ,
  };
}

function decodeBedKind(fields: LegacyFields): ReachabilityModel["kind"] {
  const { printerType } = fields;
  if (printerType === undefined || printerType === null) {
    const hasRadius = isPresent(fields.bedRadius);
    const hasRect = isPresent(fields.bedX) || isPresent(fields.bedY);
    if (hasRadius && hasRect) {
      throw new ConfigError(
        "config_bed_ambiguous",
        "Printer type is missing and the profile carries both a bed radius and bed X/Y extents",
        { bedX: fields.bedX, bedY: fields.bedY, bedRadius: fields.bedRadius }
      );
    }
    return "bed.rectangular";
  }
  const kind = typeof printerType === "string" ? lookupToken(BED_TOKENS, printerType) : undefined;
  if (!kind) {
    throw new ConfigError(
      "config_bed_ambiguous",
      `Unknown printer type ${String(printerType)}`,
      { printerType }
    );
  }
  return kind;
}

function readNumber(value: unknown, fallback: number, label: string): number {
  if (value === undefined || value === null) return fallback;
  const parsed =
    typeof value === "number"
      ? value
      : typeof value === "string" && value.trim() !== ""
        ? Number(value)
        : Number.NaN;
  if (!Number.isFinite(parsed)) {
    console.warn(`plotcast: Ignoring non-numeric ${label} (${String(value)}); using ${fallback}.`);
    return fallback;
  }
  return parsed;
}

function parseLiteral(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    try {
      return JSON.parse(relaxedLiteralToJson(text));
    } catch {
      return undefined;
    }
  }
}

const BARE_WORDS: Record<string, string> = { None: "null", True: "true", False: "false" };

const QUOTE_ESCAPES: Record<string, string> = {
  n: "\n",
  t: "\t",
  r: "\r",
  "\\": "\\",
  "'": "'",
  '"': '"',
};

/**
 * Rewrite a single-quoted literal as JSON. Quoted strings are re-emitted as
 * JSON strings; only bare words and trailing commas outside them change.
 */
function relaxedLiteralToJson(text: string): string {
  let out = "";
  let i = 0;
  while (i < text.length) {
    const ch = text[i];
    if (ch === "'" || ch === '"') {
      const quoted = readQuoted(text, i);
      out += JSON.stringify(quoted.value);
      i = quoted.end;
      continue;
    }
    if (/[A-Za-z_]/.test(ch)) {
      let j = i + 1;
      while (j < text.length && /\w/.test(text[j])) j += 1;
      const word = text.slice(i, j);
      out += Object.hasOwn(BARE_WORDS, word) ? BARE_WORDS[word] : word;
      i = j;
      continue;
    }
    if (ch === ",") {
      let j = i + 1;
      while (j < text.length && /\s/.test(text[j])) j += 1;
      if (text[j] === "]" || text[j] === "}") {
        i = j;
        continue;
      }
    }
    out += ch;
    i += 1;
  }
  return out;
}

function readQuoted(text: string, start: number): { value: string; end: number } {
  const quote = text[start];
  let value = "";
  let i = start + 1;
  while (i < text.length) {
    const ch = text[i];
    if (ch === quote) return { value, end: i + 1 };
    if (ch === "\\" && i + 1 < text.length) {
      const next = text[i + 1];
      value += Object.hasOwn(QUOTE_ESCAPES, next) ? QUOTE_ESCAPES[next] : `\\${next}`;
      i += 2;
      continue;
    }
    value += ch;
    i += 1;
  }
  throw new SyntaxError(`Unterminated string at offset ${start}`);
}

function lookupToken<T>(table: Record<string, T>, value: string): T | undefined {
  const key = value.trim().toLowerCase();
  return Object.hasOwn(table, key) ? table[key] : undefined;
}

function isPresent(value: unknown): boolean {
  return value !== undefined && value !== null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

type TypedProfileInput = {
  process: Record<string, unknown> & { mode: ProcessMode };
  bed: Record<string, unknown> & { kind: ReachabilityModel["kind"] };
  bedShape?: unknown;
};

function isTypedProfile(value: unknown): value is TypedProfileInput {
  if (!isRecord(value)) return false;
  const { process, bed } = value;
  return (
    isRecord(process) &&
    (process.mode === "thermoplastic" || process.mode === "paste" || process.mode === "motion") &&
    isRecord(bed) &&
    (bed.kind === "bed.rectangular" || bed.kind === "bed.cylindrical")
  );
}
