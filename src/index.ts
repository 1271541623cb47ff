export * from "./ir.js";
export { ConfigError } from "./errors.js";
export { compileToolpaths } from "./compiler.js";
export type { CompileOptions, CompileResult } from "./compiler.js";
export { distance, midpoint, normalizePath, normalizePaths, roundCoord } from "./geometry.js";
export { bedOutline, statusFor, validatePaths, validatePoint, validateSegment } from "./workspace.js";
export {
  DEFAULT_BED_SIZE,
  MOTION_DEFAULTS,
  PASTE_DEFAULTS,
  THERMOPLASTIC_DEFAULTS,
  decodeProfile,
  decodeProfileList,
  decodeProfileRecord,
  decodeProfileString,
  defaultProfile,
  defaultsFor,
  makeProfile,
  resolveProcessParams,
} from "./profile.js";
export type { LegacyParams } from "./profile.js";
export { compileMotion } from "./motion.js";
export { PROGRAM_BANNER, assembleProgram, buildFooter, buildHeader } from "./program.js";
export {
  command,
  comment,
  field,
  fieldValue,
  formatField,
  formatInstruction,
  formatNum,
  hasField,
  linearMove,
  raw,
  serializeProgram,
} from "./gcode.js";
export type { MoveTarget } from "./gcode.js";
export * from "./export/index.js";
