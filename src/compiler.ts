import {
  Diagnostics,
  Instruction,
  MachineProfile,
  Path,
  STATUS_OK,
} from "./ir.js";
import { normalizePaths } from "./geometry.js";
import { bedOutline, deepFreeze, validatePaths } from "./workspace.js";
import { decodeProfile } from "./profile.js";
import { compileMotion } from "./motion.js";
import { assembleProgram } from "./program.js";
import { serializeProgram } from "./gcode.js";

export type CompileOptions = {
  /** Replaces the synthesized header; the footer is still appended. */
  header?: readonly string[];
};

export type CompileResult = {
  profile: MachineProfile;
  instructions: readonly Instruction[];
  program: readonly string[];
  status: string;
  diagnostics: Diagnostics;
  /** Normalized point sequences that were compiled, in input order. */
  paths: Path[];
  bed: Path;
};

/**
 * Compile raw toolpaths into a G-code program. The profile may be a
 * MachineProfile or any legacy encoding accepted by decodeProfile.
 * Workspace violations are reported in the diagnostics; they never stop
 * compilation.
 */
export function compileToolpaths(
  geometry: readonly unknown[] | null | undefined,
  profileInput: unknown,
  opts: CompileOptions = {}
): CompileResult {
  const profile = decodeProfile(profileInput);
  const paths = normalizePaths(geometry);
  const diagnostics = validatePaths(paths, profile.bed);
  if (diagnostics.status !== STATUS_OK) {
    console.warn(`plotcast: ${diagnostics.status}`);
  }

  const body = compileMotion(paths, profile.process);
  const instructions = deepFreeze(assembleProgram(body, profile.process, opts.header));

  return {
    profile,
    instructions,
    program: Object.freeze(serializeProgram(instructions)),
    status: diagnostics.status,
    diagnostics,
    paths,
    bed: profile.bedShape ?? bedOutline(profile.bed),
  };
}
