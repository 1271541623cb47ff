import { Instruction, ProcessParams } from "./ir.js";
import { command, comment, field, raw } from "./gcode.js";

export const PROGRAM_BANNER = "plotcast G-code program";

export function buildHeader(process: ProcessParams): Instruction[] {
  const lines: Instruction[] = [comment(PROGRAM_BANNER), command("G28", [], "home all axes")];
  if (process.mode === "thermoplastic") {
    lines.push(command("M104", [field("S", process.nozzleTemp)], "set nozzle temperature"));
    lines.push(command("M140", [field("S", process.bedTemp)], "set bed temperature"));
  }
  lines.push(command("G92", [field("E", 0)], "reset extrusion"));
  return lines;
}

export function buildFooter(process: ProcessParams): Instruction[] {
  const lines: Instruction[] = [comment("end of program")];
  if (process.mode === "thermoplastic") {
    lines.push(command("M104", [field("S", 0)], "nozzle heater off"));
    lines.push(command("M140", [field("S", 0)], "bed heater off"));
  }
  lines.push(command("M107", [], "fans off"));
  lines.push(command("G28", [field("X", 0)], "home X"));
  lines.push(command("M84", [], "disable motors"));
  return lines;
}

/**
 * Wrap compiled motion in a header and footer. A non-empty header override
 * is used verbatim in place of the synthesized header; the synthesized
 * footer is appended either way.
 */
export function assembleProgram(
  body: readonly Instruction[],
  process: ProcessParams,
  headerOverride?: readonly string[]
): Instruction[] {
  const header =
    headerOverride && headerOverride.length > 0
      ? headerOverride.map(raw)
      : buildHeader(process);
  return [...header, ...body, ...buildFooter(process)];
}
