import { gzipSync, strToU8, zipSync } from "fflate";
import type { CompileResult } from "../compiler.js";
import type { Point3, ReachabilityModel, Segment } from "../ir.js";

export type ProgramArchiveOptions = {
  name?: string;
};

export type DiagnosticsManifest = {
  status: string;
  mode: string;
  bed: ReachabilityModel;
  lineCount: number;
  pathCount: number;
  violationCount: number;
  badPoints: Point3[];
  badSegments: Segment[];
  warnings: Array<{ text: string; point: Point3 }>;
};

export function exportProgramText(program: readonly string[]): string {
  return program.length === 0 ? "" : `${program.join("\n")}\n`;
}

export function exportProgramGzip(program: readonly string[]): Uint8Array {
  return gzipSync(strToU8(exportProgramText(program)));
}

export function buildDiagnosticsManifest(result: CompileResult): DiagnosticsManifest {
  const { diagnostics } = result;
  return {
    status: diagnostics.status,
    mode: result.profile.process.mode,
    bed: result.profile.bed,
    lineCount: result.program.length,
    pathCount: result.paths.length,
    violationCount: diagnostics.violationCount,
    badPoints: diagnostics.badPoints,
    badSegments: diagnostics.badSegments,
    warnings: diagnostics.warnings.map((w) => ({ text: w.text, point: w.point })),
  };
}

/** Zip holding `<name>.gcode` and `diagnostics.json`. */
export function exportProgramArchive(
  result: CompileResult,
  opts: ProgramArchiveOptions = {}
): Uint8Array {
  const name = sanitizeName(opts.name ?? "program");
  const files: Record<string, Uint8Array> = {
    [`${name}.gcode`]: strToU8(exportProgramText(result.program)),
    "diagnostics.json": strToU8(JSON.stringify(buildDiagnosticsManifest(result), null, 2)),
  };
  return zipSync(files, { level: 0 });
}

function sanitizeName(value: string): string {
  const cleaned = value.replace(/[^A-Za-z0-9._-]+/g, "_").replace(/^\.+/, "");
  return cleaned.length > 0 ? cleaned : "program";
}
