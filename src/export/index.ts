export {
  buildDiagnosticsManifest,
  exportProgramArchive,
  exportProgramGzip,
  exportProgramText,
} from "./program.js";
export type { DiagnosticsManifest, ProgramArchiveOptions } from "./program.js";
