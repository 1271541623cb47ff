import assert from "node:assert/strict";
import { gunzipSync, strFromU8, unzipSync } from "fflate";
import { compileToolpaths } from "../compiler.js";
import {
  buildDiagnosticsManifest,
  exportProgramArchive,
  exportProgramGzip,
  exportProgramText,
} from "../export/index.js";
import { makeProfile, resolveProcessParams } from "../profile.js";
import { captureWarnings, runTests } from "./test_utils.js";

const profile = makeProfile(resolveProcessParams("paste"), {
  kind: "bed.rectangular",
  maxX: 100,
  maxY: 100,
  maxZ: 100,
});

const compileSample = () =>
  captureWarnings(() =>
    compileToolpaths(
      [
        [
          [10, 10, 0],
          [120, 10, 0],
        ],
      ],
      profile
    )
  ).value;

const tests = [
  {
    name: "export: text joins lines with a trailing newline",
    fn: async () => {
      assert.equal(exportProgramText(["G28", "M84"]), "G28\nM84\n");
      assert.equal(exportProgramText([]), "");
    },
  },
  {
    name: "export: gzip round-trips to the program text",
    fn: async () => {
      const result = compileSample();
      const data = exportProgramGzip(result.program);
      assert.equal(strFromU8(gunzipSync(data)), exportProgramText(result.program));
    },
  },
  {
    name: "export: diagnostics manifest summarizes the run",
    fn: async () => {
      const result = compileSample();
      const manifest = buildDiagnosticsManifest(result);
      assert.equal(manifest.status, "Out of bounds: 1 point(s)");
      assert.equal(manifest.mode, "paste");
      assert.equal(manifest.pathCount, 1);
      assert.equal(manifest.lineCount, result.program.length);
      assert.deepEqual(manifest.badPoints, [[120, 10, 0]]);
      assert.deepEqual(manifest.badSegments, [
        [
          [10, 10, 0],
          [120, 10, 0],
        ],
      ]);
      assert.deepEqual(manifest.warnings, [{ text: "X>BedX", point: [120, 10, 0] }]);
    },
  },
  {
    name: "export: archive holds the program and diagnostics",
    fn: async () => {
      const result = compileSample();
      const files = unzipSync(exportProgramArchive(result, { name: "bracket v2" }));
      assert.deepEqual(Object.keys(files).sort(), ["bracket_v2.gcode", "diagnostics.json"]);
      const gcodeFile = files["bracket_v2.gcode"];
      const diagnosticsFile = files["diagnostics.json"];
      assert.ok(gcodeFile && diagnosticsFile, "archive entries missing");
      assert.equal(strFromU8(gcodeFile), exportProgramText(result.program));
      const manifest = JSON.parse(strFromU8(diagnosticsFile)) as { violationCount: number };
      assert.equal(manifest.violationCount, 1);

      const fallback = unzipSync(exportProgramArchive(result, { name: "..." }));
      assert.ok(fallback["program.gcode"], "default archive name expected");
    },
  },
];

runTests(tests).catch((err) => {
  console.error(err);
  process.exitCode = 1;
});
