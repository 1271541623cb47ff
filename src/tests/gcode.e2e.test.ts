import assert from "node:assert/strict";
import {
  command,
  comment,
  field,
  fieldValue,
  formatInstruction,
  formatNum,
  hasField,
  linearMove,
  raw,
  serializeProgram,
} from "../gcode.js";
import { runTests } from "./test_utils.js";

const tests = [
  {
    name: "gcode: plain decimal numbers without float noise",
    fn: async () => {
      assert.equal(formatNum(5), "5");
      assert.equal(formatNum(1500), "1500");
      assert.equal(formatNum(0.1 + 0.2), "0.3");
      assert.equal(formatNum(2.5), "2.5");
      assert.equal(formatNum(-1.25), "-1.25");
      assert.equal(formatNum(12.345), "12.345");
      assert.equal(formatNum(-0.0000001), "0");
    },
  },
  {
    name: "gcode: non-finite numbers are never written",
    fn: async () => {
      assert.throws(() => formatNum(Number.NaN), RangeError);
      assert.throws(() => formatNum(Number.POSITIVE_INFINITY), RangeError);
      assert.throws(
        () => formatInstruction(linearMove({ x: 1, e: Number.NaN, f: 1500 })),
        (err: unknown) => err instanceof RangeError && err.message.startsWith("Field E ")
      );
    },
  },
  {
    name: "gcode: linear moves keep X Y Z E F order and fixed E digits",
    fn: async () => {
      const move = linearMove({ f: 1500, e: 2, z: 0, y: 0, x: 10 });
      assert.equal(formatInstruction(move), "G1 X10 Y0 Z0 E2.0000 F1500");
      assert.equal(
        formatInstruction(linearMove({ z: 5.2, f: 2000 }, "lift tool")),
        "G1 Z5.2 F2000 ; lift tool"
      );
      assert.equal(hasField(move, "E"), true);
      assert.equal(fieldValue(move, "X"), 10);
      assert.equal(fieldValue(move, "S"), undefined);
    },
  },
  {
    name: "gcode: comments, raw lines and bare commands",
    fn: async () => {
      assert.equal(formatInstruction(comment("Start path")), "; Start path");
      assert.equal(formatInstruction(raw("M82 ; absolute E")), "M82 ; absolute E");
      assert.equal(formatInstruction(command("M84")), "M84");
      assert.equal(
        formatInstruction(command("M104", [field("S", 210)], "set nozzle temperature")),
        "M104 S210 ; set nozzle temperature"
      );
      assert.equal(formatInstruction(command("G92", [field("E", 0, 2)])), "G92 E0.00");
      assert.equal(hasField(comment("E"), "E"), false);
    },
  },
  {
    name: "gcode: serializeProgram preserves order",
    fn: async () => {
      const lines = serializeProgram([
        comment("a"),
        command("G28"),
        linearMove({ x: 1, y: 2, z: 3 }),
      ]);
      assert.deepEqual(lines, ["; a", "G28", "G1 X1 Y2 Z3"]);
    },
  },
];

runTests(tests).catch((err) => {
  console.error(err);
  process.exitCode = 1;
});
