import { Instruction, Path, ProcessParams, RAPID_FEED_RATE } from "./ir.js";
import { distance } from "./geometry.js";
import { comment, linearMove } from "./gcode.js";

/**
 * Walk every path in order and emit its motion. Each path is bracketed by an
 * approach from clearance height and a lift back to it. Thermoplastic runs
 * carry a cumulative E value across all paths; other modes emit none.
 */
export function compileMotion(
  paths: readonly Path[],
  process: ProcessParams
): Instruction[] {
  const out: Instruction[] = [];
  const clearance = process.clearanceHeight;
  const feed = process.feedRate;
  let extrusion = 0;

  for (const path of paths) {
    for (let j = 0; j < path.length; j += 1) {
      const [x, y, z] = path[j];

      if (j === 0) {
        out.push(comment("Start path"));
        out.push(linearMove({ x, y, z: z + clearance, f: RAPID_FEED_RATE }, "move above start"));
        out.push(linearMove({ x, y, z, f: feed }, "descend to start"));
      } else {
        const step = distance(path[j - 1], path[j]);
        if (process.mode === "thermoplastic") {
          extrusion += step * process.extrusionMultiplier;
          out.push(linearMove({ x, y, z, e: extrusion, f: feed }));
        } else {
          out.push(linearMove({ x, y, z, f: feed }));
        }
      }

      if (j === path.length - 1) {
        out.push(comment("End path"));
        out.push(linearMove({ z: z + clearance, f: RAPID_FEED_RATE }, "lift tool"));
      }
    }
  }

  return out;
}
