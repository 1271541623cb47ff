import assert from "node:assert/strict";
import type { Instruction } from "../ir.js";

export type TestCase = {
  name: string;
  fn: () => Promise<void> | void;
};

async function runTest(index: number, testCase: TestCase): Promise<boolean> {
  try {
    await testCase.fn();
    console.log(`ok ${index} - ${testCase.name}`);
    return true;
  } catch (err) {
    console.log(`not ok ${index} - ${testCase.name}`);
    console.error(err);
    return false;
  }
}

export async function runTests(testCases: TestCase[]): Promise<void> {
  console.log("TAP version 13");
  let passCount = 0;
  for (const [index, testCase] of testCases.entries()) {
    const ok = await runTest(index + 1, testCase);
    if (ok) passCount += 1;
  }
  console.log(`1..${testCases.length}`);
  if (passCount !== testCases.length) {
    process.exitCode = 1;
  }
}

/** Collect console.warn output while fn runs. */
export function captureWarnings<T>(fn: () => T): { value: T; warnings: string[] } {
  const warnings: string[] = [];
  const original = console.warn;
  console.warn = (...args: unknown[]) => {
    warnings.push(args.map(String).join(" "));
  };
  try {
    return { value: fn(), warnings };
  } finally {
    console.warn = original;
  }
}

export function assertClose(actual: number | undefined, expected: number, label = "value"): void {
  assert.ok(actual !== undefined, `${label} missing`);
  assert.ok(
    Math.abs(actual - expected) < 1e-9,
    `${label}: expected ${expected}, got ${actual}`
  );
}

export function commandsOf(instructions: readonly Instruction[], code: string): Instruction[] {
  return instructions.filter((entry) => entry.kind === "command" && entry.code === code);
}
