import {
  EXTRUSION_DECIMALS,
  FieldLetter,
  Instruction,
  InstructionField,
} from "./ir.js";

export type MoveTarget = Partial<Record<"x" | "y" | "z" | "e" | "f", number>>;

export const comment = (text: string): Instruction => ({ kind: "comment", text });

export const raw = (text: string): Instruction => ({ kind: "raw", text });

export const command = (
  code: string,
  fields: InstructionField[] = [],
  note?: string
): Instruction =>
  note === undefined
    ? { kind: "command", code, fields }
    : { kind: "command", code, fields, comment: note };

export const field = (letter: FieldLetter, value: number, digits?: number): InstructionField =>
  digits === undefined ? { letter, value } : { letter, value, digits };

/** Linear move; fields are emitted in X Y Z E F order, skipping absent ones. */
export function linearMove(target: MoveTarget, note?: string): Instruction {
  const fields: InstructionField[] = [];
  if (target.x !== undefined) fields.push(field("X", target.x));
  if (target.y !== undefined) fields.push(field("Y", target.y));
  if (target.z !== undefined) fields.push(field("Z", target.z));
  if (target.e !== undefined) fields.push(field("E", target.e, EXTRUSION_DECIMALS));
  if (target.f !== undefined) fields.push(field("F", target.f));
  return command("G1", fields, note);
}

export function formatInstruction(instruction: Instruction): string {
  switch (instruction.kind) {
    case "comment":
      return `; ${instruction.text}`;
    case "raw":
      return instruction.text;
    case "command": {
      const tokens = [instruction.code, ...instruction.fields.map(formatField)];
      const line = tokens.join(" ");
      return instruction.comment ? `${line} ; ${instruction.comment}` : line;
    }
  }
}

export function serializeProgram(instructions: readonly Instruction[]): string[] {
  return instructions.map(formatInstruction);
}

export function formatField(entry: InstructionField): string {
  if (!Number.isFinite(entry.value)) {
    throw new RangeError(`Field ${entry.letter} is not a finite number (${entry.value})`);
  }
  const value =
    entry.digits === undefined ? formatNum(entry.value) : entry.value.toFixed(entry.digits);
  return `${entry.letter}${value}`;
}

/** Plain decimal form with float noise trimmed: 5, 0.3, 2.5, -1.25. */
export function formatNum(value: number): string {
  if (!Number.isFinite(value)) {
    throw new RangeError(`Cannot write non-finite value ${value} into an instruction`);
  }
  const text = value.toFixed(6).replace(/\.0+$/, "").replace(/(\.\d+?)0+$/, "$1");
  return text === "-0" ? "0" : text;
}

export function hasField(instruction: Instruction, letter: FieldLetter): boolean {
  return (
    instruction.kind === "command" && instruction.fields.some((entry) => entry.letter === letter)
  );
}

export function fieldValue(instruction: Instruction, letter: FieldLetter): number | undefined {
  if (instruction.kind !== "command") return undefined;
  return instruction.fields.find((entry) => entry.letter === letter)?.value;
}
