import type { Operator } from './lexer.js';

export interface MoveInstruction {
  kind: 'move';
  dest: string;
  src: string;
}

export interface BinaryInstruction {
  kind: 'binary';
  dest: string;
  left: string;
  operator: Operator;
  right: string;
}

export type Instruction = MoveInstruction | BinaryInstruction;

export function move(dest: string, src: string): MoveInstruction {
  return { kind: 'move', dest, src };
}

export function binary(dest: string, left: string, operator: Operator, right: string): BinaryInstruction {
  return { kind: 'binary', dest, left, operator, right };
}

export function formatInstruction(instruction: Instruction): string {
  switch (instruction.kind) {
    case 'move':
      return `${instruction.dest} <- ${instruction.src}`;
    case 'binary':
      return `${instruction.dest} <- ${instruction.left} ${instruction.operator} ${instruction.right}`;
  }
}
