import { OpCode } from '../constants/opcodes';

export type Operand =
  | { kind: 'register'; sr2: number }
  | { kind: 'immediate'; imm5: number };

export type JumpTarget =
  | { kind: 'offset'; pcOffset: number }
  | { kind: 'register'; baseR: number };

/**
 * A decoded instruction. Each variant carries its register indices and
 * already sign-extended offsets, so execution never looks at raw bits.
 */
export type Instruction =
  | { op: OpCode.OP_ADD | OpCode.OP_AND; dr: number; sr1: number; operand: Operand }
  | { op: OpCode.OP_NOT; dr: number; sr1: number }
  | { op: OpCode.OP_LEA | OpCode.OP_LD | OpCode.OP_LDI; dr: number; pcOffset: number }
  | { op: OpCode.OP_LDR; dr: number; baseR: number; offset: number }
  | { op: OpCode.OP_ST | OpCode.OP_STI; sr: number; pcOffset: number }
  | { op: OpCode.OP_STR; sr: number; baseR: number; offset: number }
  /* conditions uses the ConditionFlag bit layout: N=4, Z=2, P=1 */
  | { op: OpCode.OP_BR; conditions: number; pcOffset: number }
  | { op: OpCode.OP_JMP; baseR: number }
  | { op: OpCode.OP_JSR; target: JumpTarget }
  | { op: OpCode.OP_TRAP; trapVector: number }
  | { op: OpCode.OP_RTI | OpCode.OP_RES };

/** Sign-extends the low `bitCount` bits of `x` to a signed integer. */
export function signExtend(x: number, bitCount: number): number {
  const shift = 32 - bitCount;
  return (x << shift) >> shift;
}

export function opcodeOf(instr: number): number {
  return (instr >> 12) & 0xf;
}

const dr = (instr: number): number => (instr >> 9) & 0x7;
const sr1 = (instr: number): number => (instr >> 6) & 0x7;
const pcOffset9 = (instr: number): number => signExtend(instr & 0x1ff, 9);
const offset6 = (instr: number): number => signExtend(instr & 0x3f, 6);

export function decode(instr: number): Instruction {
  switch (opcodeOf(instr)) {
    case OpCode.OP_ADD:
    case OpCode.OP_AND: {
      /* bit 5 selects immediate mode */
      const operand: Operand =
        (instr >> 5) & 0x1
          ? { kind: 'immediate', imm5: signExtend(instr & 0x1f, 5) }
          : { kind: 'register', sr2: instr & 0x7 };
      const op = opcodeOf(instr) === OpCode.OP_ADD ? OpCode.OP_ADD : OpCode.OP_AND;
      return { op, dr: dr(instr), sr1: sr1(instr), operand };
    }
    case OpCode.OP_NOT:
      return { op: OpCode.OP_NOT, dr: dr(instr), sr1: sr1(instr) };
    case OpCode.OP_LEA:
      return { op: OpCode.OP_LEA, dr: dr(instr), pcOffset: pcOffset9(instr) };
    case OpCode.OP_LD:
      return { op: OpCode.OP_LD, dr: dr(instr), pcOffset: pcOffset9(instr) };
    case OpCode.OP_LDI:
      return { op: OpCode.OP_LDI, dr: dr(instr), pcOffset: pcOffset9(instr) };
    case OpCode.OP_LDR:
      return { op: OpCode.OP_LDR, dr: dr(instr), baseR: sr1(instr), offset: offset6(instr) };
    case OpCode.OP_ST:
      return { op: OpCode.OP_ST, sr: dr(instr), pcOffset: pcOffset9(instr) };
    case OpCode.OP_STI:
      return { op: OpCode.OP_STI, sr: dr(instr), pcOffset: pcOffset9(instr) };
    case OpCode.OP_STR:
      return { op: OpCode.OP_STR, sr: dr(instr), baseR: sr1(instr), offset: offset6(instr) };
    case OpCode.OP_BR:
      return { op: OpCode.OP_BR, conditions: (instr >> 9) & 0x7, pcOffset: pcOffset9(instr) };
    case OpCode.OP_JMP:
      /* also RET, which is JMP R7 */
      return { op: OpCode.OP_JMP, baseR: sr1(instr) };
    case OpCode.OP_JSR: {
      const target: JumpTarget =
        (instr >> 11) & 0x1
          ? { kind: 'offset', pcOffset: signExtend(instr & 0x7ff, 11) }
          : { kind: 'register', baseR: sr1(instr) };
      return { op: OpCode.OP_JSR, target };
    }
    case OpCode.OP_TRAP:
      return { op: OpCode.OP_TRAP, trapVector: instr & 0xff };
    case OpCode.OP_RTI:
      return { op: OpCode.OP_RTI };
    default:
      return { op: OpCode.OP_RES };
  }
}
