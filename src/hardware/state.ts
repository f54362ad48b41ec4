import { ConditionFlag, ConditionTag, Register, conditionTag } from './register';
import { createMemory } from './memory';

export const PC_START = 0x3000;

/**
 * Everything an instruction can observe or change. The engine mutates a
 * state in place and never keeps one of its own.
 */
export interface MachineState {
  registers: Uint16Array;
  /* next address to fetch */
  pc: number;
  /* last fetched instruction */
  ir: number;
  cc: ConditionFlag;
  isHalted: boolean;
  memory: Uint16Array;
}

export interface MachineSnapshot {
  readonly registers: readonly number[];
  readonly pc: number;
  readonly ir: number;
  readonly cc: ConditionTag;
  readonly isHalted: boolean;
}

export function createMachineState(pc: number = PC_START): MachineState {
  return {
    registers: new Uint16Array(Register.R_COUNT),
    pc,
    ir: 0,
    cc: ConditionFlag.FL_ZRO,
    isHalted: false,
    memory: createMemory(),
  };
}

export function snapshot(state: MachineState): MachineSnapshot {
  return {
    registers: Array.from(state.registers),
    pc: state.pc,
    ir: state.ir,
    cc: conditionTag(state.cc),
    isHalted: state.isHalted,
  };
}
