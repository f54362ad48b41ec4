import { DEVICE_READY, MemoryMappedRegister } from '../constants/memory';
import { OpCode } from '../constants/opcodes';
import { ConsoleDevice } from '../hardware/console';
import { toWord } from '../hardware/memory';
import { ConditionFlag, Register } from '../hardware/register';
import { MachineState } from '../hardware/state';
import { Instruction, Operand, decode } from './decode';

const SIGN_BIT = 1 << 15;

export function conditionFor(value: number): ConditionFlag {
  if (toWord(value) === 0) {
    return ConditionFlag.FL_ZRO;
  }
  /* a 1 in the left-most bit indicates negative */
  return value & SIGN_BIT ? ConditionFlag.FL_NEG : ConditionFlag.FL_POS;
}

/**
 * Writes `value` to register `r` and sets CC from the value as written,
 * not from a later read of the register.
 */
function writeRegister(state: MachineState, r: number, value: number): void {
  const written = toWord(value);
  state.registers[r] = written;
  state.cc = conditionFor(written);
}

function memRead(state: MachineState, address: number): number {
  return state.memory[toWord(address)];
}

function memWrite(state: MachineState, address: number, value: number): void {
  state.memory[toWord(address)] = value;
}

function operandValue(state: MachineState, operand: Operand): number {
  return operand.kind === 'immediate' ? operand.imm5 : state.registers[operand.sr2];
}

export function execute(state: MachineState, instruction: Instruction, device: ConsoleDevice): void {
  switch (instruction.op) {
    case OpCode.OP_ADD: {
      const { dr, sr1, operand } = instruction;
      writeRegister(state, dr, state.registers[sr1] + operandValue(state, operand));
      break;
    }
    case OpCode.OP_AND: {
      const { dr, sr1, operand } = instruction;
      writeRegister(state, dr, state.registers[sr1] & operandValue(state, operand));
      break;
    }
    case OpCode.OP_NOT:
      writeRegister(state, instruction.dr, ~state.registers[instruction.sr1]);
      break;
    case OpCode.OP_LEA:
      /* the address itself, never dereferenced */
      writeRegister(state, instruction.dr, state.pc + instruction.pcOffset);
      break;
    case OpCode.OP_LD:
      writeRegister(state, instruction.dr, memRead(state, state.pc + instruction.pcOffset));
      break;
    case OpCode.OP_LDR: {
      const { dr, baseR, offset } = instruction;
      writeRegister(state, dr, memRead(state, state.registers[baseR] + offset));
      break;
    }
    case OpCode.OP_LDI: {
      const effective = memRead(state, state.pc + instruction.pcOffset);
      /*
       * Keyboard input is only delivered through an indirect load of KBDR.
       * LD and LDR of the same address read plain memory.
       */
      const value =
        effective === MemoryMappedRegister.MR_KBDR ? device.readChar() : memRead(state, effective);
      writeRegister(state, instruction.dr, value);
      break;
    }
    case OpCode.OP_ST:
      memWrite(state, state.pc + instruction.pcOffset, state.registers[instruction.sr]);
      break;
    case OpCode.OP_STR: {
      const { sr, baseR, offset } = instruction;
      memWrite(state, state.registers[baseR] + offset, state.registers[sr]);
      break;
    }
    case OpCode.OP_STI: {
      const effective = memRead(state, state.pc + instruction.pcOffset);
      memWrite(state, effective, state.registers[instruction.sr]);
      if (effective === MemoryMappedRegister.MR_MCR) {
        state.isHalted = true;
      }
      break;
    }
    case OpCode.OP_BR:
      if (instruction.conditions & state.cc) {
        state.pc = toWord(state.pc + instruction.pcOffset);
      }
      break;
    case OpCode.OP_JMP:
      state.pc = state.registers[instruction.baseR];
      break;
    case OpCode.OP_JSR: {
      const { target } = instruction;
      /* R7 is written first: JSRR R7 lands on the return address */
      state.registers[Register.R_R7] = state.pc;
      state.pc =
        target.kind === 'offset' ? toWord(state.pc + target.pcOffset) : state.registers[target.baseR];
      break;
    }
    case OpCode.OP_TRAP:
      state.registers[Register.R_R7] = state.pc;
      state.pc = memRead(state, instruction.trapVector);
      break;
    case OpCode.OP_RTI:
    case OpCode.OP_RES:
      break;
  }
}

/** Drains the display data register and marks both devices ready. */
export function reconcileDevices(state: MachineState, device: ConsoleDevice): void {
  const { memory } = state;
  if (memory[MemoryMappedRegister.MR_DDR] !== 0) {
    device.writeChar(memory[MemoryMappedRegister.MR_DDR] & 0xff);
    memory[MemoryMappedRegister.MR_DDR] = 0;
  }
  memory[MemoryMappedRegister.MR_KBSR] = DEVICE_READY;
  memory[MemoryMappedRegister.MR_DSR] = DEVICE_READY;
}

/** Fetches, decodes and executes one instruction. */
export function step(state: MachineState, device: ConsoleDevice): void {
  state.ir = memRead(state, state.pc);
  state.pc = toWord(state.pc + 1);

  execute(state, decode(state.ir), device);

  reconcileDevices(state, device);
}
