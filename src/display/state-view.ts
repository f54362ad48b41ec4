import { toSigned } from '../hardware/memory';
import { Register } from '../hardware/register';
import { MachineState, snapshot } from '../hardware/state';

export function formatWord(value: number): string {
  const hex = value.toString(16).toUpperCase().padStart(4, '0');
  return `0x${hex} ${toSigned(value)}`;
}

export function formatState(state: MachineState): string[] {
  const view = snapshot(state);
  const lines: string[] = [];

  for (let r = 0; r < Register.R_COUNT; r++) {
    lines.push(`R${r} ${formatWord(view.registers[r])}`);
  }
  lines.push(`PC ${formatWord(view.pc)}`);
  lines.push(`IR ${formatWord(view.ir)}`);
  lines.push(`CC ${view.cc}`);

  return lines;
}
