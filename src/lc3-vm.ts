import { step } from './cpu/execute';
import { formatState } from './display/state-view';
import { ConsoleDevice, TerminalConsole } from './hardware/console';
import { MachineState, createMachineState } from './hardware/state';
import { readImage } from './loader/image';

export interface VirtualMachineOptions {
  /* used instead of the image origin */
  pcStart?: number;
  trace?: boolean;
}

export class LC3VirtualMachine {
  public readonly state: MachineState;

  constructor(
    private readonly device: ConsoleDevice = new TerminalConsole(),
    private readonly options: VirtualMachineOptions = {}
  ) {
    this.state = createMachineState(options.pcStart);
  }

  public load(imagePath: string): number {
    const origin = readImage(this.state, imagePath);
    this.state.pc = this.options.pcStart ?? origin;
    return origin;
  }

  public step(): void {
    step(this.state, this.device);
    if (this.options.trace) {
      console.log(formatState(this.state).join('\n'));
    }
  }

  /**
   * Steps until the program halts through MCR or `maxSteps` run out.
   * @returns whether the machine halted
   */
  public run(maxSteps = Infinity): boolean {
    let steps = 0;
    while (!this.state.isHalted && steps < maxSteps) {
      this.step();
      steps++;
    }

    if (this.state.isHalted) {
      console.log('HALT');
    }
    return this.state.isHalted;
  }
}
