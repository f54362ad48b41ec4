import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { LC3VirtualMachine } from '../src/lc3-vm';
import { ScriptedConsole } from './helpers/machine';

/* prints "Hi" through DDR, then halts through MCR */
const HELLO = [
  0x2004, // LD  R0, #4
  0xb005, // STI R0, #5
  0x2003, // LD  R0, #3
  0xb003, // STI R0, #3
  0xb203, // STI R1, #3
  0x0048,
  0x0069,
  0xfe06,
  0xfffe,
];

const silenceLog = () => vi.spyOn(console, 'log').mockImplementation(() => undefined);

describe('LC3VirtualMachine', () => {
  let log: ReturnType<typeof silenceLog>;

  beforeEach(() => {
    log = silenceLog();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('runs until the program halts', () => {
    const device = new ScriptedConsole();
    const vm = new LC3VirtualMachine(device);
    vm.state.memory.set(HELLO, 0x3000);

    expect(vm.run()).toBe(true);
    expect(device.text()).toBe('Hi');
    expect(vm.state.pc).toBe(0x3005);
    expect(log).toHaveBeenCalledWith('HALT');
  });

  it('gives up after maxSteps', () => {
    const vm = new LC3VirtualMachine(new ScriptedConsole());
    vm.state.memory[0x3000] = 0x0fff; // BRnzp #-1

    expect(vm.run(10)).toBe(false);
    expect(vm.state.isHalted).toBe(false);
    expect(log).not.toHaveBeenCalled();
  });

  it('traces state after each step', () => {
    const vm = new LC3VirtualMachine(new ScriptedConsole(), { trace: true });
    vm.state.memory[0x3000] = 0x103f; // ADD R0, R0, #-1

    vm.step();
    expect(log).toHaveBeenCalledTimes(1);
    const lines = String(log.mock.calls[0][0]).split('\n');
    expect(lines[0]).toBe('R0 0xFFFF -1');
    expect(lines[8]).toBe('PC 0x3001 12289');
    expect(lines[10]).toBe('CC N');
  });

  describe('load', () => {
    let dir: string;

    beforeEach(() => {
      dir = mkdtempSync(path.join(tmpdir(), 'lc3-vm-'));
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it('starts at the image origin', () => {
      const file = path.join(dir, 'prog.obj');
      writeFileSync(file, Buffer.from([0x40, 0x00, 0x12, 0x34]));
      const vm = new LC3VirtualMachine(new ScriptedConsole());

      expect(vm.load(file)).toBe(0x4000);
      expect(vm.state.pc).toBe(0x4000);
      expect(vm.state.memory[0x4000]).toBe(0x1234);
    });

    it('honours a PC override', () => {
      const file = path.join(dir, 'prog.obj');
      writeFileSync(file, Buffer.from([0x40, 0x00, 0x12, 0x34]));
      const vm = new LC3VirtualMachine(new ScriptedConsole(), { pcStart: 0x5000 });

      vm.load(file);
      expect(vm.state.pc).toBe(0x5000);
    });
  });
});
