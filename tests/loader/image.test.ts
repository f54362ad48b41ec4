import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import path from 'path';
import { afterEach, describe, it, expect } from 'vitest';
import { ImageFormatError, loadImage, readImage } from '../../src/loader/image';
import { createMachineState } from '../../src/hardware/state';

describe('loadImage', () => {
  it('places words after the origin', () => {
    const state = createMachineState();
    const origin = loadImage(state, Buffer.from([0x30, 0x00, 0x12, 0x34, 0xab, 0xcd]));
    expect(origin).toBe(0x3000);
    expect(state.memory[0x3000]).toBe(0x1234);
    expect(state.memory[0x3001]).toBe(0xabcd);
    expect(state.memory[0x3002]).toBe(0);
  });

  it('accepts an image holding only its origin', () => {
    const state = createMachineState();
    expect(loadImage(state, Buffer.from([0x40, 0x00]))).toBe(0x4000);
    expect(state.memory[0x4000]).toBe(0);
  });

  it('wraps past the top of memory', () => {
    const state = createMachineState();
    loadImage(state, Buffer.from([0xff, 0xff, 0x00, 0x01, 0x00, 0x02]));
    expect(state.memory[0xffff]).toBe(1);
    expect(state.memory[0x0000]).toBe(2);
  });

  it('rejects images without a full origin word', () => {
    const state = createMachineState();
    expect(() => loadImage(state, Buffer.from([0x30]))).toThrow(ImageFormatError);
    expect(() => loadImage(state, Buffer.alloc(0))).toThrow('image is 0 byte(s), too short for an origin');
  });

  it('rejects odd-length images', () => {
    const state = createMachineState();
    expect(() => loadImage(state, Buffer.from([0x30, 0x00, 0x12]))).toThrow(
      'image has an odd length of 3 bytes'
    );
  });
});

describe('readImage', () => {
  let dir: string | undefined;

  afterEach(() => {
    if (dir) rmSync(dir, { recursive: true, force: true });
    dir = undefined;
  });

  it('loads an image file from disk', () => {
    dir = mkdtempSync(path.join(tmpdir(), 'lc3-image-'));
    const file = path.join(dir, 'prog.obj');
    writeFileSync(file, Buffer.from([0x30, 0x00, 0xf0, 0x25]));

    const state = createMachineState();
    expect(readImage(state, file)).toBe(0x3000);
    expect(state.memory[0x3000]).toBe(0xf025);
  });
});
