import { describe, it, expect } from 'vitest';
import { ConfigError, parseArgs } from '../src/config';

describe('parseArgs', () => {
  it('needs only an image path', () => {
    expect(parseArgs(['prog.obj'])).toEqual({ imagePath: 'prog.obj', trace: false });
  });

  it('reads every option', () => {
    expect(parseArgs(['--trace', '--pc', '0x3000', '--max-steps', '100', 'a.obj'])).toEqual({
      imagePath: 'a.obj',
      pcStart: 0x3000,
      trace: true,
      maxSteps: 100,
    });
  });

  it('rejects bad input', () => {
    expect(() => parseArgs([])).toThrow(ConfigError);
    expect(() => parseArgs([])).toThrow('missing image path');
    expect(() => parseArgs(['--bogus', 'a.obj'])).toThrow('unknown option --bogus');
    expect(() => parseArgs(['a.obj', 'b.obj'])).toThrow('unexpected argument b.obj');
    expect(() => parseArgs(['--pc'])).toThrow('--pc needs a value');
    expect(() => parseArgs(['--pc', 'zz', 'a.obj'])).toThrow("--pc: 'zz' is not a number");
    expect(() => parseArgs(['--pc', '0x10000', 'a.obj'])).toThrow(
      '--pc: 0x10000 is outside the address space'
    );
  });
});
