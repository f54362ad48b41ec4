export interface VmConfig {
  imagePath: string;
  /* overrides the image origin when set */
  pcStart?: number;
  trace: boolean;
  maxSteps?: number;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export const USAGE = 'usage: lc3-step [--trace] [--pc <address>] [--max-steps <n>] <image.obj>';

function parseNumber(flag: string, raw: string | undefined): number {
  if (raw === undefined) {
    throw new ConfigError(`${flag} needs a value`);
  }
  if (/^0x[0-9a-f]+$/i.test(raw)) {
    return parseInt(raw.slice(2), 16);
  }
  if (/^\d+$/.test(raw)) {
    return parseInt(raw, 10);
  }
  throw new ConfigError(`${flag}: '${raw}' is not a number`);
}

/** Parses CLI arguments, without the node and script entries. */
export function parseArgs(args: string[]): VmConfig {
  const config: Partial<VmConfig> = { trace: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case '--trace':
        config.trace = true;
        break;
      case '--pc': {
        const pc = parseNumber(arg, args[++i]);
        if (pc > 0xffff) {
          throw new ConfigError(`--pc: 0x${pc.toString(16)} is outside the address space`);
        }
        config.pcStart = pc;
        break;
      }
      case '--max-steps':
        config.maxSteps = parseNumber(arg, args[++i]);
        break;
      default:
        if (arg.startsWith('-')) {
          throw new ConfigError(`unknown option ${arg}`);
        }
        if (config.imagePath !== undefined) {
          throw new ConfigError(`unexpected argument ${arg}`);
        }
        config.imagePath = arg;
    }
  }

  if (config.imagePath === undefined) {
    throw new ConfigError('missing image path');
  }
  return {
    imagePath: config.imagePath,
    pcStart: config.pcStart,
    trace: config.trace ?? false,
    maxSteps: config.maxSteps,
  };
}
