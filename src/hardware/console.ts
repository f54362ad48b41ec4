import { readSync } from 'fs';
import { keyInYN } from 'readline-sync';

const NEWLINE = 0x0a;
const CARRIAGE_RETURN = 0x0d;
const CTRL_C = 0x03;

/**
 * Character device behind the keyboard and display registers.
 * `readChar` may block; `writeChar` must not.
 */
export interface ConsoleDevice {
  readChar(): number;
  writeChar(char: number): void;
}

export type ByteSource = () => number;

/** Blocks until one byte arrives on stdin, with the terminal in raw mode. */
export function readStdinByte(): number {
  const buffer = Buffer.alloc(1);
  const { stdin } = process;
  const raw = stdin.isTTY === true;
  if (raw) stdin.setRawMode(true);

  try {
    for (;;) {
      try {
        if (readSync(stdin.fd, buffer, 0, 1, null) === 0) {
          throw new Error('console input closed');
        }
        return buffer[0];
      } catch (err) {
        /* stdin may be non-blocking; wait for the key */
        if (!(err instanceof Error && 'code' in err && err.code === 'EAGAIN')) throw err;
      }
    }
  } finally {
    if (raw) stdin.setRawMode(false);
  }
}

export class TerminalConsole implements ConsoleDevice {
  constructor(private readonly readByte: ByteSource = readStdinByte) {}

  public readChar(): number {
    for (;;) {
      const char = this.readByte();
      if (char === CARRIAGE_RETURN) {
        return NEWLINE;
      }
      if (char !== CTRL_C) {
        return char;
      }
      /* raw mode swallows SIGINT */
      if (keyInYN('Would you like to quit?')) {
        process.exit(0);
      }
    }
  }

  public writeChar(char: number): void {
    process.stdout.write(Buffer.from([char & 0xff]));
  }
}
