import { readFileSync } from 'fs';
import { toWord } from '../hardware/memory';
import { MachineState } from '../hardware/state';

export class ImageFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ImageFormatError';
  }
}

/**
 * Copies a big-endian object image into memory. The first word is the
 * origin; the rest are placed at consecutive addresses from there.
 * @returns the origin address
 */
export function loadImage(state: MachineState, image: Buffer): number {
  if (image.length < 2) {
    throw new ImageFormatError(`image is ${image.length} byte(s), too short for an origin`);
  }
  if (image.length % 2 !== 0) {
    throw new ImageFormatError(`image has an odd length of ${image.length} bytes`);
  }

  /* the origin tells us where in memory to place the image */
  const origin: number = image.readUInt16BE(0);
  let pos = 0;

  while ((pos + 1) * 2 < image.length) {
    state.memory[toWord(origin + pos)] = image.readUInt16BE((pos + 1) * 2);
    pos++;
  }

  return origin;
}

export function readImage(state: MachineState, imagePath: string): number {
  return loadImage(state, readFileSync(imagePath));
}
