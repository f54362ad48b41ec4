/** Memory Mapped Registers */
export enum MemoryMappedRegister {
  MR_KBSR = 0xfe00 /* keyboard status */,
  MR_KBDR = 0xfe02 /* keyboard data */,
  MR_DSR = 0xfe04 /* display status */,
  MR_DDR = 0xfe06 /* display data */,
  MR_MCR = 0xfffe /* machine control */,
}

export const MEMORY_SIZE = 1 << 16;

/* status value reported by a device that is ready */
export const DEVICE_READY = 1 << 15;
