import { AddressOutOfBoundsError, ReadOnlyViolationError } from "./errors";

// Anything the decoder and text codec can read from
export interface ByteSource {
  readByte(addr: number): number;
  readWord(addr: number): number;
}

/**
 * The story's address space. Dynamic memory [0, staticBase) is writable by
 * the running program; everything from staticBase up is read-only to it.
 */
export class ZMemory implements ByteSource {
  private readonly bytes: Uint8Array;
  private readonly storyChecksum: number;

  constructor(
    bytes: Uint8Array,
    readonly staticBase: number,
  ) {
    this.bytes = bytes;
    let sum = 0;
    for (let i = 0x40; i < bytes.length; i++) {
      sum = (sum + bytes[i]) & 0xffff;
    }
    this.storyChecksum = sum;
  }

  get size(): number {
    return this.bytes.length;
  }

  readByte(addr: number): number {
    if (!Number.isInteger(addr) || addr < 0 || addr >= this.bytes.length) {
      throw new AddressOutOfBoundsError(addr, this.bytes.length);
    }
    return this.bytes[addr];
  }

  readWord(addr: number): number {
    if (!Number.isInteger(addr) || addr < 0 || addr + 1 >= this.bytes.length) {
      throw new AddressOutOfBoundsError(addr, this.bytes.length);
    }
    return (this.bytes[addr] << 8) | this.bytes[addr + 1];
  }

  writeByte(addr: number, value: number): void {
    this.checkWritable(addr, 1);
    this.bytes[addr] = value & 0xff;
  }

  writeWord(addr: number, value: number): void {
    this.checkWritable(addr, 2);
    this.bytes[addr] = (value >> 8) & 0xff;
    this.bytes[addr + 1] = value & 0xff;
  }

  // Interpreter-side header update; skips the static memory check
  poke(addr: number, value: number): void {
    if (!Number.isInteger(addr) || addr < 0 || addr >= this.bytes.length) {
      throw new AddressOutOfBoundsError(addr, this.bytes.length);
    }
    this.bytes[addr] = value & 0xff;
  }

  unpackRoutineAddress(packed: number): number {
    return packed * 2;
  }

  unpackStringAddress(packed: number): number {
    return packed * 2;
  }

  // Sum of every byte after the 64-byte header, modulo 0x10000, as loaded.
  // Later writes to dynamic memory don't change it.
  checksum(): number {
    return this.storyChecksum;
  }

  private checkWritable(addr: number, width: number): void {
    if (!Number.isInteger(addr) || addr < 0 || addr + width > this.bytes.length) {
      throw new AddressOutOfBoundsError(addr, this.bytes.length);
    }
    if (addr + width > this.staticBase) {
      throw new ReadOnlyViolationError(addr, this.staticBase);
    }
  }
}
