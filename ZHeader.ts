import { StoryFormatError } from "./errors";

export const HEADER_SIZE = 0x40;

// Header byte offsets (V3)
export const H_VERSION = 0x00;
export const H_FLAGS1 = 0x01;
export const H_RELEASE = 0x02;
export const H_HIGH_BASE = 0x04;
export const H_INITIAL_PC = 0x06;
export const H_DICTIONARY = 0x08;
export const H_OBJECT_TABLE = 0x0a;
export const H_GLOBALS = 0x0c;
export const H_STATIC_BASE = 0x0e;
export const H_FLAGS2 = 0x10;
export const H_SERIAL = 0x12;
export const H_ABBREVIATIONS = 0x18;
export const H_FILE_LENGTH = 0x1a;
export const H_CHECKSUM = 0x1c;

// Flags 1 bits (V3)
export const FLAGS1_TIME_GAME = 0x02;
export const FLAGS1_NO_STATUS_LINE = 0x10;
export const FLAGS1_SPLIT_AVAILABLE = 0x20;

// Flags 2 bits
export const FLAGS2_TRANSCRIPT = 0x01;

export type ZHeader = {
  version: number; // target z-machine version
  flags1: number; // interpreter capability / story type flags
  release: number; // release number
  highMemoryAddress: number; // base of high memory
  initialProgramCounter: number; // byte address of the first instruction
  dictionaryAddress: number; // dictionary address
  objectTableAddress: number; // object table address
  globalVariablesAddress: number; // global variables address
  staticMemoryAddress: number; // base of static memory
  flags2: number; // transcript / fixed pitch flags
  serial: string; // serial number, usually a date
  abbreviationsAddress: number; // abbreviations address
  fileLength: number; // file length in bytes (0 if not set)
  checksum: number; // checksum
};

function word(bytes: Uint8Array, offset: number): number {
  return (bytes[offset] << 8) | bytes[offset + 1];
}

export function parseHeader(bytes: Uint8Array): ZHeader {
  if (bytes.length < HEADER_SIZE) {
    throw new StoryFormatError(
      `Story file too short: ${bytes.length} bytes, header needs ${HEADER_SIZE}`,
    );
  }

  let serial = "";
  for (let i = H_SERIAL; i < H_SERIAL + 6; i++) {
    if (bytes[i] !== 0) serial += String.fromCharCode(bytes[i]);
  }

  return {
    version: bytes[H_VERSION],
    flags1: bytes[H_FLAGS1],
    release: word(bytes, H_RELEASE),
    highMemoryAddress: word(bytes, H_HIGH_BASE),
    initialProgramCounter: word(bytes, H_INITIAL_PC),
    dictionaryAddress: word(bytes, H_DICTIONARY),
    objectTableAddress: word(bytes, H_OBJECT_TABLE),
    globalVariablesAddress: word(bytes, H_GLOBALS),
    staticMemoryAddress: word(bytes, H_STATIC_BASE),
    flags2: word(bytes, H_FLAGS2),
    serial,
    abbreviationsAddress: word(bytes, H_ABBREVIATIONS),
    fileLength: word(bytes, H_FILE_LENGTH) * 2,
    checksum: word(bytes, H_CHECKSUM),
  };
}

/**
 * Checks the header against the image it came from and returns the length
 * the address space should have.
 */
export function validateHeader(header: ZHeader, imageLength: number): number {
  if (header.version !== 3) {
    throw new StoryFormatError(
      `Unsupported story version ${header.version}; only version 3 is supported`,
    );
  }

  const length = header.fileLength || imageLength;
  if (imageLength < length) {
    throw new StoryFormatError(
      `Story file truncated: header declares ${length} bytes, image has ${imageLength}`,
    );
  }
  if (length < HEADER_SIZE) {
    throw new StoryFormatError(`Story length ${length} is smaller than the header`);
  }
  if (header.staticMemoryAddress < HEADER_SIZE || header.staticMemoryAddress > length) {
    throw new StoryFormatError(
      `Static memory base 0x${header.staticMemoryAddress.toString(16)} is out of range`,
    );
  }
  if (header.highMemoryAddress > length) {
    throw new StoryFormatError(
      `High memory base 0x${header.highMemoryAddress.toString(16)} is out of range`,
    );
  }
  if (header.initialProgramCounter >= length) {
    throw new StoryFormatError(
      `Initial PC 0x${header.initialProgramCounter.toString(16)} is outside the story`,
    );
  }
  return length;
}
