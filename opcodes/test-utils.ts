/**
 * Common test utilities: an in-memory story image builder and a tiny
 * instruction assembler.
 *
 * Fixed layout of a built story:
 *   0x0000 header
 *   0x0040 abbreviations table (96 words)
 *   0x0100 globals (240 words)
 *   0x02e0 object table: 31 default words, entries, then property tables
 *   0x0800 scratch dynamic memory (buffers, arrays)
 *   0x0a00 static memory: dictionary
 *   0x0c00 strings
 *   0x1000 high memory: code
 */

import { ByteSource } from "../ZMemory";
import { encodeText, encodeWord } from "../ZText";
import { ZMachine, ZMachineOptions } from "../ZMachine";
import { ZBufferedDevice } from "../ZBufferedDevice";

export const ABBREVIATIONS = 0x0040;
export const GLOBALS = 0x0100;
export const OBJECT_TABLE = 0x02e0;
export const SCRATCH = 0x0800;
export const STATIC_BASE = 0x0a00;
export const DICTIONARY = 0x0a00;
export const STRINGS = 0x0c00;
export const CODE = 0x1000;
export const STORY_SIZE = 0x2000;

export interface ObjectSpec {
  name?: string;
  parent?: number;
  sibling?: number;
  child?: number;
  attributes?: number[];
  properties?: Array<{ number: number; data: number[] }>;
}

export class StoryBuilder {
  readonly bytes = new Uint8Array(STORY_SIZE);
  readonly propertyTables: number[] = [];
  private dictionaryWords = new Map<string, number>();
  private stringCursor = STRINGS;
  private codeCursor = CODE;

  constructor() {
    this.bytes[0x00] = 3;
    this.setWord(0x02, 1); // release
    this.setWord(0x04, CODE);
    this.setWord(0x06, CODE);
    this.setWord(0x08, DICTIONARY);
    this.setWord(0x0a, OBJECT_TABLE);
    this.setWord(0x0c, GLOBALS);
    this.setWord(0x0e, STATIC_BASE);
    this.setWord(0x18, ABBREVIATIONS);
    "250101".split("").forEach((c, i) => (this.bytes[0x12 + i] = c.charCodeAt(0)));
    this.setDictionary([], []);
    this.setObjects([]);
  }

  setByte(addr: number, value: number): this {
    this.bytes[addr] = value & 0xff;
    return this;
  }

  setWord(addr: number, value: number): this {
    this.bytes[addr] = (value >> 8) & 0xff;
    this.bytes[addr + 1] = value & 0xff;
    return this;
  }

  // Global n is variable 16 + n
  setGlobal(n: number, value: number): this {
    return this.setWord(GLOBALS + n * 2, value);
  }

  setPropertyDefault(property: number, value: number): this {
    return this.setWord(OBJECT_TABLE + (property - 1) * 2, value);
  }

  /**
   * Writes every object at once: entries first, property tables right
   * after them, the way a compiler lays them out.
   */
  setObjects(specs: ObjectSpec[]): this {
    this.propertyTables.length = 0;
    const entries = OBJECT_TABLE + 62;
    let cursor = entries + specs.length * 9;
    specs.forEach((spec, i) => {
      const entry = entries + i * 9;
      const attrs = [0, 0, 0, 0];
      for (const a of spec.attributes ?? []) attrs[a >> 3] |= 0x80 >> (a & 7);
      attrs.forEach((b, j) => (this.bytes[entry + j] = b));
      this.bytes[entry + 4] = spec.parent ?? 0;
      this.bytes[entry + 5] = spec.sibling ?? 0;
      this.bytes[entry + 6] = spec.child ?? 0;
      this.setWord(entry + 7, cursor);
      this.propertyTables.push(cursor);

      const name = spec.name ? encodeText(spec.name) : [];
      this.bytes[cursor++] = name.length;
      for (const w of name) {
        this.setWord(cursor, w);
        cursor += 2;
      }
      const props = (spec.properties ?? []).slice().sort((a, b) => b.number - a.number);
      for (const p of props) {
        this.bytes[cursor++] = ((p.data.length - 1) << 5) | p.number;
        for (const b of p.data) this.bytes[cursor++] = b;
      }
      this.bytes[cursor++] = 0;
    });
    if (cursor > SCRATCH) throw new Error("object table overflows into scratch memory");
    return this;
  }

  // Entries are 7 bytes (4 of text, 3 of data) and get sorted by encoded text
  setDictionary(separators: string[], words: string[]): this {
    let cursor = DICTIONARY;
    this.bytes[cursor++] = separators.length;
    for (const s of separators) this.bytes[cursor++] = s.charCodeAt(0);
    this.bytes[cursor++] = 7;
    this.setWord(cursor, words.length);
    cursor += 2;

    const encoded = words
      .map((word) => ({ word, key: encodeWord(word) }))
      .sort((a, b) => a.key[0] * 0x10000 + a.key[1] - (b.key[0] * 0x10000 + b.key[1]));
    this.dictionaryWords.clear();
    for (const { word, key } of encoded) {
      this.dictionaryWords.set(word, cursor);
      this.setWord(cursor, key[0]);
      this.setWord(cursor + 2, key[1]);
      cursor += 7;
    }
    return this;
  }

  dictionaryAddress(word: string): number {
    return this.dictionaryWords.get(word) ?? 0;
  }

  // Encoded string at an even address; packed address is addr / 2
  addString(text: string): number {
    const addr = this.stringCursor;
    for (const w of encodeText(text)) {
      this.setWord(this.stringCursor, w);
      this.stringCursor += 2;
    }
    return addr;
  }

  setAbbreviation(index: number, text: string): this {
    const addr = this.addString(text);
    return this.setWord(ABBREVIATIONS + index * 2, addr / 2);
  }

  /** Appends a routine (local count, initial values, body) at an even address. */
  addRoutine(locals: number[], body: number[]): number {
    if (this.codeCursor % 2) this.codeCursor++;
    const addr = this.codeCursor;
    this.bytes[this.codeCursor++] = locals.length;
    for (const v of locals) {
      this.setWord(this.codeCursor, v);
      this.codeCursor += 2;
    }
    this.writeCode(body);
    return addr;
  }

  // Appends raw instructions and returns their address
  addCode(body: number[]): number {
    const addr = this.codeCursor;
    this.writeCode(body);
    return addr;
  }

  private writeCode(body: number[]) {
    for (const b of body) this.bytes[this.codeCursor++] = b;
  }

  setInitialPc(addr: number): this {
    return this.setWord(0x06, addr);
  }

  build(options: { withChecksum?: boolean } = {}): Uint8Array {
    const out = this.bytes.slice();
    if (options.withChecksum) {
      let sum = 0;
      for (let i = 0x40; i < out.length; i++) sum = (sum + out[i]) & 0xffff;
      out[0x1c] = sum >> 8;
      out[0x1d] = sum & 0xff;
    }
    return out;
  }
}

/**
 * Builds a story and loads it. The main code goes after anything `setup`
 * adds; pass a function to assemble it once routine and string addresses
 * are known.
 */
export function machineWith(
  code: number[] | ((b: StoryBuilder) => number[]),
  setup: (b: StoryBuilder) => void = () => {},
  input: string[] = [],
  options: ZMachineOptions = {},
) {
  const builder = new StoryBuilder();
  setup(builder);
  const start = builder.addCode(typeof code === "function" ? code(builder) : code);
  builder.setInitialPc(start);
  const device = new ZBufferedDevice(input);
  const vm = new ZMachine(builder.build(), device, options);
  return { vm, device, builder, start };
}

// Byte-array source for decoder tests
export class MockMemory implements ByteSource {
  constructor(private readonly data: number[]) {}

  readByte(addr: number): number {
    const b = this.data[addr];
    if (b === undefined) throw new RangeError(`read past end at ${addr}`);
    return b;
  }

  readWord(addr: number): number {
    return (this.readByte(addr) << 8) | this.readByte(addr + 1);
  }
}

// --- Assembler ---

export type Arg =
  | { type: "large"; value: number }
  | { type: "small"; value: number }
  | { type: "var"; value: number };

export const lg = (value: number): Arg => ({ type: "large", value });
export const sm = (value: number): Arg => ({ type: "small", value });
export const vr = (value: number): Arg => ({ type: "var", value });

export const SP = vr(0);

function typeBits(a: Arg): number {
  return a.type === "large" ? 0 : a.type === "small" ? 1 : 2;
}

function argBytes(a: Arg): number[] {
  return a.type === "large" ? [(a.value >> 8) & 0xff, a.value & 0xff] : [a.value & 0xff];
}

function typeByte(args: Arg[]): number {
  let byte = 0;
  for (let i = 0; i < 4; i++) {
    byte |= (i < args.length ? typeBits(args[i]) : 3) << (6 - i * 2);
  }
  return byte;
}

export function op0(opnum: number): number[] {
  return [0xb0 | opnum];
}

export function op1(opnum: number, a: Arg): number[] {
  return [0x80 | (typeBits(a) << 4) | opnum, ...argBytes(a)];
}

// Long form when both operands fit, variable form otherwise
export function op2(opnum: number, a: Arg, b: Arg): number[] {
  if (a.type !== "large" && b.type !== "large") {
    const first = (a.type === "var" ? 0x40 : 0) | (b.type === "var" ? 0x20 : 0) | opnum;
    return [first, ...argBytes(a), ...argBytes(b)];
  }
  return [0xc0 | opnum, typeByte([a, b]), ...argBytes(a), ...argBytes(b)];
}

// Variable-form 2OP, for je with more than two operands
export function op2v(opnum: number, args: Arg[]): number[] {
  return [0xc0 | opnum, typeByte(args), ...args.flatMap(argBytes)];
}

export function opv(opnum: number, args: Arg[]): number[] {
  return [0xe0 | opnum, typeByte(args), ...args.flatMap(argBytes)];
}

// Branch byte(s): short form for 0..63, long (14-bit signed) otherwise
export function br(offset: number, onTrue: boolean = true): number[] {
  const polarity = onTrue ? 0x80 : 0;
  if (offset >= 0 && offset <= 63) return [polarity | 0x40 | offset];
  const v = offset & 0x3fff;
  return [polarity | (v >> 8), v & 0xff];
}

export function zstr(text: string): number[] {
  return encodeText(text).flatMap((w) => [w >> 8, w & 0xff]);
}

export const QUIT = op0(0x0a);

// call routine (byte address) with args, storing into `store`
export function callTo(routine: number, args: Arg[] = [], store: number = 0x10): number[] {
  return [...opv(0x00, [lg(routine / 2), ...args]), store];
}

export function printText(text: string): number[] {
  return [...op0(0x02), ...zstr(text)];
}
