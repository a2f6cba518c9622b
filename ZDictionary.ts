import { ByteSource, ZMemory } from "./ZMemory";
import { decodeZString, encodeWord, zsciiToChar } from "./ZText";

export interface Token {
  text: string;
  start: number; // 0-based offset in the line
  length: number;
  address: number; // dictionary entry, 0 when the word is unknown
}

export interface DictionaryWord {
  address: number;
  word: string;
}

export class ZDictionary {
  readonly separators: string[];
  readonly entryLength: number;
  readonly entryCount: number;
  readonly entriesAddress: number;
  private readonly sorted: boolean;

  constructor(
    private readonly source: ByteSource,
    readonly address: number,
    private readonly abbreviationsAddress: number,
  ) {
    const separatorCount = source.readByte(address);
    this.separators = [];
    for (let i = 0; i < separatorCount; i++) {
      this.separators.push(zsciiToChar(source.readByte(address + 1 + i)));
    }
    const header = address + 1 + separatorCount;
    this.entryLength = source.readByte(header);
    this.entryCount = source.readWord(header + 1);
    this.entriesAddress = header + 3;
    this.sorted = this.checkSorted();
  }

  private entryAddress(index: number): number {
    return this.entriesAddress + index * this.entryLength;
  }

  // Encoded text of an entry as one unsigned 32-bit key
  private keyAt(index: number): number {
    const addr = this.entryAddress(index);
    return this.source.readWord(addr) * 0x10000 + this.source.readWord(addr + 2);
  }

  private checkSorted(): boolean {
    for (let i = 1; i < this.entryCount; i++) {
      if (this.keyAt(i - 1) > this.keyAt(i)) return false;
    }
    return true;
  }

  // Entry address for the word, or 0 when it is not in the dictionary
  lookup(word: string): number {
    const [hi, lo] = encodeWord(word);
    const key = hi * 0x10000 + lo;

    if (!this.sorted) {
      for (let i = 0; i < this.entryCount; i++) {
        if (this.keyAt(i) === key) return this.entryAddress(i);
      }
      return 0;
    }

    let low = 0;
    let high = this.entryCount - 1;
    while (low <= high) {
      const mid = (low + high) >> 1;
      const k = this.keyAt(mid);
      if (k === key) return this.entryAddress(mid);
      if (k < key) low = mid + 1;
      else high = mid - 1;
    }
    return 0;
  }

  /**
   * Splits a line into words at spaces and separators. Each separator is a
   * token of its own; spaces are dropped.
   */
  tokenize(line: string): Token[] {
    const text = line.toLowerCase();
    const tokens: Token[] = [];
    let start = -1;

    const flush = (end: number) => {
      if (start < 0) return;
      const word = text.slice(start, end);
      tokens.push({ text: word, start, length: word.length, address: this.lookup(word) });
      start = -1;
    };

    for (let i = 0; i < text.length; i++) {
      const ch = text[i];
      if (ch === " ") {
        flush(i);
      } else if (this.separators.includes(ch)) {
        flush(i);
        tokens.push({ text: ch, start: i, length: 1, address: this.lookup(ch) });
      } else if (start < 0) {
        start = i;
      }
    }
    flush(text.length);
    return tokens;
  }

  /**
   * Fills a parse buffer: byte 0 holds the capacity, byte 1 receives the
   * count, then one 4-byte block per token (entry address, length,
   * position in the text buffer).
   */
  writeParseBuffer(memory: ZMemory, parseBuffer: number, tokens: Token[]): void {
    const max = memory.readByte(parseBuffer);
    const count = Math.min(max, tokens.length);
    memory.writeByte(parseBuffer + 1, count);
    for (let i = 0; i < count; i++) {
      const block = parseBuffer + 2 + i * 4;
      memory.writeWord(block, tokens[i].address);
      memory.writeByte(block + 2, tokens[i].length);
      // text starts at byte 1 of the text buffer
      memory.writeByte(block + 3, tokens[i].start + 1);
    }
  }

  entries(): DictionaryWord[] {
    const words: DictionaryWord[] = [];
    for (let i = 0; i < this.entryCount; i++) {
      const address = this.entryAddress(i);
      const decoded = decodeZString(this.source, address, this.abbreviationsAddress, {
        maxWords: 2,
      });
      words.push({ address, word: decoded.text });
    }
    return words;
  }
}
