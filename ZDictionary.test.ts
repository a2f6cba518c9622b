import { ZDictionary } from "./ZDictionary";
import { ZMemory } from "./ZMemory";
import { encodeWord } from "./ZText";
import {
  ABBREVIATIONS,
  DICTIONARY,
  SCRATCH,
  STATIC_BASE,
  StoryBuilder,
} from "./opcodes/test-utils";

const WORDS = ["take", "brass", "lantern", "north"];

function setup(words: string[] = WORDS, mutate: (bytes: Uint8Array) => void = () => {}) {
  const builder = new StoryBuilder().setDictionary([".", ","], words);
  const bytes = builder.build();
  mutate(bytes);
  const memory = new ZMemory(bytes, STATIC_BASE);
  return { builder, memory, dictionary: new ZDictionary(memory, DICTIONARY, ABBREVIATIONS) };
}

describe("ZDictionary", () => {
  it("parses the dictionary header", () => {
    const { dictionary } = setup();
    expect(dictionary.separators).toEqual([".", ","]);
    expect(dictionary.entryLength).toBe(7);
    expect(dictionary.entryCount).toBe(4);
    expect(dictionary.entriesAddress).toBe(DICTIONARY + 6);
  });

  describe("lookup", () => {
    it("finds words regardless of case", () => {
      const { dictionary, builder } = setup();
      expect(dictionary.lookup("take")).toBe(builder.dictionaryAddress("take"));
      expect(dictionary.lookup("NORTH")).toBe(builder.dictionaryAddress("north"));
    });

    it("matches on the first six z-chars", () => {
      const { dictionary, builder } = setup();
      expect(dictionary.lookup("lanterns")).toBe(builder.dictionaryAddress("lantern"));
    });

    it("returns 0 for unknown words", () => {
      expect(setup().dictionary.lookup("xyzzy")).toBe(0);
    });

    it("still finds words in an unsorted table", () => {
      const { dictionary, memory } = setup(WORDS, (bytes) => {
        // swap the first two entries
        const a = DICTIONARY + 6;
        const first = bytes.slice(a, a + 7);
        bytes.copyWithin(a, a + 7, a + 14);
        bytes.set(first, a + 7);
      });
      for (const word of WORDS) {
        const addr = dictionary.lookup(word);
        const [hi, lo] = encodeWord(word);
        expect(memory.readWord(addr)).toBe(hi);
        expect(memory.readWord(addr + 2)).toBe(lo);
      }
    });
  });

  describe("tokenize", () => {
    it("splits words and keeps separators as tokens", () => {
      const { dictionary, builder } = setup();
      expect(dictionary.tokenize("take brass lantern.")).toEqual([
        { text: "take", start: 0, length: 4, address: builder.dictionaryAddress("take") },
        { text: "brass", start: 5, length: 5, address: builder.dictionaryAddress("brass") },
        { text: "lantern", start: 11, length: 7, address: builder.dictionaryAddress("lantern") },
        { text: ".", start: 18, length: 1, address: 0 },
      ]);
    });

    it("resolves a separator that is in the dictionary", () => {
      const { dictionary, builder } = setup(["take", "."]);
      const tokens = dictionary.tokenize("take.");
      expect(tokens[1].address).toBe(builder.dictionaryAddress("."));
      expect(tokens[1].address).not.toBe(0);
    });

    it("skips runs of spaces", () => {
      const { dictionary } = setup();
      expect(dictionary.tokenize("  take,north ").map((t) => [t.text, t.start])).toEqual([
        ["take", 2],
        [",", 6],
        ["north", 7],
      ]);
    });

    it("lower-cases the line", () => {
      const { dictionary, builder } = setup();
      expect(dictionary.tokenize("Take")[0]).toEqual({
        text: "take",
        start: 0,
        length: 4,
        address: builder.dictionaryAddress("take"),
      });
    });
  });

  describe("writeParseBuffer", () => {
    it("writes address, length and 1-based position per token", () => {
      const { dictionary, memory, builder } = setup();
      memory.writeByte(SCRATCH, 10);
      dictionary.writeParseBuffer(memory, SCRATCH, dictionary.tokenize("take brass lantern."));
      expect(memory.readByte(SCRATCH + 1)).toBe(4);
      expect(memory.readWord(SCRATCH + 2)).toBe(builder.dictionaryAddress("take"));
      expect(memory.readByte(SCRATCH + 4)).toBe(4);
      expect(memory.readByte(SCRATCH + 5)).toBe(1);
      // the "." block
      expect(memory.readWord(SCRATCH + 14)).toBe(0);
      expect(memory.readByte(SCRATCH + 16)).toBe(1);
      expect(memory.readByte(SCRATCH + 17)).toBe(19);
    });

    it("stops at the buffer's token limit", () => {
      const { dictionary, memory } = setup();
      memory.writeByte(SCRATCH, 2);
      dictionary.writeParseBuffer(memory, SCRATCH, dictionary.tokenize("take brass lantern."));
      expect(memory.readByte(SCRATCH + 1)).toBe(2);
      expect(memory.readByte(SCRATCH + 10)).toBe(0);
    });
  });

  it("lists the decoded entries", () => {
    const words = setup()
      .dictionary.entries()
      .map((e) => e.word)
      .sort();
    expect(words).toEqual(["brass", "lanter", "north", "take"]);
  });
});
