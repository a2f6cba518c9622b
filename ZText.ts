// Z-character text codec (V3): three alphabets, abbreviations and ZSCII literals

import { DecodeError } from "./errors";
import { ByteSource } from "./ZMemory";

const A0 = "abcdefghijklmnopqrstuvwxyz";
const A1 = "ABCDEFGHIJKLMNOPQRSTUVWXYZ";
// A2 position 0 (z-char 6) is the ZSCII escape, never printed
const A2 = " \n0123456789.,!?_#'\"/\\-:()";
const ALPHABETS = [A0, A1, A2];

const ZSCII_NEWLINE = 13;
const PAD = 5;

// Dictionary words hold 6 z-characters (2 words) in V3
export const DICTIONARY_WORD_ZCHARS = 6;

export interface DecodedString {
  zscii: number[];
  text: string;
  byteLength: number; // bytes consumed, including the terminating word
}

/**
 * Splits encoded words into z-characters, stopping after the word with the
 * high bit set (or after maxWords, for fixed-size dictionary entries).
 */
export function readZChars(
  source: ByteSource,
  addr: number,
  maxWords: number = Infinity,
): { zchars: number[]; byteLength: number } {
  const zchars: number[] = [];
  let byteLength = 0;
  while (byteLength / 2 < maxWords) {
    const w = source.readWord(addr + byteLength);
    byteLength += 2;
    zchars.push((w >> 10) & 0x1f, (w >> 5) & 0x1f, w & 0x1f);
    if (w & 0x8000) break;
  }
  return { zchars, byteLength };
}

export function decodeZString(
  source: ByteSource,
  addr: number,
  abbreviationsAddress: number,
  options: { inAbbreviation?: boolean; maxWords?: number } = {},
): DecodedString {
  const { zchars, byteLength } = readZChars(source, addr, options.maxWords);
  const zscii = zcharsToZscii(
    source,
    zchars,
    abbreviationsAddress,
    options.inAbbreviation ?? false,
  );
  return { zscii, text: zsciiToString(zscii), byteLength };
}

export function zcharsToZscii(
  source: ByteSource,
  zchars: number[],
  abbreviationsAddress: number,
  inAbbreviation: boolean,
): number[] {
  const out: number[] = [];
  let alphabet = 0;

  for (let i = 0; i < zchars.length; i++) {
    const z = zchars[i];

    if (alphabet === 2 && z === 6) {
      // 10-bit ZSCII literal; dropped if the string ends first
      if (i + 2 >= zchars.length) break;
      out.push((zchars[i + 1] << 5) | zchars[i + 2]);
      i += 2;
      alphabet = 0;
      continue;
    }

    if (z === 0) {
      out.push(32);
      alphabet = 0;
      continue;
    }

    if (z >= 1 && z <= 3) {
      if (inAbbreviation) {
        throw new DecodeError("Abbreviation used inside an abbreviation");
      }
      if (i + 1 >= zchars.length) break;
      const index = 32 * (z - 1) + zchars[i + 1];
      i++;
      const entry = source.readWord(abbreviationsAddress + index * 2);
      const expansion = decodeZString(source, entry * 2, abbreviationsAddress, {
        inAbbreviation: true,
      });
      out.push(...expansion.zscii);
      alphabet = 0;
      continue;
    }

    if (z === 4 || z === 5) {
      // Single shift: applies to the next character only
      alphabet = z - 3;
      continue;
    }

    const ch = ALPHABETS[alphabet][z - 6];
    out.push(ch === "\n" ? ZSCII_NEWLINE : ch.charCodeAt(0));
    alphabet = 0;
  }

  return out;
}

export function zsciiToChar(code: number): string {
  if (code === ZSCII_NEWLINE) return "\n";
  if (code >= 32 && code <= 126) return String.fromCharCode(code);
  // ZSCII 0 prints nothing; the extra-character range is not mapped
  return "";
}

export function zsciiToString(codes: number[]): string {
  let s = "";
  for (const code of codes) s += zsciiToChar(code);
  return s;
}

export function textToZChars(text: string): number[] {
  const zchars: number[] = [];
  for (const ch of text) {
    if (ch === " ") {
      zchars.push(0);
      continue;
    }
    let idx = A0.indexOf(ch);
    if (idx >= 0) {
      zchars.push(idx + 6);
      continue;
    }
    idx = A1.indexOf(ch);
    if (idx >= 0) {
      zchars.push(4, idx + 6);
      continue;
    }
    idx = A2.indexOf(ch, 1);
    if (idx >= 1) {
      zchars.push(5, idx + 6);
      continue;
    }
    const code = ch.charCodeAt(0);
    if (code > 32 && code <= 126) {
      zchars.push(5, 6, (code >> 5) & 0x1f, code & 0x1f);
    }
    // anything else has no ZSCII form in this codec and is skipped
  }
  return zchars;
}

// Packs z-characters three to a word, padding with 5s and marking the last word
export function packZChars(zchars: number[]): number[] {
  const padded = zchars.slice();
  if (padded.length === 0) padded.push(PAD);
  while (padded.length % 3 !== 0) padded.push(PAD);

  const words: number[] = [];
  for (let i = 0; i < padded.length; i += 3) {
    words.push((padded[i] << 10) | (padded[i + 1] << 5) | padded[i + 2]);
  }
  words[words.length - 1] |= 0x8000;
  return words;
}

export function encodeText(text: string): number[] {
  return packZChars(textToZChars(text));
}

/**
 * Dictionary form of a word: lower-cased, cut to 6 z-characters, padded
 * with 5s, two words with the end bit on the second.
 */
export function encodeWord(text: string): number[] {
  const zchars = textToZChars(text.toLowerCase()).slice(0, DICTIONARY_WORD_ZCHARS);
  while (zchars.length < DICTIONARY_WORD_ZCHARS) zchars.push(PAD);
  return packZChars(zchars);
}
