import { DecodeError, InvalidOpcodeError } from "../errors";
import { ByteSource } from "../ZMemory";
import { decodeZString } from "../ZText";
import { CountKind, InstrDescriptor, OperandType } from "./types";
import { TABLE_0OP, TABLE_1OP, TABLE_2OP, TABLE_VAR } from "./tables";

export interface Operand {
  type: "large" | "small" | "var";
  raw: number; // constant value, or the variable number for "var"
}

export interface BranchInfo {
  offset: number;
  branchOnTrue: boolean;
}

export interface DecodedInstr {
  address: number;
  desc: InstrDescriptor;
  operands: Operand[];
  storeTarget?: number;
  branch?: BranchInfo;
  text?: string;
  length: number; // bytes, so the next instruction starts at address + length
}

function lookup(kind: CountKind, opnum: number, address: number): InstrDescriptor {
  const table =
    kind === "0OP"
      ? TABLE_0OP
      : kind === "1OP"
        ? TABLE_1OP
        : kind === "2OP"
          ? TABLE_2OP
          : TABLE_VAR;
  const desc = table[opnum];
  if (!desc) {
    throw new InvalidOpcodeError(
      `Illegal opcode ${kind}:${opnum.toString(16)} at 0x${address.toString(16)}`,
    );
  }
  return desc;
}

function typeFromBits(bits: number): OperandType {
  if (bits === 0b00) return "large";
  if (bits === 0b01) return "small";
  if (bits === 0b10) return "var";
  return "omit";
}

/**
 * Decodes the instruction at `pc` without touching any machine state.
 * Variable operands come back as variable numbers; reading them is the
 * dispatcher's job.
 */
export function decodeInstruction(
  source: ByteSource,
  pc: number,
  abbreviationsAddress: number = 0,
): DecodedInstr {
  let cursor = pc;
  const fetchByte = () => source.readByte(cursor++);
  const fetchWord = () => {
    const w = source.readWord(cursor);
    cursor += 2;
    return w;
  };

  const first = fetchByte();
  let kind: CountKind;
  let opnum: number;
  let types: OperandType[];

  if (first === 0xbe) {
    throw new InvalidOpcodeError(
      `Extended opcode at 0x${pc.toString(16)} is not available in version 3`,
    );
  } else if ((first & 0xc0) === 0xc0) {
    // Variable form (11xxxxxx): bit 5 picks VAR over 2OP
    kind = first & 0x20 ? "VAR" : "2OP";
    opnum = first & 0x1f;
    types = [];
    const typeByte = fetchByte();
    let omitted = false;
    for (let i = 0; i < 4; i++) {
      const t = typeFromBits((typeByte >> (6 - i * 2)) & 0b11);
      if (t === "omit") {
        omitted = true;
      } else if (omitted) {
        throw new DecodeError(
          `Operand type after an omitted one at 0x${pc.toString(16)}`,
        );
      } else {
        types.push(t);
      }
    }
  } else if ((first & 0xc0) === 0x80) {
    // Short form (10xxxxxx)
    opnum = first & 0x0f;
    const t = typeFromBits((first >> 4) & 0x03);
    kind = t === "omit" ? "0OP" : "1OP";
    types = t === "omit" ? [] : [t];
  } else {
    // Long form: always 2OP, small constant or variable
    kind = "2OP";
    opnum = first & 0x1f;
    types = [first & 0x40 ? "var" : "small", first & 0x20 ? "var" : "small"];
  }

  const desc = lookup(kind, opnum, pc);

  const minOperands = desc.minOperands ?? (kind === "2OP" ? 2 : 0);
  if (types.length < minOperands) {
    throw new DecodeError(
      `${desc.name} at 0x${pc.toString(16)} needs ${minOperands} operands, got ${types.length}`,
    );
  }

  const operands: Operand[] = [];
  for (const t of types) {
    if (t === "large") operands.push({ type: t, raw: fetchWord() });
    else if (t === "small") operands.push({ type: t, raw: fetchByte() });
    else if (t === "var") operands.push({ type: t, raw: fetchByte() });
  }

  const out: DecodedInstr = { address: pc, desc, operands, length: 0 };
  if (desc.doesStore) out.storeTarget = fetchByte();
  if (desc.doesBranch) {
    const b = fetchByte();
    const branchOnTrue = (b & 0x80) !== 0;
    let offset: number;
    if (b & 0x40) {
      // 6-bit unsigned
      offset = b & 0x3f;
    } else {
      // 14-bit signed
      offset = ((b & 0x3f) << 8) | fetchByte();
      if (offset & 0x2000) offset -= 0x4000;
    }
    out.branch = { offset, branchOnTrue };
  }
  if (desc.hasText) {
    const decoded = decodeZString(source, cursor, abbreviationsAddress);
    out.text = decoded.text;
    cursor += decoded.byteLength;
  }
  out.length = cursor - pc;
  return out;
}
