// Table-driven opcode metadata for the version 3 instruction set

import type { ZMachine } from "../ZMachine";

export type OperandType = "large" | "small" | "var" | "omit";
export type CountKind = "0OP" | "1OP" | "2OP" | "VAR";

export interface ExecCtx {
  // Bound by the dispatcher for the *current* instruction
  store?: (value: number) => void;
  branch?: (cond: boolean) => void;
  storeTarget?: number; // raw variable number, for calls that store on return
  text?: string; // inline string of print / print_ret
}

export type Handler = (
  vm: ZMachine,
  operands: number[],
  ctx: ExecCtx,
) => void | Promise<void>;

export interface InstrDescriptor {
  name: string; // display/debug name, e.g. "add", "jz"
  kind: CountKind;
  opcode: number; // number within that family
  // Fewest operands the handler can run with (VAR and variable-form 2OP)
  minOperands?: number;
  doesStore?: boolean;
  doesBranch?: boolean;
  hasText?: boolean;
  handler: Handler;
}

function mk(kind: CountKind, max: number) {
  return (
    opcode: number,
    init: Omit<InstrDescriptor, "kind" | "opcode">,
  ): InstrDescriptor => {
    if (opcode < 0 || opcode > max)
      throw new Error(`${kind} opcode out of range: ${opcode}`);
    return { kind, opcode, ...init };
  };
}

export const d0 = mk("0OP", 0x0f);
export const d1 = mk("1OP", 0x0f);
export const d2 = mk("2OP", 0x1f);
export const dv = mk("VAR", 0x1f);
