// Bitwise operation handlers

import type { ZMachine } from "../../ZMachine";
import { ExecCtx } from "../types";

export function h_and(_vm: ZMachine, [a, b]: number[], ctx: ExecCtx) {
  ctx.store?.(a & b & 0xffff);
}

export function h_or(_vm: ZMachine, [a, b]: number[], ctx: ExecCtx) {
  ctx.store?.((a | b) & 0xffff);
}

export function h_not(_vm: ZMachine, [a]: number[], ctx: ExecCtx) {
  ctx.store?.(~a & 0xffff);
}

export function h_test(_vm: ZMachine, [bitmap, flags]: number[], ctx: ExecCtx) {
  ctx.branch?.((bitmap & flags) === flags);
}
