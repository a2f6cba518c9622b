// Arithmetic instruction handlers. Operands arrive as unsigned 16-bit words.

import type { ZMachine } from "../../ZMachine";
import { DivideByZeroError } from "../../errors";
import { ExecCtx } from "../types";

export function toSigned16(n: number): number {
  return n > 32767 ? n - 65536 : n;
}

export function toUnsigned16(n: number): number {
  return n & 0xffff;
}

export function h_add(_vm: ZMachine, [a, b]: number[], ctx: ExecCtx) {
  ctx.store?.(toUnsigned16(toSigned16(a) + toSigned16(b)));
}

export function h_sub(_vm: ZMachine, [a, b]: number[], ctx: ExecCtx) {
  ctx.store?.(toUnsigned16(toSigned16(a) - toSigned16(b)));
}

export function h_mul(_vm: ZMachine, [a, b]: number[], ctx: ExecCtx) {
  ctx.store?.(toUnsigned16(toSigned16(a) * toSigned16(b)));
}

// Truncates toward zero
export function h_div(_vm: ZMachine, [a, b]: number[], ctx: ExecCtx) {
  const divisor = toSigned16(b);
  if (divisor === 0) throw new DivideByZeroError("div");
  ctx.store?.(toUnsigned16(Math.trunc(toSigned16(a) / divisor)));
}

// Result takes the sign of the dividend
export function h_mod(_vm: ZMachine, [a, b]: number[], ctx: ExecCtx) {
  const divisor = toSigned16(b);
  if (divisor === 0) throw new DivideByZeroError("mod");
  ctx.store?.(toUnsigned16(toSigned16(a) % divisor));
}
