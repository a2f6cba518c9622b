// Variable manipulation handlers. Operands naming a variable are taken by
// number, so `inc 0` means "the stack", not the value popped from it.

import type { ZMachine } from "../../ZMachine";
import { ExecCtx } from "../types";
import { toSigned16 } from "./arithmetic";

function step(vm: ZMachine, variable: number, delta: number): number {
  const value = (vm.stack.readVariable(variable) + delta) & 0xffff;
  vm.stack.writeVariable(variable, value);
  return value;
}

export function h_inc(vm: ZMachine, [variable]: number[]) {
  step(vm, variable, 1);
}

export function h_dec(vm: ZMachine, [variable]: number[]) {
  step(vm, variable, -1);
}

export function h_inc_chk(vm: ZMachine, [variable, compare]: number[], ctx: ExecCtx) {
  const value = step(vm, variable, 1);
  ctx.branch?.(toSigned16(value) > toSigned16(compare));
}

export function h_dec_chk(vm: ZMachine, [variable, compare]: number[], ctx: ExecCtx) {
  const value = step(vm, variable, -1);
  ctx.branch?.(toSigned16(value) < toSigned16(compare));
}

// load/store on variable 0 use the top of stack in place
export function h_load(vm: ZMachine, [variable]: number[], ctx: ExecCtx) {
  ctx.store?.(vm.stack.readVariableInPlace(variable));
}

export function h_store(vm: ZMachine, [variable, value]: number[]) {
  vm.stack.writeVariableInPlace(variable, value);
}
