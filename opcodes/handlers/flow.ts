// Flow control handlers (return, branch, jump, quit)

import type { ZMachine } from "../../ZMachine";
import { ExecCtx } from "../types";
import { toSigned16 } from "./arithmetic";

export function h_rtrue(vm: ZMachine) {
  vm.returnFromRoutine(1);
}

export function h_rfalse(vm: ZMachine) {
  vm.returnFromRoutine(0);
}

export function h_ret(vm: ZMachine, [value]: number[]) {
  vm.returnFromRoutine(value);
}

export function h_ret_popped(vm: ZMachine) {
  vm.returnFromRoutine(vm.stack.pop());
}

export function h_quit(vm: ZMachine) {
  vm.halt();
}

export function h_jz(_vm: ZMachine, [x]: number[], ctx: ExecCtx) {
  ctx.branch?.(x === 0);
}

export function h_jl(_vm: ZMachine, [a, b]: number[], ctx: ExecCtx) {
  ctx.branch?.(toSigned16(a) < toSigned16(b));
}

export function h_jg(_vm: ZMachine, [a, b]: number[], ctx: ExecCtx) {
  ctx.branch?.(toSigned16(a) > toSigned16(b));
}

// Branches when the first operand equals any of the others
export function h_je(_vm: ZMachine, ops: number[], ctx: ExecCtx) {
  const [a, ...rest] = ops;
  ctx.branch?.(rest.some((v) => v === a));
}

// Relative to the end of the instruction, like a branch
export function h_jump(vm: ZMachine, [offset]: number[]) {
  vm.pc = vm.pc + toSigned16(offset) - 2;
}
