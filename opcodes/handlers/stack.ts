// Stack manipulation handlers

import type { ZMachine } from "../../ZMachine";
import { ExecCtx } from "../types";
import { toSigned16 } from "./arithmetic";

export function h_pop(vm: ZMachine) {
  vm.stack.pop();
}

export function h_push(vm: ZMachine, [value]: number[]) {
  vm.stack.push(value);
}

export function h_pull(vm: ZMachine, [variable]: number[]) {
  const value = vm.stack.pop();
  vm.log(`@pull: value=${value}, target var=${variable}`);
  vm.stack.writeVariableInPlace(variable, value);
}

// Positive range: random in [1, range]. Otherwise reseed and store 0.
export function h_random(vm: ZMachine, [range]: number[], ctx: ExecCtx) {
  const signedRange = toSigned16(range);
  if (signedRange > 0) {
    ctx.store?.(vm.random.next(signedRange));
    return;
  }
  vm.random.seed(signedRange);
  ctx.store?.(0);
}
