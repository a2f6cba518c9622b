// Text output handlers

import type { ZMachine } from "../../ZMachine";
import { ExecCtx } from "../types";
import { toSigned16 } from "./arithmetic";

export function h_print(vm: ZMachine, _ops: number[], ctx: ExecCtx) {
  vm.print(ctx.text ?? "");
}

export function h_print_ret(vm: ZMachine, _ops: number[], ctx: ExecCtx) {
  vm.print((ctx.text ?? "") + "\n");
  vm.returnFromRoutine(1);
}

export function h_new_line(vm: ZMachine) {
  vm.print("\n");
}

export function h_print_num(vm: ZMachine, [n]: number[]) {
  vm.print(toSigned16(n).toString());
}

export function h_print_addr(vm: ZMachine, [addr]: number[]) {
  vm.printZString(addr);
}

export function h_print_paddr(vm: ZMachine, [packed]: number[]) {
  vm.printZString(vm.memory.unpackStringAddress(packed));
}
