// Miscellaneous handlers (nop, show_status, verify, save/restore/restart)

import type { ZMachine } from "../../ZMachine";
import { UnsupportedOperationError } from "../../errors";
import { ExecCtx } from "../types";

export function h_nop(_vm: ZMachine) {
  // No operation
}

export function h_show_status(vm: ZMachine) {
  vm.showStatus();
}

export function h_verify(vm: ZMachine, _ops: number[], ctx: ExecCtx) {
  ctx.branch?.(vm.memory.checksum() === vm.header.checksum);
}

// No persistence: save and restore report failure to the game
export function h_save(vm: ZMachine, _ops: number[], ctx: ExecCtx) {
  vm.log("@save: not supported, branching false");
  ctx.branch?.(false);
}

export function h_restore(vm: ZMachine, _ops: number[], ctx: ExecCtx) {
  vm.log("@restore: not supported, branching false");
  ctx.branch?.(false);
}

export function h_restart(_vm: ZMachine) {
  throw new UnsupportedOperationError("restart");
}
