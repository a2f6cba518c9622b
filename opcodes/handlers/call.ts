// Routine call handler

import type { ZMachine } from "../../ZMachine";
import { ExecCtx } from "../types";

export function h_call(vm: ZMachine, operands: number[], ctx: ExecCtx) {
  const [packedAddress, ...args] = operands;

  // Calling packed address 0 does nothing and returns false
  if (packedAddress === 0) {
    vm.log(`@call routine address 0: returning FALSE`);
    ctx.store?.(0);
    return;
  }

  vm.callRoutine(packedAddress, args, ctx.storeTarget);
}
