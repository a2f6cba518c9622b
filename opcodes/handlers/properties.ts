// Property handlers

import type { ZMachine } from "../../ZMachine";
import { ExecCtx } from "../types";

export function h_get_prop(vm: ZMachine, [objectId, property]: number[], ctx: ExecCtx) {
  ctx.store?.(vm.objects.getProperty(objectId, property));
}

export function h_get_prop_addr(vm: ZMachine, [objectId, property]: number[], ctx: ExecCtx) {
  ctx.store?.(vm.objects.getPropertyAddress(objectId, property));
}

export function h_get_prop_len(vm: ZMachine, [dataAddress]: number[], ctx: ExecCtx) {
  ctx.store?.(vm.objects.getPropertyLength(dataAddress));
}

export function h_get_next_prop(vm: ZMachine, [objectId, property]: number[], ctx: ExecCtx) {
  ctx.store?.(vm.objects.getNextProperty(objectId, property));
}

export function h_put_prop(vm: ZMachine, [objectId, property, value]: number[]) {
  vm.objects.putProperty(objectId, property, value);
}
