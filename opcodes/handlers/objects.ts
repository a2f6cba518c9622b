// Object tree handlers

import type { ZMachine } from "../../ZMachine";
import { ExecCtx } from "../types";

export function h_get_sibling(vm: ZMachine, [objectId]: number[], ctx: ExecCtx) {
  const sibling = vm.objects.getSibling(objectId);
  ctx.store?.(sibling);
  ctx.branch?.(sibling !== 0);
}

export function h_get_child(vm: ZMachine, [objectId]: number[], ctx: ExecCtx) {
  const child = vm.objects.getChild(objectId);
  ctx.store?.(child);
  ctx.branch?.(child !== 0);
}

export function h_get_parent(vm: ZMachine, [objectId]: number[], ctx: ExecCtx) {
  ctx.store?.(vm.objects.getParent(objectId));
}

export function h_jin(vm: ZMachine, [objectId, parentId]: number[], ctx: ExecCtx) {
  ctx.branch?.(vm.objects.getParent(objectId) === parentId);
}

export function h_remove_obj(vm: ZMachine, [objectId]: number[]) {
  vm.objects.removeObject(objectId);
}

export function h_insert_obj(vm: ZMachine, [objectId, destId]: number[]) {
  vm.log(`@insert_obj ${objectId} -> ${destId}`);
  vm.objects.insertObject(objectId, destId);
}

export function h_print_obj(vm: ZMachine, [objectId]: number[]) {
  vm.print(vm.objects.getShortName(objectId));
}

export function h_test_attr(vm: ZMachine, [objectId, attribute]: number[], ctx: ExecCtx) {
  ctx.branch?.(vm.objects.getAttribute(objectId, attribute));
}

export function h_set_attr(vm: ZMachine, [objectId, attribute]: number[]) {
  vm.objects.setAttribute(objectId, attribute, true);
}

export function h_clear_attr(vm: ZMachine, [objectId, attribute]: number[]) {
  vm.objects.setAttribute(objectId, attribute, false);
}
