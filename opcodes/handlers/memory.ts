// Array access handlers. Addresses wrap within the 16-bit address space.

import type { ZMachine } from "../../ZMachine";
import { ExecCtx } from "../types";

function wordAddress(array: number, index: number): number {
  return (array + 2 * index) & 0xffff;
}

function byteAddress(array: number, index: number): number {
  return (array + index) & 0xffff;
}

export function h_loadw(vm: ZMachine, [array, index]: number[], ctx: ExecCtx) {
  ctx.store?.(vm.memory.readWord(wordAddress(array, index)));
}

export function h_loadb(vm: ZMachine, [array, index]: number[], ctx: ExecCtx) {
  ctx.store?.(vm.memory.readByte(byteAddress(array, index)));
}

export function h_storew(vm: ZMachine, [array, index, value]: number[]) {
  vm.memory.writeWord(wordAddress(array, index), value);
}

export function h_storeb(vm: ZMachine, [array, index, value]: number[]) {
  vm.memory.writeByte(byteAddress(array, index), value);
}
