// Input/output handlers

import type { ZMachine } from "../../ZMachine";
import { IllegalOperationError } from "../../errors";
import { zsciiToChar } from "../../ZText";
import { toSigned16 } from "./arithmetic";

export async function h_sread(vm: ZMachine, [textBuffer, parseBuffer]: number[]) {
  // V1-3 redraw the status line before every read
  vm.showStatus();

  const input = await vm.readLine();
  vm.log(
    `@sread: textBuffer=0x${textBuffer.toString(16)}, parseBuffer=0x${parseBuffer.toString(16)}, input="${input}"`,
  );

  // Byte 0 holds the buffer size; one byte goes to the terminator
  const maxLen = Math.max(0, vm.memory.readByte(textBuffer) - 1);
  let text = "";
  for (const ch of input.toLowerCase()) {
    const code = ch.charCodeAt(0);
    if (code < 32 || code > 126) continue;
    if (text.length >= maxLen) break;
    text += ch;
  }

  for (let i = 0; i < text.length; i++) {
    vm.memory.writeByte(textBuffer + 1 + i, text.charCodeAt(i));
  }
  vm.memory.writeByte(textBuffer + 1 + text.length, 0);

  if (parseBuffer === 0) return;
  const tokens = vm.dictionary.tokenize(text);
  vm.log(
    `@sread: tokens ${tokens
      .map((t) => `"${t.text}"@${t.start}=0x${t.address.toString(16)}`)
      .join(" ")}`,
  );
  vm.dictionary.writeParseBuffer(vm.memory, parseBuffer, tokens);
}

export function h_print_char(vm: ZMachine, [zsciiChar]: number[]) {
  vm.print(zsciiToChar(zsciiChar));
}

export function h_output_stream(vm: ZMachine, [number, table]: number[]) {
  const stream = toSigned16(number);
  vm.log(`@output_stream ${stream}${table !== undefined ? `,${table}` : ""}`);
  switch (stream) {
    case 0:
      return;
    case 1:
    case -1:
      vm.setScreenOutput(stream > 0);
      return;
    case 2:
    case -2:
      vm.setTranscript(stream > 0);
      return;
    case 3:
      if (table === undefined) {
        throw new IllegalOperationError("output_stream 3 needs a table address");
      }
      vm.openMemoryStream(table);
      return;
    case -3:
      vm.closeMemoryStream();
      return;
    default:
      throw new IllegalOperationError(`Unknown output stream ${stream}`);
  }
}

// Keyboard is the only input stream
export function h_input_stream(vm: ZMachine, [number]: number[]) {
  vm.log(`@input_stream ${number} (no-op)`);
}

// Single-window screen model: window operations are accepted and ignored
export function h_split_window(vm: ZMachine, [lines]: number[]) {
  vm.log(`@split_window ${lines} (no-op)`);
}

export function h_set_window(vm: ZMachine, [window]: number[]) {
  vm.log(`@set_window ${window} (no-op)`);
}

export function h_sound_effect(vm: ZMachine, operands: number[]) {
  vm.log(`@sound_effect ${operands.join(",")} (no-op)`);
}
