import { InstrDescriptor, d0, d1, d2, dv } from "./types";
import { h_add, h_sub, h_mul, h_div, h_mod } from "./handlers/arithmetic";
import { h_and, h_or, h_not, h_test } from "./handlers/logic";
import {
  h_rtrue,
  h_rfalse,
  h_ret,
  h_ret_popped,
  h_quit,
  h_jz,
  h_jl,
  h_jg,
  h_je,
  h_jump,
} from "./handlers/flow";
import {
  h_print,
  h_print_ret,
  h_new_line,
  h_print_num,
  h_print_addr,
  h_print_paddr,
} from "./handlers/text";
import { h_pop, h_push, h_pull, h_random } from "./handlers/stack";
import {
  h_nop,
  h_show_status,
  h_verify,
  h_save,
  h_restore,
  h_restart,
} from "./handlers/misc";
import {
  h_get_sibling,
  h_get_child,
  h_get_parent,
  h_remove_obj,
  h_print_obj,
  h_test_attr,
  h_set_attr,
  h_clear_attr,
  h_jin,
  h_insert_obj,
} from "./handlers/objects";
import {
  h_get_prop_len,
  h_get_prop,
  h_get_prop_addr,
  h_get_next_prop,
  h_put_prop,
} from "./handlers/properties";
import {
  h_inc,
  h_dec,
  h_load,
  h_store,
  h_inc_chk,
  h_dec_chk,
} from "./handlers/variables";
import { h_call } from "./handlers/call";
import { h_loadw, h_loadb, h_storew, h_storeb } from "./handlers/memory";
import {
  h_print_char,
  h_sread,
  h_split_window,
  h_set_window,
  h_output_stream,
  h_input_stream,
  h_sound_effect,
} from "./handlers/io";

// Per-family opcode tables for version 3. Undefined entries are illegal.
export const TABLE_0OP: Array<InstrDescriptor | undefined> = [];
export const TABLE_1OP: Array<InstrDescriptor | undefined> = [];
export const TABLE_2OP: Array<InstrDescriptor | undefined> = [];
export const TABLE_VAR: Array<InstrDescriptor | undefined> = [];

// --- 0OP opcodes ---
TABLE_0OP[0x00] = d0(0x00, { name: "rtrue", handler: h_rtrue });
TABLE_0OP[0x01] = d0(0x01, { name: "rfalse", handler: h_rfalse });
TABLE_0OP[0x02] = d0(0x02, { name: "print", hasText: true, handler: h_print });
TABLE_0OP[0x03] = d0(0x03, {
  name: "print_ret",
  hasText: true,
  handler: h_print_ret,
});
TABLE_0OP[0x04] = d0(0x04, { name: "nop", handler: h_nop });
TABLE_0OP[0x05] = d0(0x05, { name: "save", doesBranch: true, handler: h_save });
TABLE_0OP[0x06] = d0(0x06, {
  name: "restore",
  doesBranch: true,
  handler: h_restore,
});
TABLE_0OP[0x07] = d0(0x07, { name: "restart", handler: h_restart });
TABLE_0OP[0x08] = d0(0x08, { name: "ret_popped", handler: h_ret_popped });
TABLE_0OP[0x09] = d0(0x09, { name: "pop", handler: h_pop });
TABLE_0OP[0x0a] = d0(0x0a, { name: "quit", handler: h_quit });
TABLE_0OP[0x0b] = d0(0x0b, { name: "new_line", handler: h_new_line });
TABLE_0OP[0x0c] = d0(0x0c, { name: "show_status", handler: h_show_status });
TABLE_0OP[0x0d] = d0(0x0d, {
  name: "verify",
  doesBranch: true,
  handler: h_verify,
});

// --- 1OP opcodes ---
TABLE_1OP[0x00] = d1(0x00, { name: "jz", doesBranch: true, handler: h_jz });
TABLE_1OP[0x01] = d1(0x01, {
  name: "get_sibling",
  doesStore: true,
  doesBranch: true,
  handler: h_get_sibling,
});
TABLE_1OP[0x02] = d1(0x02, {
  name: "get_child",
  doesStore: true,
  doesBranch: true,
  handler: h_get_child,
});
TABLE_1OP[0x03] = d1(0x03, {
  name: "get_parent",
  doesStore: true,
  handler: h_get_parent,
});
TABLE_1OP[0x04] = d1(0x04, {
  name: "get_prop_len",
  doesStore: true,
  handler: h_get_prop_len,
});
TABLE_1OP[0x05] = d1(0x05, { name: "inc", handler: h_inc });
TABLE_1OP[0x06] = d1(0x06, { name: "dec", handler: h_dec });
TABLE_1OP[0x07] = d1(0x07, { name: "print_addr", handler: h_print_addr });
// 0x08 is call_1s from version 4 on
TABLE_1OP[0x09] = d1(0x09, { name: "remove_obj", handler: h_remove_obj });
TABLE_1OP[0x0a] = d1(0x0a, { name: "print_obj", handler: h_print_obj });
TABLE_1OP[0x0b] = d1(0x0b, { name: "ret", handler: h_ret });
TABLE_1OP[0x0c] = d1(0x0c, { name: "jump", handler: h_jump });
TABLE_1OP[0x0d] = d1(0x0d, { name: "print_paddr", handler: h_print_paddr });
TABLE_1OP[0x0e] = d1(0x0e, { name: "load", doesStore: true, handler: h_load });
TABLE_1OP[0x0f] = d1(0x0f, { name: "not", doesStore: true, handler: h_not });

// --- 2OP opcodes ---
TABLE_2OP[0x01] = d2(0x01, { name: "je", doesBranch: true, handler: h_je });
TABLE_2OP[0x02] = d2(0x02, { name: "jl", doesBranch: true, handler: h_jl });
TABLE_2OP[0x03] = d2(0x03, { name: "jg", doesBranch: true, handler: h_jg });
TABLE_2OP[0x04] = d2(0x04, {
  name: "dec_chk",
  doesBranch: true,
  handler: h_dec_chk,
});
TABLE_2OP[0x05] = d2(0x05, {
  name: "inc_chk",
  doesBranch: true,
  handler: h_inc_chk,
});
TABLE_2OP[0x06] = d2(0x06, { name: "jin", doesBranch: true, handler: h_jin });
TABLE_2OP[0x07] = d2(0x07, { name: "test", doesBranch: true, handler: h_test });
TABLE_2OP[0x08] = d2(0x08, { name: "or", doesStore: true, handler: h_or });
TABLE_2OP[0x09] = d2(0x09, { name: "and", doesStore: true, handler: h_and });
TABLE_2OP[0x0a] = d2(0x0a, {
  name: "test_attr",
  doesBranch: true,
  handler: h_test_attr,
});
TABLE_2OP[0x0b] = d2(0x0b, { name: "set_attr", handler: h_set_attr });
TABLE_2OP[0x0c] = d2(0x0c, { name: "clear_attr", handler: h_clear_attr });
TABLE_2OP[0x0d] = d2(0x0d, { name: "store", handler: h_store });
TABLE_2OP[0x0e] = d2(0x0e, { name: "insert_obj", handler: h_insert_obj });
TABLE_2OP[0x0f] = d2(0x0f, { name: "loadw", doesStore: true, handler: h_loadw });
TABLE_2OP[0x10] = d2(0x10, { name: "loadb", doesStore: true, handler: h_loadb });
TABLE_2OP[0x11] = d2(0x11, {
  name: "get_prop",
  doesStore: true,
  handler: h_get_prop,
});
TABLE_2OP[0x12] = d2(0x12, {
  name: "get_prop_addr",
  doesStore: true,
  handler: h_get_prop_addr,
});
TABLE_2OP[0x13] = d2(0x13, {
  name: "get_next_prop",
  doesStore: true,
  handler: h_get_next_prop,
});
TABLE_2OP[0x14] = d2(0x14, { name: "add", doesStore: true, handler: h_add });
TABLE_2OP[0x15] = d2(0x15, { name: "sub", doesStore: true, handler: h_sub });
TABLE_2OP[0x16] = d2(0x16, { name: "mul", doesStore: true, handler: h_mul });
TABLE_2OP[0x17] = d2(0x17, { name: "div", doesStore: true, handler: h_div });
TABLE_2OP[0x18] = d2(0x18, { name: "mod", doesStore: true, handler: h_mod });

// --- VAR opcodes ---
TABLE_VAR[0x00] = dv(0x00, {
  name: "call",
  minOperands: 1,
  doesStore: true,
  handler: h_call,
});
TABLE_VAR[0x01] = dv(0x01, { name: "storew", minOperands: 3, handler: h_storew });
TABLE_VAR[0x02] = dv(0x02, { name: "storeb", minOperands: 3, handler: h_storeb });
TABLE_VAR[0x03] = dv(0x03, {
  name: "put_prop",
  minOperands: 3,
  handler: h_put_prop,
});
TABLE_VAR[0x04] = dv(0x04, { name: "sread", minOperands: 2, handler: h_sread });
TABLE_VAR[0x05] = dv(0x05, {
  name: "print_char",
  minOperands: 1,
  handler: h_print_char,
});
TABLE_VAR[0x06] = dv(0x06, {
  name: "print_num",
  minOperands: 1,
  handler: h_print_num,
});
TABLE_VAR[0x07] = dv(0x07, {
  name: "random",
  minOperands: 1,
  doesStore: true,
  handler: h_random,
});
TABLE_VAR[0x08] = dv(0x08, { name: "push", minOperands: 1, handler: h_push });
TABLE_VAR[0x09] = dv(0x09, { name: "pull", minOperands: 1, handler: h_pull });
TABLE_VAR[0x0a] = dv(0x0a, {
  name: "split_window",
  minOperands: 1,
  handler: h_split_window,
});
TABLE_VAR[0x0b] = dv(0x0b, {
  name: "set_window",
  minOperands: 1,
  handler: h_set_window,
});
TABLE_VAR[0x13] = dv(0x13, {
  name: "output_stream",
  minOperands: 1,
  handler: h_output_stream,
});
TABLE_VAR[0x14] = dv(0x14, {
  name: "input_stream",
  minOperands: 1,
  handler: h_input_stream,
});
TABLE_VAR[0x15] = dv(0x15, { name: "sound_effect", handler: h_sound_effect });
