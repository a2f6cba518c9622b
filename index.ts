export { ZMachine } from "./ZMachine";
export type { ZMachineOptions } from "./ZMachine";
export type { StatusLine, ZMInputOutputDevice } from "./ZMInputOutputDevice";
export { ZConsole, formatStatusLine } from "./ZConsole";
export { ZBufferedDevice } from "./ZBufferedDevice";
export { ZMemory } from "./ZMemory";
export type { ByteSource } from "./ZMemory";
export { parseHeader, validateHeader } from "./ZHeader";
export type { ZHeader } from "./ZHeader";
export { decodeZString, encodeText, encodeWord, zsciiToString } from "./ZText";
export { ZObjectTable } from "./ZObjectTable";
export { ZStack } from "./ZStack";
export type { CallFrame } from "./ZStack";
export { ZDictionary } from "./ZDictionary";
export type { Token } from "./ZDictionary";
export { ZRandom } from "./ZRandom";
export { decodeInstruction } from "./opcodes/decode";
export type { DecodedInstr, Operand } from "./opcodes/decode";
export * from "./errors";
