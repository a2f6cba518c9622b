import { StatusLine, ZMInputOutputDevice } from "./ZMInputOutputDevice";
import { BranchInfo, DecodedInstr, decodeInstruction } from "./opcodes/decode";
import { ExecCtx } from "./opcodes/types";
import { toSigned16 } from "./opcodes/handlers/arithmetic";
import {
  DecodeError,
  IllegalOperationError,
  StoryFormatError,
  ZMachineError,
} from "./errors";
import {
  FLAGS1_NO_STATUS_LINE,
  FLAGS1_SPLIT_AVAILABLE,
  FLAGS1_TIME_GAME,
  FLAGS2_TRANSCRIPT,
  H_FLAGS1,
  H_FLAGS2,
  ZHeader,
  parseHeader,
  validateHeader,
} from "./ZHeader";
import { ZMemory } from "./ZMemory";
import { ZStack } from "./ZStack";
import { ZObjectTable } from "./ZObjectTable";
import { ZDictionary } from "./ZDictionary";
import { ZRandom } from "./ZRandom";
import { decodeZString } from "./ZText";

export interface ZMachineOptions {
  trace?: boolean; // log every instruction to the console
  seed?: number; // fixed seed for the random source
  ignoreChecksum?: boolean; // load stories whose checksum doesn't match
}

// Output stream 3 nesting limit
const MAX_MEMORY_STREAMS = 16;
const MAX_LOCALS = 15;

interface MemoryStream {
  table: number;
  count: number;
}

function variableName(varNum: number): string {
  if (varNum === 0) return "SP";
  if (varNum < 16) return `L${varNum.toString(16).padStart(2, "0")}`;
  return `G${(varNum - 16).toString(16).padStart(2, "0")}`;
}

class ZMachine {
  pc: number; // current program counter
  readonly header: ZHeader;
  readonly memory: ZMemory;
  readonly stack: ZStack;
  readonly objects: ZObjectTable;
  readonly dictionary: ZDictionary;
  readonly random: ZRandom;
  private trace: boolean;
  private halted = false;
  private screenOutput = true;
  private memoryStreams: MemoryStream[] = [];

  constructor(
    story: Uint8Array,
    private readonly inputOutputDevice: ZMInputOutputDevice,
    options: ZMachineOptions = {},
  ) {
    const header = parseHeader(story);
    const length = validateHeader(header, story.length);
    this.memory = new ZMemory(story.slice(0, length), header.staticMemoryAddress);

    if (!options.ignoreChecksum && header.checksum !== 0) {
      const actual = this.memory.checksum();
      if (actual !== header.checksum) {
        throw new StoryFormatError(
          `Checksum mismatch: header says 0x${header.checksum.toString(16)}, story sums to 0x${actual.toString(16)}`,
        );
      }
    }

    // Status line available, screen splitting not
    const flags1 = header.flags1 & ~(FLAGS1_NO_STATUS_LINE | FLAGS1_SPLIT_AVAILABLE);
    this.memory.poke(H_FLAGS1, flags1);
    this.header = { ...header, flags1 };

    this.stack = new ZStack(this.memory, header.globalVariablesAddress);
    this.objects = new ZObjectTable(
      this.memory,
      header.objectTableAddress,
      header.abbreviationsAddress,
    );
    this.dictionary = new ZDictionary(
      this.memory,
      header.dictionaryAddress,
      header.abbreviationsAddress,
    );
    this.random = new ZRandom(options.seed);
    this.trace = options.trace ?? false;
    this.pc = header.initialProgramCounter;
  }

  getHeader(): ZHeader {
    return this.header;
  }

  setTrace(enabled: boolean) {
    this.trace = enabled;
  }

  log(message: string) {
    if (this.trace) console.log(message);
  }

  get isHalted(): boolean {
    return this.halted;
  }

  halt() {
    this.log("@quit");
    this.halted = true;
  }

  /**
   * Runs until the game quits. Errors halt the machine and are rethrown with
   * the address of the failing instruction attached.
   */
  async run(): Promise<void> {
    while (!this.halted) {
      const pc = this.pc;
      try {
        await this.step();
      } catch (err) {
        this.halted = true;
        if (err instanceof ZMachineError && err.pc === undefined) {
          err.pc = pc;
        }
        throw err;
      }
    }
  }

  /**
   * Executes a single instruction.
   */
  async step(): Promise<void> {
    if (this.halted) return;

    const di = decodeInstruction(this.memory, this.pc, this.header.abbreviationsAddress);
    if (this.trace) console.log(this.formatTrace(di));
    this.pc = di.address + di.length;

    // Left to right, so stack operands pop in order
    const operands = di.operands.map((op) =>
      op.type === "var" ? this.stack.readVariable(op.raw) : op.raw,
    );

    // Bind per-instruction ExecCtx helpers based on decoded plumbing
    const ctx: ExecCtx = {};
    if (di.storeTarget !== undefined) {
      const target = di.storeTarget;
      ctx.storeTarget = target;
      ctx.store = (v: number) => this.stack.writeVariable(target, v);
    }
    if (di.branch !== undefined) {
      const branch = di.branch;
      ctx.branch = (cond: boolean) => this.applyBranch(branch, cond);
    }
    if (di.text !== undefined) ctx.text = di.text;

    await di.desc.handler(this, operands, ctx);
  }

  private formatTrace(di: DecodedInstr): string {
    let traceOutput = `${di.address.toString(16).padStart(4, "0")}:`;
    for (let i = 0; i < di.length; i++) {
      traceOutput += ` ${this.memory.readByte(di.address + i).toString(16).padStart(2, "0")}`;
    }
    traceOutput += ` [${di.desc.name}`;
    if (di.operands.length > 0) {
      const operandStrs = di.operands.map((op) =>
        op.type === "var" ? variableName(op.raw) : `#${op.raw.toString(16)}`,
      );
      traceOutput += ` ${operandStrs.join(",")}`;
    }
    if (di.storeTarget !== undefined) {
      traceOutput += ` -> ${variableName(di.storeTarget)}`;
    }
    if (di.branch !== undefined) {
      traceOutput += ` ?branch(${di.branch.branchOnTrue ? "T" : "F"}:${di.branch.offset})`;
    }
    return traceOutput + "]";
  }

  private applyBranch(branch: BranchInfo, condition: boolean): void {
    if (condition !== branch.branchOnTrue) return;
    if (branch.offset === 0 || branch.offset === 1) {
      // Special values: return false or true
      this.returnFromRoutine(branch.offset);
    } else {
      // Relative to the end of the instruction
      this.pc = this.pc + branch.offset - 2;
    }
  }

  // --- Routines ---

  callRoutine(packedAddress: number, args: number[], storeTarget?: number): void {
    const address = this.memory.unpackRoutineAddress(packedAddress);
    const localCount = this.memory.readByte(address);
    if (localCount > MAX_LOCALS) {
      throw new DecodeError(
        `Routine at 0x${address.toString(16)} declares ${localCount} locals`,
      );
    }

    const locals: number[] = [];
    for (let i = 0; i < localCount; i++) {
      locals.push(i < args.length ? args[i] & 0xffff : this.memory.readWord(address + 1 + i * 2));
    }

    this.log(
      `@call 0x${address.toString(16)} args=[${args.join(",")}] locals=${localCount}${storeTarget !== undefined ? ` -> ${variableName(storeTarget)}` : ""}`,
    );
    this.stack.pushFrame({ returnPc: this.pc, storeTarget, locals });
    this.pc = address + 1 + localCount * 2;
  }

  returnFromRoutine(value: number): void {
    if (this.stack.frameCount() <= 1) {
      throw new IllegalOperationError("Return from the main routine");
    }
    const frame = this.stack.popFrame();
    this.log(`@return value=${value} to 0x${frame.returnPc.toString(16)}`);
    this.pc = frame.returnPc;
    if (frame.storeTarget !== undefined) {
      this.stack.writeVariable(frame.storeTarget, value);
    }
  }

  // --- Output ---

  print(text: string): void {
    const stream = this.memoryStreams[this.memoryStreams.length - 1];
    if (stream) {
      // Stream 3 takes everything while it is open
      for (const ch of text) {
        const code = ch === "\n" ? 13 : ch.charCodeAt(0);
        this.memory.writeByte(stream.table + 2 + stream.count, code);
        stream.count++;
      }
      return;
    }
    if (this.screenOutput) this.inputOutputDevice.writeString(text);
    if (this.isTranscriptOn()) this.inputOutputDevice.writeTranscript?.(text);
  }

  printZString(addr: number): void {
    this.print(decodeZString(this.memory, addr, this.header.abbreviationsAddress).text);
  }

  setScreenOutput(enabled: boolean): void {
    this.screenOutput = enabled;
  }

  // The game may also flip this bit itself with storew
  isTranscriptOn(): boolean {
    return (this.memory.readWord(H_FLAGS2) & FLAGS2_TRANSCRIPT) !== 0;
  }

  setTranscript(enabled: boolean): void {
    const flags2 = this.memory.readWord(H_FLAGS2);
    this.memory.writeWord(
      H_FLAGS2,
      enabled ? flags2 | FLAGS2_TRANSCRIPT : flags2 & ~FLAGS2_TRANSCRIPT,
    );
  }

  openMemoryStream(table: number): void {
    if (this.memoryStreams.length >= MAX_MEMORY_STREAMS) {
      throw new IllegalOperationError(
        `Output stream 3 nested more than ${MAX_MEMORY_STREAMS} deep`,
      );
    }
    this.memoryStreams.push({ table, count: 0 });
  }

  closeMemoryStream(): void {
    const stream = this.memoryStreams.pop();
    if (!stream) {
      this.log("@output_stream -3 with no table open");
      return;
    }
    this.memory.writeWord(stream.table, stream.count);
  }

  // --- Input / status ---

  readLine(): Promise<string> {
    return this.inputOutputDevice.readLine();
  }

  statusLine(): StatusLine {
    const locationId = this.stack.readVariable(16);
    const location = locationId === 0 ? "" : this.objects.getShortName(locationId);
    const first = this.stack.readVariable(17);
    const second = this.stack.readVariable(18);
    if (this.memory.readByte(H_FLAGS1) & FLAGS1_TIME_GAME) {
      return { location, kind: "time", hours: first, minutes: second };
    }
    return { location, kind: "score", score: toSigned16(first), turns: second };
  }

  showStatus(): void {
    const status = this.statusLine();
    this.log(`@show_status ${JSON.stringify(status)}`);
    this.inputOutputDevice.showStatus(status);
  }
}

export { ZMachine };
