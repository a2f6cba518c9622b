import { InvalidVariableError, StackUnderflowError } from "./errors";
import { ZMemory } from "./ZMemory";

export interface CallFrame {
  returnPc: number;
  storeTarget?: number; // variable receiving the result; absent = discard
  locals: number[];
  stackBase: number; // evaluation stack height when the frame was entered
}

/**
 * Evaluation stack, call frames and the variable numbering that sits on
 * top of them: 0 is the stack, 1..15 locals, 16..255 globals in memory.
 */
export class ZStack {
  private values: number[] = [];
  private frames: CallFrame[] = [{ returnPc: 0, locals: [], stackBase: 0 }];

  constructor(
    private readonly memory: ZMemory,
    private readonly globalsAddress: number,
  ) {}

  // --- Evaluation stack (current frame only) ---

  push(value: number): void {
    this.values.push(value & 0xffff);
  }

  pop(): number {
    if (this.depth() === 0) throw new StackUnderflowError();
    const value = this.values.pop();
    if (value === undefined) throw new StackUnderflowError();
    return value;
  }

  peek(): number {
    if (this.depth() === 0) throw new StackUnderflowError();
    return this.values[this.values.length - 1];
  }

  replaceTop(value: number): void {
    if (this.depth() === 0) throw new StackUnderflowError();
    this.values[this.values.length - 1] = value & 0xffff;
  }

  depth(): number {
    return this.values.length - this.currentFrame().stackBase;
  }

  // --- Frames ---

  currentFrame(): CallFrame {
    return this.frames[this.frames.length - 1];
  }

  frameCount(): number {
    return this.frames.length;
  }

  pushFrame(frame: Omit<CallFrame, "stackBase">): void {
    this.frames.push({ ...frame, stackBase: this.values.length });
  }

  // Drops the frame along with whatever it left on the stack
  popFrame(): CallFrame {
    if (this.frames.length <= 1) {
      throw new StackUnderflowError();
    }
    const frame = this.currentFrame();
    this.frames.pop();
    this.values.length = frame.stackBase;
    return frame;
  }

  // --- Variables ---

  readVariable(variable: number): number {
    if (variable === 0) return this.pop();
    return this.readNonStack(variable);
  }

  writeVariable(variable: number, value: number): void {
    if (variable === 0) {
      this.push(value);
      return;
    }
    this.writeNonStack(variable, value);
  }

  // Variable 0 is the top of stack in place: no pop, no push
  readVariableInPlace(variable: number): number {
    if (variable === 0) return this.peek();
    return this.readNonStack(variable);
  }

  writeVariableInPlace(variable: number, value: number): void {
    if (variable === 0) {
      this.replaceTop(value);
      return;
    }
    this.writeNonStack(variable, value);
  }

  private readNonStack(variable: number): number {
    if (variable >= 1 && variable <= 15) {
      const locals = this.currentFrame().locals;
      this.checkLocal(variable, locals);
      return locals[variable - 1];
    }
    return this.memory.readWord(this.globalAddress(variable));
  }

  private writeNonStack(variable: number, value: number): void {
    if (variable >= 1 && variable <= 15) {
      const locals = this.currentFrame().locals;
      this.checkLocal(variable, locals);
      locals[variable - 1] = value & 0xffff;
      return;
    }
    this.memory.writeWord(this.globalAddress(variable), value & 0xffff);
  }

  private checkLocal(variable: number, locals: number[]): void {
    if (variable > locals.length) {
      throw new InvalidVariableError(
        variable,
        `routine declares ${locals.length} local${locals.length === 1 ? "" : "s"}`,
      );
    }
  }

  private globalAddress(variable: number): number {
    if (!Number.isInteger(variable) || variable < 16 || variable > 255) {
      throw new InvalidVariableError(variable, "out of range");
    }
    return this.globalsAddress + (variable - 16) * 2;
  }
}
