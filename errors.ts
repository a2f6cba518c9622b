// Fatal interpreter errors. Every one of these halts the machine.

export type ZErrorCode =
  | "STORY_FORMAT"
  | "ADDRESS_OUT_OF_BOUNDS"
  | "READ_ONLY_VIOLATION"
  | "DECODE"
  | "INVALID_OPCODE"
  | "INVALID_VARIABLE"
  | "STACK_UNDERFLOW"
  | "INVALID_OBJECT"
  | "INVALID_ATTRIBUTE"
  | "INVALID_PROPERTY"
  | "DIVIDE_BY_ZERO"
  | "ILLEGAL_OPERATION"
  | "UNSUPPORTED_OPERATION"
  | "INPUT_EXHAUSTED";

export class ZMachineError extends Error {
  readonly code: ZErrorCode;
  // Address of the instruction that was executing, filled in by ZMachine.run()
  pc?: number;

  constructor(code: ZErrorCode, message: string) {
    super(message);
    this.name = "ZMachineError";
    this.code = code;
  }
}

export class StoryFormatError extends ZMachineError {
  constructor(message: string) {
    super("STORY_FORMAT", message);
    this.name = "StoryFormatError";
  }
}

export class AddressOutOfBoundsError extends ZMachineError {
  readonly address: number;

  constructor(address: number, size: number) {
    super(
      "ADDRESS_OUT_OF_BOUNDS",
      `Address 0x${address.toString(16)} is outside memory (size 0x${size.toString(16)})`,
    );
    this.name = "AddressOutOfBoundsError";
    this.address = address;
  }
}

export class ReadOnlyViolationError extends ZMachineError {
  readonly address: number;

  constructor(address: number, staticBase: number) {
    super(
      "READ_ONLY_VIOLATION",
      `Write to 0x${address.toString(16)} at or above static memory (0x${staticBase.toString(16)})`,
    );
    this.name = "ReadOnlyViolationError";
    this.address = address;
  }
}

export class DecodeError extends ZMachineError {
  constructor(message: string, code: ZErrorCode = "DECODE") {
    super(code, message);
    this.name = "DecodeError";
  }
}

export class InvalidOpcodeError extends DecodeError {
  constructor(message: string) {
    super(message, "INVALID_OPCODE");
    this.name = "InvalidOpcodeError";
  }
}

export class InvalidVariableError extends ZMachineError {
  readonly variable: number;

  constructor(variable: number, detail: string) {
    super("INVALID_VARIABLE", `Invalid variable ${variable}: ${detail}`);
    this.name = "InvalidVariableError";
    this.variable = variable;
  }
}

export class StackUnderflowError extends ZMachineError {
  constructor() {
    super("STACK_UNDERFLOW", "Evaluation stack underflow");
    this.name = "StackUnderflowError";
  }
}

export class InvalidObjectError extends ZMachineError {
  constructor(objectId: number, max: number) {
    super("INVALID_OBJECT", `Invalid object ${objectId} (valid range 1..${max})`);
    this.name = "InvalidObjectError";
  }
}

export class InvalidAttributeError extends ZMachineError {
  constructor(attribute: number) {
    super("INVALID_ATTRIBUTE", `Invalid attribute ${attribute} (valid range 0..31)`);
    this.name = "InvalidAttributeError";
  }
}

export class InvalidPropertyError extends ZMachineError {
  constructor(message: string) {
    super("INVALID_PROPERTY", message);
    this.name = "InvalidPropertyError";
  }
}

export class DivideByZeroError extends ZMachineError {
  constructor(op: string) {
    super("DIVIDE_BY_ZERO", `${op}: division by zero`);
    this.name = "DivideByZeroError";
  }
}

export class IllegalOperationError extends ZMachineError {
  constructor(message: string) {
    super("ILLEGAL_OPERATION", message);
    this.name = "IllegalOperationError";
  }
}

export class UnsupportedOperationError extends ZMachineError {
  constructor(op: string) {
    super("UNSUPPORTED_OPERATION", `${op} is not supported by this interpreter`);
    this.name = "UnsupportedOperationError";
  }
}

export class InputExhaustedError extends ZMachineError {
  constructor() {
    super("INPUT_EXHAUSTED", "No more input available");
    this.name = "InputExhaustedError";
  }
}
