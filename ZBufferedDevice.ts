import { InputExhaustedError } from "./errors";
import { StatusLine, ZMInputOutputDevice } from "./ZMInputOutputDevice";

/**
 * In-memory device: scripted input lines in, everything the game prints
 * collected for inspection.
 */
export class ZBufferedDevice implements ZMInputOutputDevice {
  output = "";
  transcript = "";
  statusLines: StatusLine[] = [];
  closed = false;
  private readonly input: string[];

  constructor(input: string[] = []) {
    this.input = input.slice();
  }

  async readLine(): Promise<string> {
    const line = this.input.shift();
    if (line === undefined) throw new InputExhaustedError();
    return line;
  }

  writeString(str: string): void {
    this.output += str;
  }

  writeTranscript(str: string): void {
    this.transcript += str;
  }

  showStatus(status: StatusLine): void {
    this.statusLines.push(status);
  }

  close(): void {
    this.closed = true;
  }

  get remainingInput(): number {
    return this.input.length;
  }
}
