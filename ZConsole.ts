import { createInterface, Interface } from "node:readline/promises";
import { appendFileSync } from "node:fs";
import { InputExhaustedError } from "./errors";
import { StatusLine, ZMInputOutputDevice } from "./ZMInputOutputDevice";
import type { ZMachine } from "./ZMachine";

export interface ZConsoleOptions {
  transcriptPath?: string; // where output stream 2 goes
}

export function formatStatusLine(status: StatusLine, termWidth: number): string {
  const rightText =
    status.kind === "time"
      ? `Time: ${status.hours.toString().padStart(2, " ")}:${status.minutes.toString().padStart(2, "0")}`
      : `Score: ${status.score}  Moves: ${status.turns}`;

  // Stop one column short of the edge so the terminal doesn't wrap
  const leftText = " " + status.location;
  const padding = termWidth - leftText.length - rightText.length - 1;
  const line = leftText + " ".repeat(Math.max(0, padding)) + rightText;
  return line.slice(0, termWidth - 1);
}

export class ZConsole implements ZMInputOutputDevice {
  private zm: ZMachine | null = null;
  private inputBuffer: string = "";
  private inputBufferPosition: number = 0;
  private inputBufferInitPromise: Promise<void> | null = null;
  private rl: Interface | null = null;

  constructor(private readonly options: ZConsoleOptions = {}) {
    // Only create readline for TTY mode
    if (process.stdin.isTTY) {
      this.rl = createInterface({
        input: process.stdin,
        output: process.stdout,
        historySize: 100,
        prompt: "",
      });
    }
  }

  setZMachine(zm: ZMachine): void {
    this.zm = zm;
  }

  // For non-TTY input, read all stdin into buffer upfront
  private initializeInputBuffer(): Promise<void> {
    if (!this.inputBufferInitPromise) {
      this.inputBufferInitPromise = new Promise<void>((resolve, reject) => {
        const chunks: Buffer[] = [];
        process.stdin.on("data", (chunk: Buffer) => {
          chunks.push(chunk);
        });
        process.stdin.on("end", () => {
          this.inputBuffer = Buffer.concat(chunks).toString("utf8");
          resolve();
        });
        process.stdin.on("error", reject);
        process.stdin.resume();
      });
    }
    return this.inputBufferInitPromise;
  }

  private async readBufferedLine(): Promise<string> {
    await this.initializeInputBuffer();

    if (this.inputBufferPosition >= this.inputBuffer.length) {
      throw new InputExhaustedError();
    }

    const lineEnd = this.inputBuffer.indexOf("\n", this.inputBufferPosition);
    const end = lineEnd === -1 ? this.inputBuffer.length : lineEnd;
    const line = this.inputBuffer.substring(this.inputBufferPosition, end).replace(/\r$/, "");
    this.inputBufferPosition = end + 1;
    // Piped input isn't echoed by a terminal
    process.stdout.write(line + "\n");
    return line;
  }

  async readLine(): Promise<string> {
    for (;;) {
      let line: string;
      if (this.rl) {
        // The game prints its own prompt
        line = await this.rl.question("");
      } else {
        line = await this.readBufferedLine();
      }

      // Interpreter commands never reach the game
      const traceMatch = line.trim().match(/^\/trace\s+(on|off)$/);
      if (traceMatch) {
        if (this.zm) {
          this.zm.setTrace(traceMatch[1] === "on");
          console.log(traceMatch[1] === "on" ? "Trace enabled" : "Trace disabled");
        } else {
          console.log("ZMachine not initialized");
        }
        continue;
      }
      return line;
    }
  }

  writeString(str: string): void {
    process.stdout.write(str);
  }

  writeTranscript(str: string): void {
    if (this.options.transcriptPath) {
      appendFileSync(this.options.transcriptPath, str);
    }
  }

  showStatus(status: StatusLine): void {
    const termWidth = process.stdout.columns || 80;
    // Save cursor, draw line 1 in reverse video, restore cursor
    process.stdout.write(
      "\x1b7" + "\x1b[1;1H" + "\x1b[7m" + formatStatusLine(status, termWidth) + "\x1b[0m" + "\x1b8",
    );
  }

  close(): void {
    this.rl?.close();
    if (!process.stdin.isTTY) process.stdin.pause();
  }
}
