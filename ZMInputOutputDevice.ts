type StatusLine = { location: string } & (
  | { kind: "score"; score: number; turns: number }
  | { kind: "time"; hours: number; minutes: number }
);

interface ZMInputOutputDevice {
  readLine(): Promise<string>;
  writeString(str: string): void;
  showStatus(status: StatusLine): void;
  // Output stream 2 (transcript); devices without one drop it
  writeTranscript?(str: string): void;
  close(): void;
}

export type { StatusLine, ZMInputOutputDevice };
