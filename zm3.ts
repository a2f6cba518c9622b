#!/usr/bin/env node
import { readFileSync } from "node:fs";
import { ZMachine, ZMachineOptions } from "./ZMachine";
import { ZConsole } from "./ZConsole";
import { InputExhaustedError, ZMachineError } from "./errors";

const USAGE =
  "Usage: zm3 <story.z3> [--trace] [--seed <n>] [--ignore-checksum] [--transcript <file>] [--dump-header] [--dump-dictionary]";

interface CliArgs {
  storyPath?: string;
  options: ZMachineOptions;
  transcriptPath?: string;
  dumpHeader: boolean;
  dumpDictionary: boolean;
}

export function parseArgs(args: string[]): CliArgs {
  const parsed: CliArgs = { options: {}, dumpHeader: false, dumpDictionary: false };
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case "--trace":
        parsed.options.trace = true;
        break;
      case "--ignore-checksum":
        parsed.options.ignoreChecksum = true;
        break;
      case "--dump-header":
        parsed.dumpHeader = true;
        break;
      case "--dump-dictionary":
        parsed.dumpDictionary = true;
        break;
      case "--seed": {
        const seed = Number(args[++i]);
        if (!Number.isInteger(seed)) throw new Error("--seed needs an integer");
        parsed.options.seed = seed;
        break;
      }
      case "--transcript": {
        const path = args[++i];
        if (path === undefined) throw new Error("--transcript needs a file name");
        parsed.transcriptPath = path;
        break;
      }
      default:
        if (arg.startsWith("--")) throw new Error(`Unknown option ${arg}`);
        parsed.storyPath = arg;
    }
  }
  return parsed;
}

async function main() {
  let cli: CliArgs;
  try {
    cli = parseArgs(process.argv.slice(2));
  } catch (err) {
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    console.error(USAGE);
    process.exit(1);
  }

  if (!cli.storyPath) {
    console.error("Error: story file path is required");
    console.error(USAGE);
    process.exit(1);
  }

  // Handle Ctrl-C gracefully
  process.on("SIGINT", () => {
    console.log("\n\nInterrupted by user.");
    process.exit(0);
  });

  const consoleDevice = new ZConsole({ transcriptPath: cli.transcriptPath });
  try {
    const zm = new ZMachine(readFileSync(cli.storyPath), consoleDevice, cli.options);
    consoleDevice.setZMachine(zm);

    if (cli.dumpHeader || cli.dumpDictionary) {
      if (cli.dumpHeader) console.log("Header:", zm.getHeader());
      if (cli.dumpDictionary) {
        for (const entry of zm.dictionary.entries()) {
          console.log(`${entry.address.toString(16).padStart(4, "0")} ${entry.word}`);
        }
      }
      consoleDevice.close();
      return;
    }

    if (cli.options.trace) {
      console.log("Header:", zm.getHeader());
      console.log("Starting execution...");
    } else {
      // Clear screen; the status line lives on row 1
      process.stdout.write("\x1b[2J\x1b[2;1H");
    }

    await zm.run();
    console.log("\nGame quit.");
    consoleDevice.close();
  } catch (err) {
    consoleDevice.close();
    if (err instanceof InputExhaustedError) {
      return;
    }
    const where =
      err instanceof ZMachineError && err.pc !== undefined ? ` at pc 0x${err.pc.toString(16)}` : "";
    console.error(`Fatal error${where}:`, err instanceof Error ? err.message : err);
    if (err instanceof Error && cli.options.trace) {
      console.error("Stack trace:", err.stack);
    }
    process.exit(1);
  }
}

if (require.main === module) {
  main().catch((err) => {
    console.error(err);
    process.exit(1);
  });
}
