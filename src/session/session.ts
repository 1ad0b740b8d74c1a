/**
 * Interactive test loop: pick a drive, test it, show and save the result, repeat
 */

import type { BlockDevice } from "../devices/block-devices.ts";
import { DEVICE_PATH_HINT } from "../devices/validate.ts";
import type { DriveTestOutcome } from "../smart/drive-test.ts";
import type { TestResult } from "../smart/types.ts";
import { renderResults } from "../results/report.ts";
import type { Colors } from "../utils/colors.ts";
import { log } from "../utils/logger.ts";
import { askYesNo, type Prompter } from "./prompt.ts";

const QUIT_WORDS = new Set(["quit", "exit", "q"]);

export interface ResultSink {
  readonly filePath: string;
  append(result: TestResult): Promise<boolean>;
}

export interface SessionDeps {
  readonly prompter: Prompter;
  readonly print: (line: string) => void;
  readonly colors: Colors;
  readonly listDevices: () => Promise<BlockDevice[]>;
  readonly validateDevice: (devicePath: string) => boolean;
  readonly testDrive: (devicePath: string) => Promise<DriveTestOutcome>;
  readonly sink: ResultSink;
}

export interface SessionSummary {
  readonly drivesTested: number;
  readonly csvPath: string;
}

type Selection =
  | { readonly kind: "device"; readonly path: string }
  | { readonly kind: "quit" }
  | { readonly kind: "refresh" };

export class TestSession {
  private readonly deps: SessionDeps;
  // Session state: the only thing carried between iterations
  private lastDevice: string | null = null;
  private drivesTested = 0;

  constructor(deps: SessionDeps) {
    this.deps = deps;
  }

  async run(): Promise<SessionSummary> {
    const { print, colors: c } = this.deps;
    log({ mod: "session", event: "started", csv: this.deps.sink.filePath });

    for (;;) {
      const selection = await this.selectDevice();
      if (selection.kind === "quit") break;
      if (selection.kind === "refresh") continue;

      if (!this.deps.validateDevice(selection.path)) {
        print(c.error(`ERROR: Invalid device path: ${selection.path}`));
        print(`Expected format: ${DEVICE_PATH_HINT}`);
        continue;
      }

      await this.testOne(selection.path);

      print("");
      print("=".repeat(60));
      const again = await askYesNo(
        this.deps.prompter,
        "Test another drive? (y/n): ",
        (answer) => print(c.warning(`Please answer y or n (got "${answer}")`)),
      );
      if (!again) break;
    }

    this.printSummary();
    log({ mod: "session", event: "finished", drivesTested: this.drivesTested });
    return { drivesTested: this.drivesTested, csvPath: this.deps.sink.filePath };
  }

  private async selectDevice(): Promise<Selection> {
    const { print, colors: c, prompter } = this.deps;

    print("");
    print(c.header("=".repeat(60)));
    print(c.header("AVAILABLE BLOCK DEVICES"));
    print(c.header("=".repeat(60)));

    const devices = await this.deps.listDevices();
    if (devices.length === 0) {
      print(c.warning("No suitable block devices found."));
      const refresh = await askYesNo(
        prompter,
        "\nRefresh device list? (y/n): ",
        (answer) => print(c.warning(`Please answer y or n (got "${answer}")`)),
      );
      return refresh ? { kind: "refresh" } : { kind: "quit" };
    }

    // The remembered device only counts while it is still attached
    const last = this.lastDevice !== null && devices.some((d) => d.path === this.lastDevice)
      ? this.lastDevice
      : null;

    for (const device of devices) {
      if (device.path === last) {
        print(`  ${c.info(device.path)} (${device.size}) ${c.success("[LAST USED]")}`);
      } else {
        print(`  ${device.path} (${device.size})`);
      }
    }

    print("");
    if (last !== null) {
      print(`Enter the device to test (or press Enter for ${c.info(last)})`);
    } else {
      print("Enter the device to test (e.g., /dev/sdb)");
    }
    print("Or type 'quit' to exit");

    const answer = await prompter.ask("Device: ");
    if (answer === null) return { kind: "quit" };

    const input = answer.trim();
    if (input === "" && last !== null) {
      print(`Using: ${c.info(last)}`);
      return { kind: "device", path: last };
    }
    if (QUIT_WORDS.has(input.toLowerCase())) return { kind: "quit" };
    return { kind: "device", path: input };
  }

  private async testOne(devicePath: string): Promise<void> {
    const { print, colors: c } = this.deps;

    print("");
    print(`${c.info("Testing drive:")} ${c.header(devicePath)}`);
    print(c.info("Running smartctl commands..."));

    const outcome = await this.deps.testDrive(devicePath);
    if (!outcome.ok) {
      print(c.error(`ERROR: ${outcome.error}`));
      print(c.error("ERROR: Failed to get smartctl data"));
      return;
    }

    for (const line of renderResults(outcome.result, c)) {
      print(line);
    }

    if (await this.deps.sink.append(outcome.result)) {
      print("");
      print(`${c.success("Results saved to:")} ${this.deps.sink.filePath}`);
    } else {
      print(c.error(`ERROR: Failed to save to CSV: ${this.deps.sink.filePath}`));
    }

    this.drivesTested++;
    this.lastDevice = devicePath;
  }

  private printSummary(): void {
    const { print, colors: c } = this.deps;
    print("");
    print(c.header("=".repeat(60)));
    print(c.header("TESTING COMPLETE"));
    print(c.header("=".repeat(60)));
    print(`Total drives tested: ${c.success(String(this.drivesTested))}`);
    if (this.drivesTested > 0) {
      print(`Results saved to: ${c.info(this.deps.sink.filePath)}`);
    }
  }
}
