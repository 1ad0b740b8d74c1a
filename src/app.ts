/**
 * Application entry point
 * Loads configuration, checks prerequisites and runs the interactive session
 */

import { join } from "node:path";
import { loadConfig } from "./config/load.ts";
import type { Config } from "./config/types.ts";
import { listBlockDevices } from "./devices/block-devices.ts";
import { validateDevicePath } from "./devices/validate.ts";
import { CsvResultWriter, sessionCsvFilename } from "./results/csv.ts";
import { checkDependencies } from "./session/dependencies.ts";
import { createTerminalPrompter } from "./session/prompt.ts";
import { TestSession } from "./session/session.ts";
import { testDrive } from "./smart/drive-test.ts";
import { createColors, supportsColor } from "./utils/colors.ts";
import { describeError, initializeLogger, log } from "./utils/logger.ts";
import { exec } from "./utils/sh.ts";

/**
 * Runs one interactive session
 * @returns process exit code
 */
export async function startSession(): Promise<number> {
  const c = createColors(supportsColor(process.stdout));
  const print = (line: string) => console.log(line);

  print(c.header("=".repeat(60)));
  print(c.header("SSD TESTING"));
  print(c.header("=".repeat(60)));

  let config: Config;
  try {
    config = loadConfig();
  } catch (error) {
    print(c.error(`ERROR: Invalid configuration: ${describeError(error)}`));
    return 1;
  }

  initializeLogger(config.logging.format);
  log({ mod: "boot", event: "config_loaded", config: JSON.stringify(config) });

  const problems = await checkDependencies(config);
  if (problems.length > 0) {
    for (const problem of problems) {
      print(c.error(`ERROR: ${problem.error}`));
      for (const hint of problem.hints) print(hint);
    }
    return 1;
  }

  // One file per session, named by its start time
  const sink = new CsvResultWriter(join(config.session.outputDir, sessionCsvFilename(new Date())));
  const prompter = createTerminalPrompter();

  try {
    const session = new TestSession({
      prompter,
      print,
      colors: c,
      listDevices: () => listBlockDevices(exec, config.tools.lsblk),
      validateDevice: (devicePath) => validateDevicePath(devicePath),
      testDrive: (devicePath) => testDrive(devicePath, { exec, smartctl: config.tools.smartctl }),
      sink,
    });
    await session.run();
  } finally {
    prompter.close();
  }

  print("");
  print("Thank you for using SSD Testing!");
  return 0;
}
