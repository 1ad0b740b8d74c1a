/**
 * Start-up checks: smartctl on PATH and root privileges
 */

import type { Config } from "../config/types.ts";
import { describeError, log } from "../utils/logger.ts";
import { sh$ } from "../utils/sh.ts";

export interface DependencyProblem {
  readonly error: string;
  readonly hints: readonly string[];
}

export interface DependencyProbes {
  /** True when the program resolves on PATH */
  readonly hasProgram: (program: string) => Promise<boolean>;
  readonly effectiveUid: () => number | undefined;
}

async function hasProgram(program: string): Promise<boolean> {
  try {
    return (await sh$`command -v ${program}`.output()).success;
  } catch (error) {
    log({ mod: "deps", event: "probe_failed", program, error: describeError(error) });
    return false;
  }
}

export const systemProbes: DependencyProbes = {
  hasProgram,
  effectiveUid: () => process.geteuid?.(),
};

export async function checkDependencies(
  config: Config,
  probes: DependencyProbes = systemProbes,
): Promise<DependencyProblem[]> {
  const problems: DependencyProblem[] = [];

  if (!(await probes.hasProgram(config.tools.smartctl))) {
    problems.push({
      error: `${config.tools.smartctl} not found. Please install smartmontools:`,
      hints: [
        "  Ubuntu/Debian: sudo apt-get install smartmontools",
        "  Fedora/RHEL: sudo dnf install smartmontools",
      ],
    });
  }

  if (config.session.requireRoot && probes.effectiveUid() !== 0) {
    problems.push({
      error: "This tool requires root privileges.",
      hints: ["Please run with: sudo npm start"],
    });
  }

  log({ mod: "deps", event: "checked", problems: problems.length });
  return problems;
}
