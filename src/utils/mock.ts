/**
 * In-process stand-ins for external programs, for tests
 */

import type { CommandOutput, ExecFn } from "./sh.ts";

export function fakeOutput(stdout: string, code = 0, stderr = ""): CommandOutput {
  const encoder = new TextEncoder();
  return {
    code,
    success: code === 0,
    stdout: encoder.encode(stdout),
    stderr: encoder.encode(stderr),
    stdoutText: () => stdout,
    stderrText: () => stderr,
  };
}

export interface RecordedCall {
  readonly command: string;
  readonly args: readonly string[];
}

/**
 * Exec replacement that records every call and answers with `respond`
 */
export function createFakeExec(
  respond: (command: string, args: readonly string[]) => CommandOutput | Promise<CommandOutput>,
): { exec: ExecFn; calls: RecordedCall[] } {
  const calls: RecordedCall[] = [];
  const exec: ExecFn = async (command, args) => {
    calls.push({ command, args: [...args] });
    return await respond(command, args);
  };
  return { exec, calls };
}
