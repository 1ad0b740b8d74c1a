// sh.ts — process helpers around node:child_process: bash command lines
// (set -eu, pipefail) and direct argv execution. No Windows support.

import { spawn } from "node:child_process";
import { TextDecoder } from "node:util";

export interface CommandOutput {
  readonly code: number;
  readonly success: boolean;
  readonly stdout: Uint8Array;
  readonly stderr: Uint8Array;
  /** Returns decoded stdout (UTF-8 by default). */
  stdoutText(decoder?: TextDecoder): string;
  /** Returns decoded stderr (UTF-8 by default). */
  stderrText(decoder?: TextDecoder): string;
}

export interface ShCommand {
  /** Runs to completion and collects both output streams. */
  output(): Promise<CommandOutput>;
}

/** Runs a program with an argument vector; rejects when it cannot be started. */
export type ExecFn = (command: string, args: readonly string[]) => Promise<CommandOutput>;

function collect(command: string, args: readonly string[]): Promise<CommandOutput> {
  return new Promise((resolve, reject) => {
    const child = spawn(command, args, { stdio: ["ignore", "pipe", "pipe"] });
    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];

    child.stdout?.on("data", (chunk: Buffer) => stdout.push(chunk));
    child.stderr?.on("data", (chunk: Buffer) => stderr.push(chunk));
    child.on("error", reject);
    child.on("close", (code, signal) => {
      // Killed by a signal
      const exitCode = code ?? (signal ? -1 : 0);
      resolve(withTextHelpers(exitCode, Buffer.concat(stdout), Buffer.concat(stderr)));
    });
  });
}

function withTextHelpers(code: number, stdout: Uint8Array, stderr: Uint8Array): CommandOutput {
  const defaultDecoder = new TextDecoder();
  return {
    code,
    success: code === 0,
    stdout,
    stderr,
    stdoutText(decoder: TextDecoder = defaultDecoder): string {
      return decoder.decode(stdout);
    },
    stderrText(decoder: TextDecoder = defaultDecoder): string {
      return decoder.decode(stderr);
    },
  };
}

/**
 * Runs a program directly, without a shell:
 *   const res = await exec("lsblk", ["-d", "-n"]);
 *   console.log(res.stdoutText());
 */
export const exec: ExecFn = (command, args) => collect(command, args);

/**
 * Runs a command line under bash with `set -eu` and pipefail:
 *   const res = await sh("echo hi").output();
 */
export function sh(commandLine: string): ShCommand {
  const args = ["bash", "-c", "set -eu; set -o pipefail; " + commandLine];
  return {
    output(): Promise<CommandOutput> {
      return collect("/usr/bin/env", args);
    },
  };
}

/** POSIX template tag: safely single-quotes interpolations. */
export function sh$(
  strings: TemplateStringsArray,
  ...values: unknown[]
): ShCommand {
  const sq = (v: unknown) => {
    const s = String(v);
    if (s.length === 0) return "''";
    // POSIX-safe quoting: ' → '\''  (JS string literal: "'\\''")
    return "'" + s.replace(/'/g, "'\\''") + "'";
  };

  let cmdline = "";
  for (let i = 0; i < strings.length; i++) {
    cmdline += strings[i];
    if (i < values.length) cmdline += sq(values[i]);
  }
  return sh(cmdline);
}
