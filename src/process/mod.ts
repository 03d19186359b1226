/**
 * Subprocess helpers shared by the glslcc and fxc wrappers.
 */

import { spawn } from "node:child_process";
import { access, constants } from "node:fs/promises";
import { delimiter, isAbsolute, join } from "node:path";

export interface ProcessResult {
  readonly exitCode: number;
  readonly stdout: string;
  readonly stderr: string;
}

/**
 * Run `command` to completion and collect its output.
 * Rejects only when the process cannot be started; a non-zero exit code
 * is reported in the result.
 */
export function runProcess(command: string, args: readonly string[]): Promise<ProcessResult> {
  return new Promise((resolve, reject) => {
    const proc = spawn(command, args, { stdio: ["ignore", "pipe", "pipe"] });
    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];

    proc.stdout.on("data", (chunk: Buffer) => stdout.push(chunk));
    proc.stderr.on("data", (chunk: Buffer) => stderr.push(chunk));
    proc.on("error", reject);
    proc.on("close", (code, signal) => {
      resolve({
        // Killed by a signal: report it as a failure.
        exitCode: code ?? (signal ? 128 : 1),
        stdout: Buffer.concat(stdout).toString("utf-8"),
        stderr: Buffer.concat(stderr).toString("utf-8"),
      });
    });
  });
}

// ── Executable search ────────────────────────────────────────────

export interface ResolveExecutableOptions {
  /** Path given on the command line; wins over everything else. */
  readonly explicitPath?: string;
  /** Environment variable holding a path to the tool. */
  readonly envVar?: string;
  readonly env?: NodeJS.ProcessEnv;
}

async function isExecutable(path: string): Promise<boolean> {
  try {
    await access(path, process.platform === "win32" ? constants.F_OK : constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

function pathCandidates(name: string, env: NodeJS.ProcessEnv): string[] {
  const dirs = (env["PATH"] ?? "").split(delimiter).filter((dir) => dir.length > 0);
  const names = process.platform === "win32" ? [`${name}.exe`, name] : [name];
  return dirs.flatMap((dir) => names.map((n) => join(dir, n)));
}

function isBareName(candidate: string): boolean {
  return !isAbsolute(candidate) && !candidate.includes("/") && !candidate.includes("\\");
}

async function searchPath(name: string, env: NodeJS.ProcessEnv): Promise<string | null> {
  for (const candidate of pathCandidates(name, env)) {
    if (await isExecutable(candidate)) return candidate;
  }
  return null;
}

async function checkCandidate(candidate: string, env: NodeJS.ProcessEnv): Promise<string | null> {
  if (isBareName(candidate)) return searchPath(candidate, env);
  return (await isExecutable(candidate)) ? candidate : null;
}

/**
 * Locate an executable. An explicit path is the only candidate when given;
 * otherwise the environment variable is tried, then each PATH entry.
 * Returns null when nothing executable is found.
 */
export async function resolveExecutable(
  name: string,
  options: ResolveExecutableOptions = {},
): Promise<string | null> {
  const env = options.env ?? process.env;

  if (options.explicitPath) return checkCandidate(options.explicitPath, env);

  const fromEnv = options.envVar ? env[options.envVar] : undefined;
  if (fromEnv) {
    const found = await checkCandidate(fromEnv, env);
    if (found) return found;
  }

  return searchPath(name, env);
}
