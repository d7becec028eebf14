import { silentLogger } from "@textblock/shared";
import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { vi } from "vitest";

import { createProgram } from "../src";

const formatChunk = (chunk: unknown): string => {
  if (typeof chunk === "string") {
    return chunk;
  }
  if (chunk instanceof Uint8Array) {
    return Buffer.from(chunk).toString("utf8");
  }
  return String(chunk);
};

export interface CapturedOutput {
  stdout: string;
  stderr: string[];
}

/**
 * Run `fn` with stdout and console.error captured.
 */
export async function captureOutput(
  fn: () => Promise<void>
): Promise<CapturedOutput> {
  const chunks: string[] = [];
  const stderr: string[] = [];
  const write = vi
    .spyOn(process.stdout, "write")
    .mockImplementation((chunk: unknown) => {
      chunks.push(formatChunk(chunk));
      return true;
    });
  const error = vi
    .spyOn(console, "error")
    .mockImplementation((...args: unknown[]) => {
      stderr.push(args.map((arg) => formatChunk(arg)).join(" "));
    });

  try {
    await fn();
  } finally {
    write.mockRestore();
    error.mockRestore();
  }

  return { stdout: chunks.join(""), stderr };
}

const workspaces = new Set<string>();

/**
 * A scratch directory with no config files in it. Removed by
 * `removeWorkspaces`.
 */
export async function createWorkspace(): Promise<string> {
  const dir = await mkdtemp(join(tmpdir(), "textblock-cli-"));
  workspaces.add(dir);
  return dir;
}

/** Delete every directory `createWorkspace` made. */
export async function removeWorkspaces(): Promise<void> {
  for (const dir of workspaces) {
    await rm(dir, { recursive: true, force: true });
  }
  workspaces.clear();
}

/** Number of workspaces not yet removed. */
export function openWorkspaceCount(): number {
  return workspaces.size;
}

/**
 * Parse CLI arguments against a program isolated from the user's config
 * and environment.
 */
export async function runCli(
  cwd: string,
  args: string[],
  env: NodeJS.ProcessEnv = {}
): Promise<CapturedOutput> {
  return captureOutput(async () => {
    await createProgram({
      cwd,
      userConfigPath: join(cwd, "user-config.toml"),
      env,
      logger: silentLogger,
    }).parseAsync(args, { from: "user" });
  });
}

export function trimmedLines(text: string): string[] {
  return text
    .replace(/\n$/, "")
    .split("\n")
    .map((line) => line.trimEnd());
}
