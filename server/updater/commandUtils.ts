import { execFile } from "node:child_process";
import { constants as fsConstants } from "node:fs";
import { access } from "node:fs/promises";
import { promisify } from "node:util";

export const execFileAsync = promisify(execFile);

export interface CommandOutput {
  stdout: string;
  stderr: string;
}

export type CommandRunner = (command: string, args: string[], timeoutMs: number) => Promise<CommandOutput>;

export const runCommand: CommandRunner = async (command, args, timeoutMs) => {
  const { stdout, stderr } = await execFileAsync(command, args, {
    timeout: timeoutMs,
    maxBuffer: 4 * 1024 * 1024
  });
  return { stdout, stderr };
};

export async function isCommandAvailable(command: string): Promise<boolean> {
  const normalizedCommand = command.trim();
  if (normalizedCommand.length === 0) {
    return false;
  }

  const hasPathSeparator = normalizedCommand.includes("/") || normalizedCommand.includes("\\");
  if (hasPathSeparator) {
    try {
      await access(normalizedCommand, fsConstants.X_OK);
      return true;
    } catch {
      return false;
    }
  }

  const locator = process.platform === "win32" ? "where" : "which";
  try {
    await execFileAsync(locator, [normalizedCommand], { timeout: 6000 });
    return true;
  } catch {
    return false;
  }
}
