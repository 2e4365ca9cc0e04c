/**
 * Command execution for enumerators (ip, arp, nmap)
 * Injectable so tests never spawn processes.
 */

import { execFile } from "child_process";
import { promisify } from "util";

const execFileAsync = promisify(execFile);

export type CommandRunner = (
  command: string,
  args: readonly string[],
  timeoutMs: number
) => Promise<string>;

export const runCommand: CommandRunner = async (command, args, timeoutMs) => {
  const { stdout } = await execFileAsync(command, [...args], {
    encoding: "utf8",
    timeout: timeoutMs,
    maxBuffer: 16 * 1024 * 1024,
    windowsHide: true,
  });
  return stdout;
};
