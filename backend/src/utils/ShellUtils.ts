import { exec } from 'child_process';
import util from 'util';

const execAsync = util.promisify(exec);

/** Runs a shell command and resolves with its stdout. Rejections keep exec's `stderr` and `code`. */
export type CommandRunner = (command: string, timeoutMs?: number) => Promise<string>;

export const runCommand: CommandRunner = async (command, timeoutMs = 10000) => {
    const { stdout } = await execAsync(command, { timeout: timeoutMs });
    return stdout;
};
