import { execFile } from 'child_process';
import { promisify } from 'util';

export const execFileAsync = promisify(execFile);

/** Absolute path of `command` on PATH, or null. */
export async function findExecutable(command: string): Promise<string | null> {
    const locator = process.platform === 'win32' ? 'where' : 'which';
    try {
        const { stdout } = await execFileAsync(locator, [command]);
        const first = stdout.split(/\r?\n/).find((line) => line.trim().length > 0);
        return first ? first.trim() : null;
    } catch {
        // non-zero exit: not on PATH
        return null;
    }
}

export async function findFirstExecutable(commands: readonly string[]): Promise<string | null> {
    for (const command of commands) {
        const found = await findExecutable(command);
        if (found) return found;
    }
    return null;
}
