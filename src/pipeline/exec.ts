import { execa } from 'execa';
import { debug } from './log';
import { ToolError, describeError, processFailure } from './errors';

export interface CommandResult {
    stdout: string;
    stderr: string;
}

export type Candidate = [cmd: string, args: string[]];

export async function runCommand(cmd: string, args: string[]): Promise<CommandResult> {
    debug('exec', { cmd, args });
    try {
        const res = await execa(cmd, args, { stdio: 'pipe' });
        return { stdout: res.stdout, stderr: res.stderr };
    } catch (e) {
        const { exitCode, stderr, code } = processFailure(e);
        if (code === 'ENOENT') {
            throw new ToolError(`${cmd} not found`, cmd, undefined, undefined, true);
        }
        throw new ToolError(`${cmd} failed: ${describeError(e)}`, cmd, exitCode, stderr);
    }
}

/**
 * Try each command in order while the previous one is not installed. Used where a
 * tool may be installed as a binary or only as a python module. A command that
 * starts and then fails ends the search with its own error.
 */
export async function runFirstAvailable(
    candidates: Candidate[],
    label: string
): Promise<CommandResult & { cmd: string }> {
    const missing: string[] = [];
    for (const [cmd, args] of candidates) {
        try {
            const res = await runCommand(cmd, args);
            return { ...res, cmd };
        } catch (e) {
            if (!(e instanceof ToolError && e.missing)) throw e;
            missing.push(`[${cmd}] ${e.message}`);
        }
    }
    throw new ToolError(
        `No ${label} command found. Tried:\n${missing.join('\n')}`,
        label,
        undefined,
        undefined,
        true
    );
}

/** Deduplicated candidate list: configured binary, default binary, python module fallbacks. */
export function toolCandidates(
    configuredBin: string,
    defaultBin: string,
    pythonModule: string,
    pythonBin: string,
    args: string[]
): Candidate[] {
    const out: Candidate[] = [[configuredBin, args]];
    if (configuredBin !== defaultBin) out.push([defaultBin, args]);
    if (pythonBin) out.push([pythonBin, ['-m', pythonModule, ...args]]);
    if (pythonBin !== 'python3') out.push(['python3', ['-m', pythonModule, ...args]]);
    return out;
}
