import { spawn } from 'child_process';
import { Command } from '@taskfleet/sdk';
import { CommandFailedError } from '../errors';

export interface RunOptions {
    env?: NodeJS.ProcessEnv;
    cwd?: string;
}

export type CommandRunner = (command: Command, options?: RunOptions) => Promise<void>;

/**
 * Spawns argv[0] with the remaining arguments, no shell.
 * Resolves on exit code 0; rejects with CommandFailedError otherwise,
 * or with the spawn error if the executable could not start.
 */
export const runCommand: CommandRunner = (command, options = {}) => {
    if (command.length === 0) {
        return Promise.reject(new Error('Cannot run an empty command'));
    }

    return new Promise<void>((resolve, reject) => {
        const child = spawn(command[0], command.slice(1), {
            stdio: 'inherit',
            env: options.env ?? process.env,
            cwd: options.cwd,
        });

        child.once('error', reject);
        child.once('close', (code, signal) => {
            if (code === 0) resolve();
            else reject(new CommandFailedError(code, signal));
        });
    });
};
