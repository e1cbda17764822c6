import { spawn } from 'node:child_process';
import { Readable } from 'node:stream';
import { Token } from 'typedi';

/** The slice of a child process the generation engine relies on. */
export interface GenerationProcess {
    readonly pid?: number;
    readonly stdout: Readable;
    readonly stderr: Readable;
    kill(signal?: NodeJS.Signals): boolean;
    once(
        event: 'close',
        listener: (code: number | null, signal: NodeJS.Signals | null) => void,
    ): unknown;
    once(event: 'error', listener: (error: Error) => void): unknown;
}

export interface LaunchOptions {
    cwd: string;
    env: NodeJS.ProcessEnv;
}

export type ProcessLauncher = (
    command: string,
    args: string[],
    options: LaunchOptions,
) => GenerationProcess;

export const ProcessLauncherToken = new Token<ProcessLauncher>('process-launcher');

export const spawnProcess: ProcessLauncher = (command, args, options) =>
    spawn(command, args, {
        cwd: options.cwd,
        env: options.env,
        stdio: ['ignore', 'pipe', 'pipe'],
        windowsHide: true,
    });
