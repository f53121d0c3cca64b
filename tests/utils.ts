import type { CommandExit, CommandOutput, CommandRunner } from '../src/process/command-runner';

export interface RecordedCall {
    mode: 'capture' | 'inherit';
    command: string;
    args: string[];
}

type CaptureHandler = (command: string, args: string[]) => CommandOutput | Promise<CommandOutput>;
type InheritHandler = (command: string, args: string[]) => CommandExit | Promise<CommandExit>;

export function output(code: number, stderr = '', stdout = ''): CommandOutput {
    return { code, signal: null, stdout, stderr };
}

export function enoent(command: string): Error {
    return Object.assign(new Error(`spawn ${command} ENOENT`), { code: 'ENOENT' });
}

/**
 * In-process stand-in for rustc and the compiled programs. Records every call
 * and answers through the handlers given by each test.
 */
export class FakeRunner implements CommandRunner {
    readonly calls: RecordedCall[] = [];

    constructor(
        private readonly onCapture: CaptureHandler = () => output(0),
        private readonly onInherit: InheritHandler = () => ({ code: 0, signal: null })
    ) {}

    capture(command: string, args: readonly string[]): Promise<CommandOutput> {
        const copy = [...args];
        this.calls.push({ mode: 'capture', command, args: copy });
        return Promise.resolve().then(() => this.onCapture(command, copy));
    }

    inherit(command: string, args: readonly string[]): Promise<CommandExit> {
        const copy = [...args];
        this.calls.push({ mode: 'inherit', command, args: copy });
        return Promise.resolve().then(() => this.onInherit(command, copy));
    }

    callsTo(mode: RecordedCall['mode']): RecordedCall[] {
        return this.calls.filter((call) => call.mode === mode);
    }
}
