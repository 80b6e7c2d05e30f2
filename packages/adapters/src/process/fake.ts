import {
    type ModelProcessHandle,
    type ModelProcessLauncher,
    type ProcessExit
} from '@kiln/core';

export class FakeModelProcess implements ModelProcessHandle {
    public readonly pid: number;
    public readonly exited: Promise<ProcessExit>;
    public readonly signals: Array<'SIGTERM' | 'SIGKILL'> = [];
    public alive = true;
    private readonly resolveExit: (exit: ProcessExit) => void;

    public constructor(pid: number, private readonly ignoreSigterm: boolean) {
        this.pid = pid;
        let resolveExit: (exit: ProcessExit) => void = () => undefined;
        this.exited = new Promise((resolve) => {
            resolveExit = resolve;
        });
        this.resolveExit = resolveExit;
    }

    public kill(signal: 'SIGTERM' | 'SIGKILL'): void {
        this.signals.push(signal);
        if (signal === 'SIGTERM' && this.ignoreSigterm) return;
        this.exit({ code: null, signal });
    }

    /** Simulates the process dying on its own. */
    public crash(code = 1): void {
        this.exit({ code, signal: null });
    }

    private exit(exit: ProcessExit): void {
        if (!this.alive) return;
        this.alive = false;
        this.resolveExit(exit);
    }
}

export interface FakeModelProcessLauncherOptions {
    /** Processes that only die on SIGKILL. */
    ignoreSigterm?: boolean;
    /** Launch failures to raise, consumed one per launch. */
    failures?: Error[];
    /** Simulated time to spawn. */
    launchDelayMs?: number;
}

export class FakeModelProcessLauncher implements ModelProcessLauncher {
    public readonly launched: FakeModelProcess[] = [];
    private readonly failures: Error[];
    private nextPid = 1000;

    public constructor(private readonly options: FakeModelProcessLauncherOptions = {}) {
        this.failures = [...(options.failures ?? [])];
    }

    public get current(): FakeModelProcess | undefined {
        return this.launched[this.launched.length - 1];
    }

    public get aliveCount(): number {
        return this.launched.filter((proc) => proc.alive).length;
    }

    public async launch(): Promise<ModelProcessHandle> {
        if (this.options.launchDelayMs) {
            await new Promise((resolve) => setTimeout(resolve, this.options.launchDelayMs));
        }
        const failure = this.failures.shift();
        if (failure) {
            throw failure;
        }
        const proc = new FakeModelProcess(this.nextPid++, this.options.ignoreSigterm ?? false);
        this.launched.push(proc);
        return proc;
    }
}
