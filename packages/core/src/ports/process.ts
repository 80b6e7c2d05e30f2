export interface ProcessExit {
  code   : number | null;
  signal : NodeJS.Signals | null;
}

export interface ModelProcessHandle {
  readonly pid : number | undefined;
  /** Settles once the process is gone, whatever the reason. */
  readonly exited : Promise<ProcessExit>;
  kill(signal: 'SIGTERM' | 'SIGKILL'): void;
}

/** Launches the local inference server. One call, one process. */
export interface ModelProcessLauncher {
  launch(): Promise<ModelProcessHandle>;
}
