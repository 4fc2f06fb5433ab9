/**
 * In-process stand-ins for launched commands
 */

import { EventEmitter, once } from "events";
import { Readable } from "stream";
import { SpawnFunction, SpawnedProcess } from "../../src/utils/process";

export interface ProcessScript {
  /** Output chunks, written in order */
  stdout?: Array<string | Buffer>;
  stderr?: Array<string | Buffer>;
  /** Chunks written after `stdout` and `stderr`, one per turn of the event loop */
  interleaved?: Array<["stdout" | "stderr", string]>;
  /** Exit code once the output is written; ignored when `runForever` is set */
  exitCode?: number;
  /** Keep running after the output until killed */
  runForever?: boolean;
  /** Do not react to SIGTERM, only SIGKILL stops the process */
  ignoreTerm?: boolean;
  /** Emit a launch error instead of running */
  error?: Error;
}

export interface SpawnCall {
  command: string;
  args: string[];
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}

export class FakeProcess extends EventEmitter implements SpawnedProcess {
  readonly stdout = new Readable({ read() {} });
  readonly stderr = new Readable({ read() {} });
  exitCode: number | null = null;
  signalCode: NodeJS.Signals | null = null;
  readonly signals: NodeJS.Signals[] = [];
  private closing = false;

  constructor(private readonly script: ProcessScript) {
    super();
    setImmediate(() => void this.start());
  }

  private async start(): Promise<void> {
    if (this.script.error) {
      this.emit("error", this.script.error);
      return;
    }
    for (const chunk of this.script.stdout ?? []) {
      this.stdout.push(chunk);
    }
    for (const chunk of this.script.stderr ?? []) {
      this.stderr.push(chunk);
    }
    for (const [stream, chunk] of this.script.interleaved ?? []) {
      await new Promise<void>((resolve) => setImmediate(resolve));
      if (this.closing) {
        return;
      }
      this[stream].push(chunk);
    }
    if (!this.script.runForever) {
      void this.finish(this.script.exitCode ?? 0, null);
    }
  }

  private async finish(code: number | null, signal: NodeJS.Signals | null): Promise<void> {
    if (this.closing) {
      return;
    }
    this.closing = true;
    const ended = [once(this.stdout, "end"), once(this.stderr, "end")];
    this.stdout.push(null);
    this.stderr.push(null);
    await Promise.all(ended);
    this.exitCode = code;
    this.signalCode = signal;
    this.emit("close", code, signal);
  }

  kill(signal: NodeJS.Signals = "SIGTERM"): boolean {
    this.signals.push(signal);
    if (signal === "SIGTERM" && this.script.ignoreTerm) {
      return true;
    }
    // kill() is often called from a data handler; closing inside it stalls the stream.
    setImmediate(() => void this.finish(null, signal));
    return true;
  }
}

/**
 * Spawn function that plays back scripted processes and records each launch.
 * `onSpawn` runs synchronously at launch time, while the command is "running".
 */
export class FakeSpawner {
  readonly calls: SpawnCall[] = [];
  readonly processes: FakeProcess[] = [];
  private readonly scripts: ProcessScript[];
  onSpawn?: (call: SpawnCall) => void;

  constructor(...scripts: ProcessScript[]) {
    this.scripts = scripts;
  }

  readonly spawn: SpawnFunction = (command, args, options) => {
    const call: SpawnCall = { command, args, env: options.env, cwd: options.cwd };
    this.calls.push(call);
    this.onSpawn?.(call);
    const script = this.scripts.shift() ?? { exitCode: 0 };
    const child = new FakeProcess(script);
    this.processes.push(child);
    return child;
  };

  get lastCall(): SpawnCall {
    const call = this.calls[this.calls.length - 1];
    if (!call) {
      throw new Error("No process was spawned");
    }
    return call;
  }
}
