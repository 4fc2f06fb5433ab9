import { spawn } from "child_process";
import { Readable } from "stream";
import * as logger from "firebase-functions/logger";
import { ProcessCommand } from "../job/types";

/**
 * The subset of a child process the runners depend on.
 * `child_process.spawn` satisfies it; tests provide in-process fakes.
 */
export interface SpawnedProcess {
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  readonly exitCode: number | null;
  readonly signalCode: NodeJS.Signals | null;
  kill(signal?: NodeJS.Signals): boolean;
  once(event: "close", listener: (code: number | null, signal: NodeJS.Signals | null) => void): this;
  once(event: "error", listener: (err: Error) => void): this;
}

export type SpawnFunction = (
  command: string,
  args: string[],
  options: { env?: NodeJS.ProcessEnv; cwd?: string }
) => SpawnedProcess;

export interface ProcessResult {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  /** Everything written to stdout, followed by everything written to stderr */
  output: string;
}

export interface WatchOptions {
  /** Tested against every complete output line */
  pattern: RegExp;
  /** Wait between SIGTERM and SIGKILL */
  graceMs: number;
  spawnFn?: SpawnFunction;
}

export interface WatchResult extends ProcessResult {
  match: RegExpMatchArray | null;
  /** True when the watcher stopped the process after a match */
  terminated: boolean;
  /** True when SIGTERM was ignored and SIGKILL was sent */
  killed: boolean;
}

export const defaultSpawn: SpawnFunction = (command, args, options) => {
  return spawn(command, args, {
    env: options.env,
    cwd: options.cwd,
    stdio: ["ignore", "pipe", "pipe"],
  });
};

function buildEnv(command: ProcessCommand): NodeJS.ProcessEnv | undefined {
  if (!command.env) {
    return undefined;
  }
  return { ...process.env, ...command.env };
}

export function formatCommand(command: ProcessCommand): string {
  return [command.command, ...command.args].join(" ");
}

type StreamName = "stdout" | "stderr";

/**
 * Attaches utf-8 decoding collectors to both output streams. Each stream keeps
 * its own text and its own partial line, so a line is never spliced with text
 * from the other stream.
 */
function captureStreams(child: SpawnedProcess, onLine?: (line: string) => void) {
  const text: Record<StreamName, string> = { stdout: "", stderr: "" };
  const pending: Record<StreamName, string> = { stdout: "", stderr: "" };

  const attach = (name: StreamName, stream: Readable | null) => {
    if (!stream) {
      return;
    }
    stream.setEncoding("utf8");
    stream.on("data", (chunk: string) => {
      text[name] += chunk;
      if (!onLine) {
        return;
      }
      const lines = (pending[name] + chunk).split("\n");
      pending[name] = lines.pop() ?? "";
      for (const line of lines) {
        onLine(line);
      }
    });
  };
  attach("stdout", child.stdout);
  attach("stderr", child.stderr);

  return {
    /** Flushes the unterminated last line of each stream */
    flush(): void {
      for (const name of ["stdout", "stderr"] as const) {
        if (pending[name] && onLine) {
          onLine(pending[name]);
        }
        pending[name] = "";
      }
    },
    output(): string {
      return text.stdout + text.stderr;
    },
  };
}

/**
 * Runs a command to completion and captures its output.
 * Rejects only when the process could not be started.
 */
export function runProcess(
  command: ProcessCommand,
  spawnFn: SpawnFunction = defaultSpawn
): Promise<ProcessResult> {
  return new Promise((resolve, reject) => {
    let child: SpawnedProcess;

    try {
      child = spawnFn(command.command, command.args, { env: buildEnv(command), cwd: command.cwd });
    } catch (error) {
      reject(error);
      return;
    }

    const capture = captureStreams(child);

    child.once("error", (err) => reject(err));
    child.once("close", (code, signal) => {
      resolve({ exitCode: code, signal, output: capture.output() });
    });
  });
}

/**
 * Launches a long-running command and watches each stream line by line.
 * The first line matching `pattern` stops the process: SIGTERM first, then
 * SIGKILL once `graceMs` elapses without exit. Resolves after the process closes.
 */
export function watchProcess(command: ProcessCommand, options: WatchOptions): Promise<WatchResult> {
  const spawnFn = options.spawnFn ?? defaultSpawn;

  return new Promise((resolve, reject) => {
    let match: RegExpMatchArray | null = null;
    let terminated = false;
    let killed = false;
    let killTimer: NodeJS.Timeout | undefined;
    let child: SpawnedProcess;

    try {
      child = spawnFn(command.command, command.args, { env: buildEnv(command), cwd: command.cwd });
    } catch (error) {
      reject(error);
      return;
    }

    const terminate = () => {
      if (terminated || child.exitCode !== null || child.signalCode !== null) {
        return;
      }
      terminated = true;
      child.kill("SIGTERM");
      killTimer = setTimeout(() => {
        if (child.exitCode === null && child.signalCode === null) {
          logger.warn(`[Process] ${command.command} ignored SIGTERM for ${options.graceMs}ms, sending SIGKILL`);
          killed = true;
          child.kill("SIGKILL");
        }
      }, options.graceMs);
    };

    const capture = captureStreams(child, (line) => {
      if (match) {
        return;
      }
      const found = line.match(options.pattern);
      if (found) {
        match = found;
        terminate();
      }
    });

    child.once("error", (err) => {
      if (killTimer) {
        clearTimeout(killTimer);
      }
      reject(err);
    });
    child.once("close", (code, signal) => {
      if (killTimer) {
        clearTimeout(killTimer);
      }
      capture.flush();
      resolve({ exitCode: code, signal, output: capture.output(), match, terminated, killed });
    });
  });
}
