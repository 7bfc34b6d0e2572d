import { spawn, type ChildProcessByStdio } from "node:child_process";
import path from "node:path";
import type { Readable } from "node:stream";
import type { ExecutionResult, ScriptDescriptor, ScriptParams } from "../scripts/model";

export type ExecutionFailureKind = "SpawnFailure" | "Timeout" | "AbnormalExit";

export class ExecutionError extends Error {
  constructor(
    readonly kind: ExecutionFailureKind,
    message: string,
    readonly meta: Record<string, unknown> = {}
  ) {
    super(message);
    this.name = "ExecutionError";
  }
}

export type RunScriptOptions = {
  timeoutMs: number;
  killGraceMs?: number;
  baseEnv?: NodeJS.ProcessEnv;
};

export type ScriptRunner = (
  script: ScriptDescriptor,
  params: ScriptParams,
  options: RunScriptOptions
) => Promise<ExecutionResult>;

export const PARAMS_ENV_VAR = "CLOUDOMATE_PARAMS";
export const PARAM_ENV_PREFIX = "CLOUDOMATE_PARAM_";

export function paramEnvName(key: string): string {
  return `${PARAM_ENV_PREFIX}${key.toUpperCase().replace(/[^A-Z0-9_]/g, "_")}`;
}

export function buildScriptEnv(params: ScriptParams, baseEnv: NodeJS.ProcessEnv = process.env): NodeJS.ProcessEnv {
  const env: NodeJS.ProcessEnv = { ...baseEnv, [PARAMS_ENV_VAR]: JSON.stringify(params) };
  for (const [key, value] of Object.entries(params)) {
    if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
      const text = String(value);
      // exec rejects NUL inside an environment string; the value still reaches CLOUDOMATE_PARAMS.
      if (!text.includes("\0")) env[paramEnvName(key)] = text;
    }
  }
  return env;
}

function spawnFailure(script: ScriptDescriptor, error: unknown): ExecutionError {
  const message = error instanceof Error ? error.message : String(error);
  const code = error instanceof Error && "code" in error && typeof error.code === "string" ? error.code : null;
  return new ExecutionError("SpawnFailure", `Failed to start script '${script.name}': ${message}`, {
    scriptName: script.name,
    code,
  });
}

/** Splits a text stream into lines, calling `onLine` for each complete one. */
function collectLines(stream: Readable, onLine: (line: string) => void): () => void {
  let pending = "";
  stream.setEncoding("utf8");
  stream.on("data", (chunk: string) => {
    pending += chunk;
    let newline = pending.indexOf("\n");
    while (newline !== -1) {
      onLine(pending.slice(0, newline).replace(/\r$/, ""));
      pending = pending.slice(newline + 1);
      newline = pending.indexOf("\n");
    }
  });
  return () => {
    if (pending.length > 0) onLine(pending.replace(/\r$/, ""));
    pending = "";
  };
}

/**
 * Runs a script as a child process and resolves once it has exited and both output
 * streams are drained. A non-zero exit code is a result, not an error.
 */
export const runScript: ScriptRunner = (script, params, options) => {
  const { timeoutMs, killGraceMs = 2_000, baseEnv = process.env } = options;

  return new Promise<ExecutionResult>((resolve, reject) => {
    const stdout: string[] = [];
    const stderr: string[] = [];
    const separate = script.output === "separate";
    let settled = false;
    let timedOut = false;
    let killTimer: NodeJS.Timeout | null = null;

    // Some failures (oversized or invalid environment) throw here instead of emitting "error".
    let child: ChildProcessByStdio<null, Readable, Readable>;
    try {
      child = spawn(script.path, [], {
        cwd: path.dirname(script.path),
        env: buildScriptEnv(params, baseEnv),
        stdio: ["ignore", "pipe", "pipe"],
        shell: false,
        detached: true,
      });
    } catch (error) {
      reject(spawnFailure(script, error));
      return;
    }

    // Signal the whole process group so grandchildren holding the pipes go too.
    const killGroup = (signal: NodeJS.Signals): void => {
      if (child.pid === undefined) return;
      try {
        process.kill(-child.pid, signal);
      } catch {
        child.kill(signal);
      }
    };

    const flushStdout = collectLines(child.stdout, (line) => stdout.push(line));
    const flushStderr = collectLines(child.stderr, (line) => (separate ? stderr : stdout).push(line));

    const timeout = setTimeout(() => {
      timedOut = true;
      killGroup("SIGTERM");
      killTimer = setTimeout(() => {
        killGroup("SIGKILL");
      }, killGraceMs);
    }, timeoutMs);

    const finish = (): void => {
      settled = true;
      clearTimeout(timeout);
      if (killTimer) clearTimeout(killTimer);
    };

    child.on("error", (error) => {
      if (settled) return;
      finish();
      reject(spawnFailure(script, error));
    });

    child.on("close", (code, signal) => {
      if (settled) return;
      finish();
      flushStdout();
      flushStderr();

      if (timedOut) {
        reject(
          new ExecutionError("Timeout", `Script '${script.name}' exceeded the ${timeoutMs}ms execution timeout`, {
            scriptName: script.name,
            timeoutMs,
          })
        );
        return;
      }
      if (code === null) {
        reject(
          new ExecutionError("AbnormalExit", `Script '${script.name}' was terminated by ${signal ?? "a signal"}`, {
            scriptName: script.name,
            signal,
          })
        );
        return;
      }
      resolve(separate ? { exitCode: code, stdout, stderr } : { exitCode: code, stdout });
    });
  });
};
