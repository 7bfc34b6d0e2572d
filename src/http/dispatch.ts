import type { Logger } from "../config/logger";
import { ExecutionError, runScript, type ScriptRunner } from "../execution/bridge";
import {
  toScriptMetadata,
  type ExecutionResult,
  type ScriptDescriptor,
  type ScriptHttpMethod,
  type ScriptMetadata,
  type ScriptParams,
} from "../scripts/model";
import type { ScriptSnapshot } from "../scripts/registry";
import { extractReturnValues } from "../scripts/returnValues";
import { HttpError, methodNotAllowed, notFound } from "./errors";

export type ExecutionEnvelope = {
  stdout: string[];
  stderr?: string[];
  return_values: Record<string, string>;
  retcode: number;
};

export type DispatchContext = {
  snapshot: ScriptSnapshot;
  requestId: string;
};

export type ScriptDispatcher = {
  describeScript: (ctx: DispatchContext, name: string) => { script: ScriptMetadata };
  executeScript: (
    ctx: DispatchContext,
    method: ScriptHttpMethod,
    name: string,
    params: ScriptParams
  ) => Promise<ExecutionEnvelope>;
};

export type DispatcherOptions = {
  logger: Logger;
  timeoutMs: number;
  killGraceMs?: number;
  runner?: ScriptRunner;
};

function resolveScript(snapshot: ScriptSnapshot, name: string): ScriptDescriptor {
  const script = snapshot.get(name);
  if (!script) {
    throw notFound(`Script with name '${name}' not found`);
  }
  return script;
}

export function createScriptDispatcher(options: DispatcherOptions): ScriptDispatcher {
  const { logger, timeoutMs, killGraceMs, runner = runScript } = options;

  const describeScript = (ctx: DispatchContext, name: string): { script: ScriptMetadata } => {
    return { script: toScriptMetadata(resolveScript(ctx.snapshot, name)) };
  };

  const executeScript = async (
    ctx: DispatchContext,
    method: ScriptHttpMethod,
    name: string,
    params: ScriptParams
  ): Promise<ExecutionEnvelope> => {
    // Resolved once; a reload during execution does not affect this request.
    const script = resolveScript(ctx.snapshot, name);
    if (script.httpMethod !== method) {
      throw methodNotAllowed(`Wrong HTTP method for script '${name}'. Use '${script.httpMethod.toUpperCase()}'`);
    }

    const startedAt = Date.now();
    let result: ExecutionResult;
    try {
      result = await runner(script, params, { timeoutMs, killGraceMs });
    } catch (error) {
      if (error instanceof ExecutionError) {
        logger.error("script_execution_failed", {
          requestId: ctx.requestId,
          scriptName: script.name,
          kind: error.kind,
          message: error.message,
          durationMs: Date.now() - startedAt,
        });
        throw new HttpError(500, "ExecutionFailure", error.message);
      }
      throw error;
    }

    const returnValues = extractReturnValues(result.stdout, (entry) => {
      logger.warn("script_return_value_malformed", {
        requestId: ctx.requestId,
        scriptName: script.name,
        lineNumber: entry.lineNumber,
        reason: entry.reason,
      });
    });

    logger.info("script_execution_completed", {
      requestId: ctx.requestId,
      scriptName: script.name,
      exitCode: result.exitCode,
      durationMs: Date.now() - startedAt,
      returnValueCount: Object.keys(returnValues).length,
    });

    const envelope: ExecutionEnvelope = {
      stdout: result.stdout,
      return_values: returnValues,
      retcode: result.exitCode,
    };
    if (script.output === "separate") {
      envelope.stderr = result.stderr ?? [];
    }
    return envelope;
  };

  return { describeScript, executeScript };
}
