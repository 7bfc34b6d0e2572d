import http from "node:http";
import { URL } from "node:url";
import crypto from "node:crypto";
import type { Logger } from "../config/logger";
import { authenticateRequest } from "../auth/basicAuth";
import type { CredentialStore } from "../auth/credentials";
import { isScriptHttpMethod, type ScriptParams } from "../scripts/model";
import type { ScriptRegistry, ScriptSnapshot } from "../scripts/registry";
import { parseTagQuery } from "../scripts/tagQuery";
import type { ScriptDispatcher } from "./dispatch";
import { HttpError, badRequest, errorEnvelope, methodNotAllowed, notFound } from "./errors";

const JSON_CONTENT_TYPE = "application/json; charset=UTF-8";
const SCRIPT_PATH = /^\/scripts\/([\w-]+)$/;

function withSecurityHeaders(headers: Record<string, string>): Record<string, string> {
  return {
    "x-content-type-options": "nosniff",
    "x-frame-options": "DENY",
    "cache-control": "no-store",
    ...headers,
  };
}

function firstHeader(value: string | string[] | undefined): string | undefined {
  if (typeof value === "string") return value;
  if (Array.isArray(value) && value[0]) return value[0];
  return undefined;
}

function normalizePath(pathname: string): string {
  return pathname.length > 1 ? pathname.replace(/\/+$/, "") : pathname;
}

function parseRequestUrl(target: string, host: string, port: number): URL {
  try {
    return new URL(target, `http://${host}:${port}`);
  } catch {
    throw badRequest("Malformed request URL");
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

async function readRawBody(req: http.IncomingMessage, maxBytes: number): Promise<string> {
  const chunks: Buffer[] = [];
  let total = 0;
  // Drain past the limit; breaking out of the loop destroys the socket before the 413 goes out.
  for await (const chunk of req) {
    const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    total += buffer.length;
    if (total <= maxBytes) chunks.push(buffer);
  }
  if (total > maxBytes) {
    throw new HttpError(413, "PayloadTooLarge", `Request body exceeds ${maxBytes} bytes`);
  }
  return Buffer.concat(chunks).toString("utf8");
}

export async function readJsonParams(
  req: http.IncomingMessage,
  options: { forceJson: boolean; maxBodyBytes: number }
): Promise<ScriptParams> {
  const contentType = firstHeader(req.headers["content-type"]) ?? "application/json";
  if (!contentType.toLowerCase().startsWith("application/json") && !options.forceJson) {
    throw badRequest(
      "This application only supports JSON, please set the HTTP header Content-Type to application/json"
    );
  }

  const raw = await readRawBody(req, options.maxBodyBytes);
  if (raw.trim().length === 0) return {};

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw badRequest(`Malformed JSON body: ${error instanceof Error ? error.message : String(error)}`);
  }
  if (!isRecord(parsed)) {
    throw badRequest("Request body must be a JSON object");
  }
  return parsed;
}

type RouteContext = {
  method: string;
  url: URL;
  snapshot: ScriptSnapshot;
  params: ScriptParams;
  requestId: string;
};

type RouteResult = { statusCode: number; body: unknown };

type Route = {
  match: (pathname: string) => string[] | null;
  handle: (ctx: RouteContext, args: string[]) => Promise<RouteResult> | RouteResult;
};

export function startHttpServer(params: {
  host: string;
  port: number;
  logger: Logger;
  registry: ScriptRegistry;
  dispatcher: ScriptDispatcher;
  credentialStore?: CredentialStore | null;
  forceJson?: boolean;
  maxBodyBytes?: number;
}): http.Server {
  const {
    host,
    port,
    logger,
    registry,
    dispatcher,
    credentialStore = null,
    forceJson = false,
    maxBodyBytes = 1024 * 1024,
  } = params;

  const exact = (path: string) => (pathname: string) => (pathname === path ? [] : null);

  const routes: Route[] = [
    {
      match: exact("/script_names"),
      handle: ({ method, url, snapshot }) => {
        if (method !== "GET") throw methodNotAllowed(`Method ${method} not allowed on /script_names`);
        return { statusCode: 200, body: { script_names: snapshot.names(parseTagQuery(url.searchParams)) } };
      },
    },
    {
      match: exact("/scripts"),
      handle: ({ method, url, snapshot }) => {
        if (method !== "GET") throw methodNotAllowed(`Method ${method} not allowed on /scripts`);
        return { statusCode: 200, body: { scripts: snapshot.metadata(parseTagQuery(url.searchParams)) } };
      },
    },
    {
      match: (pathname) => {
        const found = pathname.match(SCRIPT_PATH);
        return found && found[1] ? [found[1]] : null;
      },
      handle: async ({ method, snapshot, params: body, requestId }, [name = ""]) => {
        const dispatchCtx = { snapshot, requestId };
        if (method === "OPTIONS") {
          return { statusCode: 200, body: dispatcher.describeScript(dispatchCtx, name) };
        }
        const verb = method.toLowerCase();
        if (!isScriptHttpMethod(verb)) {
          throw methodNotAllowed(`Method ${method} not allowed on /scripts/${name}`);
        }
        return { statusCode: 200, body: await dispatcher.executeScript(dispatchCtx, verb, name, body) };
      },
    },
    {
      match: exact("/reload"),
      handle: async ({ method }) => {
        if (method !== "POST") throw methodNotAllowed(`Method ${method} not allowed on /reload`);
        try {
          await registry.reload();
        } catch (error) {
          throw new HttpError(
            500,
            "Internal",
            `Script reload failed: ${error instanceof Error ? error.message : String(error)}`
          );
        }
        return { statusCode: 200, body: { status: "ok" } };
      },
    },
  ];

  const server = http.createServer(async (req, res) => {
    const requestId = crypto.randomUUID();
    const startedAt = Date.now();
    const method = (req.method ?? "GET").toUpperCase();
    let pathname = req.url ?? "/";
    let statusCode = 500;
    let username: string | null = null;

    const send = (status: number, body: unknown, headers: Record<string, string> = {}): void => {
      statusCode = status;
      res.writeHead(
        status,
        withSecurityHeaders({ "content-type": JSON_CONTENT_TYPE, "x-request-id": requestId, ...headers })
      );
      res.end(JSON.stringify(body));
    };

    try {
      const url = parseRequestUrl(req.url ?? "/", host, port);
      pathname = normalizePath(url.pathname);

      // Taken once; every lookup in this request reads the same snapshot.
      const snapshot = registry.snapshot();

      if (method === "GET" && pathname === "/healthz") {
        send(200, {
          ok: true,
          service: "cloudomate",
          at: new Date().toISOString(),
          scripts: snapshot.size,
          loadedAt: snapshot.builtAt,
        });
        return;
      }

      let route: Route | null = null;
      let args: string[] = [];
      for (const candidate of routes) {
        const matched = candidate.match(pathname);
        if (matched) {
          route = candidate;
          args = matched;
          break;
        }
      }
      if (!route) {
        throw notFound(`No route for ${pathname}`);
      }

      const body = await readJsonParams(req, { forceJson, maxBodyBytes });
      const auth = await authenticateRequest(firstHeader(req.headers.authorization), credentialStore, logger);
      username = auth.username;

      const result = await route.handle({ method, url, snapshot, params: body, requestId }, args);
      send(result.statusCode, result.body);
    } catch (error) {
      if (error instanceof HttpError) {
        send(error.statusCode, errorEnvelope(error.statusCode, error.message), error.headers);
        return;
      }
      logger.error("cloudomate_http_handler_error", {
        requestId,
        method,
        path: pathname,
        message: error instanceof Error ? error.message : String(error),
      });
      send(500, errorEnvelope(500, "Internal server error"));
    } finally {
      logger.info("cloudomate_http_request", {
        requestId,
        method,
        path: pathname,
        statusCode,
        username,
        durationMs: Date.now() - startedAt,
      });
    }
  });

  server.listen(port, host, () => {
    logger.info("cloudomate_http_listening", { host, port });
  });

  return server;
}
