import test from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs/promises";
import net from "node:net";
import os from "node:os";
import path from "node:path";
import type { AddressInfo } from "node:net";

import { silentLogger } from "../config/logger";
import type { CredentialStore } from "../auth/credentials";
import { DirectoryScriptRegistry } from "../scripts/registry";
import { createScriptDispatcher } from "./dispatch";
import { startHttpServer } from "./server";

type ServerOptions = {
  credentialStore?: CredentialStore | null;
  forceJson?: boolean;
  maxBodyBytes?: number;
};

type Harness = {
  baseUrl: string;
  scriptDir: string;
  addScript: (fileName: string, body: string) => Promise<void>;
};

// Written beside the target and renamed over it, so a running copy keeps its own inode.
async function writeScript(dir: string, fileName: string, body: string): Promise<void> {
  const staging = path.join(dir, `.${fileName}.staging`);
  await fs.writeFile(staging, body, "utf8");
  await fs.chmod(staging, 0o755);
  await fs.rename(staging, path.join(dir, fileName));
}

const HELLO = [
  "#!/bin/sh",
  "# cloudomate.http_method: get",
  "# cloudomate.output: combined",
  "# cloudomate.tags: demo, greeting",
  "echo starting",
  "echo cloudomatethecloudgarage_return_value greeting = hi",
  "exit 0",
].join("\n");

const DEPLOY = [
  "#!/bin/sh",
  "# cloudomate.http_method: post",
  "# cloudomate.output: separate",
  "# cloudomate.tags: ops",
  "# cloudomate.description: Deploy a target",
  'echo "deploying $CLOUDOMATE_PARAM_TARGET"',
  "echo oops 1>&2",
  'echo "cloudomatethecloudgarage_return_value target = $CLOUDOMATE_PARAM_TARGET"',
  "exit 2",
].join("\n");

const CLEANUP = ["#!/bin/sh", "# cloudomate.http_method: delete", "# cloudomate.tags: ops, demo", "echo cleaned"].join(
  "\n"
);

async function withServer(options: ServerOptions, run: (harness: Harness) => Promise<void>): Promise<void> {
  const scriptDir = await fs.mkdtemp(path.join(os.tmpdir(), "cloudomate-server-"));
  await writeScript(scriptDir, "hello.sh", HELLO);
  await writeScript(scriptDir, "deploy.sh", DEPLOY);
  await writeScript(scriptDir, "cleanup.sh", CLEANUP);

  const registry = await DirectoryScriptRegistry.load({ directory: scriptDir, logger: silentLogger });
  const dispatcher = createScriptDispatcher({ logger: silentLogger, timeoutMs: 5_000 });
  const server = startHttpServer({
    host: "127.0.0.1",
    port: 0,
    logger: silentLogger,
    registry,
    dispatcher,
    ...options,
  });

  await new Promise<void>((resolve) => server.on("listening", () => resolve()));
  const address = server.address() as AddressInfo;
  const baseUrl = `http://127.0.0.1:${address.port}`;

  try {
    await run({ baseUrl, scriptDir, addScript: (fileName, body) => writeScript(scriptDir, fileName, body) });
  } finally {
    await new Promise<void>((resolve, reject) => {
      server.close((error) => {
        if (error) reject(error);
        else resolve();
      });
    });
    await fs.rm(scriptDir, { recursive: true, force: true });
  }
}

const basic = (userPass: string) => `Basic ${Buffer.from(userPass, "utf8").toString("base64")}`;

const aliceStore: CredentialStore = {
  verify: async (username, password) => username === "alice" && password === "test-secret",
};

test("GET /scripts/hello runs the script and returns the combined envelope", async () => {
  await withServer({}, async ({ baseUrl }) => {
    const response = await fetch(`${baseUrl}/scripts/hello`);
    assert.equal(response.status, 200);
    assert.equal(response.headers.get("content-type"), "application/json; charset=UTF-8");
    assert.deepEqual(await response.json(), {
      stdout: ["starting", "cloudomatethecloudgarage_return_value greeting = hi"],
      return_values: { greeting: "hi" },
      retcode: 0,
    });
  });
});

test("POST /scripts/deploy passes the JSON body and returns separate streams", async () => {
  await withServer({}, async ({ baseUrl }) => {
    const response = await fetch(`${baseUrl}/scripts/deploy/`, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: JSON.stringify({ target: "web" }),
    });
    assert.equal(response.status, 200);
    assert.deepEqual(await response.json(), {
      stdout: ["deploying web", "cloudomatethecloudgarage_return_value target = web"],
      stderr: ["oops"],
      return_values: { target: "web" },
      retcode: 2,
    });
  });
});

test("DELETE /scripts/cleanup runs a delete script", async () => {
  await withServer({}, async ({ baseUrl }) => {
    const response = await fetch(`${baseUrl}/scripts/cleanup`, { method: "DELETE" });
    assert.equal(response.status, 200);
    assert.deepEqual(await response.json(), { stdout: ["cleaned"], return_values: {}, retcode: 0 });
  });
});

test("wrong verbs get 405 with the error envelope", async () => {
  await withServer({}, async ({ baseUrl }) => {
    for (const method of ["POST", "PUT", "DELETE"]) {
      const response = await fetch(`${baseUrl}/scripts/hello`, { method });
      assert.equal(response.status, 405);
      assert.deepEqual(await response.json(), {
        error: {
          code: 405,
          type: "Method Not Allowed",
          message: "Wrong HTTP method for script 'hello'. Use 'GET'",
        },
      });
    }
  });
});

test("unknown scripts get 404 for every verb", async () => {
  await withServer({}, async ({ baseUrl }) => {
    for (const method of ["GET", "POST", "PUT", "DELETE", "OPTIONS"]) {
      const response = await fetch(`${baseUrl}/scripts/missing`, { method });
      assert.equal(response.status, 404);
      assert.deepEqual(await response.json(), {
        error: { code: 404, type: "Not Found", message: "Script with name 'missing' not found" },
      });
    }
  });
});

test("unknown paths get a 404 envelope", async () => {
  await withServer({}, async ({ baseUrl }) => {
    const response = await fetch(`${baseUrl}/nothing/here`);
    assert.equal(response.status, 404);
    assert.deepEqual(await response.json(), {
      error: { code: 404, type: "Not Found", message: "No route for /nothing/here" },
    });
  });
});

test("OPTIONS /scripts/{name} returns metadata regardless of declared method", async () => {
  await withServer({}, async ({ baseUrl }) => {
    const response = await fetch(`${baseUrl}/scripts/deploy`, { method: "OPTIONS" });
    assert.equal(response.status, 200);
    assert.deepEqual(await response.json(), {
      script: {
        name: "deploy",
        http_method: "post",
        output: "separate",
        tags: ["ops"],
        description: "Deploy a target",
      },
    });
  });
});

test("GET /script_names lists all names and honors only the first tag mode", async () => {
  await withServer({}, async ({ baseUrl }) => {
    const all = await fetch(`${baseUrl}/script_names`);
    assert.deepEqual(await all.json(), { script_names: ["cleanup", "deploy", "hello"] });

    const tagged = await fetch(`${baseUrl}/script_names?tags=demo,greeting&not_tags=ops`);
    assert.deepEqual(await tagged.json(), { script_names: ["hello"] });

    const excluded = await fetch(`${baseUrl}/script_names?not_tags=ops`);
    assert.deepEqual(await excluded.json(), { script_names: ["hello"] });

    const any = await fetch(`${baseUrl}/script_names?any_tags=greeting,ops`);
    assert.deepEqual(await any.json(), { script_names: ["cleanup", "deploy", "hello"] });
  });
});

test("GET /scripts returns metadata filtered by tags", async () => {
  await withServer({}, async ({ baseUrl }) => {
    const response = await fetch(`${baseUrl}/scripts?tags=ops`);
    assert.deepEqual(await response.json(), {
      scripts: [
        { name: "cleanup", http_method: "delete", output: "combined", tags: ["ops", "demo"], description: null },
        { name: "deploy", http_method: "post", output: "separate", tags: ["ops"], description: "Deploy a target" },
      ],
    });
  });
});

test("non-JSON content types are rejected unless force JSON is on", async () => {
  await withServer({}, async ({ baseUrl }) => {
    const response = await fetch(`${baseUrl}/scripts/hello`, {
      headers: { "content-type": "text/plain" },
    });
    assert.equal(response.status, 400);
    assert.deepEqual(await response.json(), {
      error: {
        code: 400,
        type: "Bad Request",
        message: "This application only supports JSON, please set the HTTP header Content-Type to application/json",
      },
    });
  });

  await withServer({ forceJson: true }, async ({ baseUrl }) => {
    const response = await fetch(`${baseUrl}/scripts/deploy`, {
      method: "POST",
      headers: { "content-type": "text/plain" },
      body: JSON.stringify({ target: "api" }),
    });
    assert.equal(response.status, 200);
    const body = (await response.json()) as { return_values: Record<string, string> };
    assert.deepEqual(body.return_values, { target: "api" });
  });
});

test("malformed and non-object JSON bodies are rejected with 400", async () => {
  await withServer({}, async ({ baseUrl }) => {
    const malformed = await fetch(`${baseUrl}/scripts/deploy`, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: "{not json",
    });
    assert.equal(malformed.status, 400);

    const list = await fetch(`${baseUrl}/scripts/deploy`, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: "[1,2]",
    });
    assert.equal(list.status, 400);
    assert.deepEqual(await list.json(), {
      error: { code: 400, type: "Bad Request", message: "Request body must be a JSON object" },
    });
  });
});

test("bodies over the configured limit get 413", async () => {
  await withServer({ maxBodyBytes: 1_024 }, async ({ baseUrl }) => {
    const response = await fetch(`${baseUrl}/scripts/deploy`, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: JSON.stringify({ target: "x".repeat(2_048) }),
    });
    assert.equal(response.status, 413);
  });
});

test("an unparseable request target gets a 400 envelope and the server keeps serving", async () => {
  await withServer({}, async ({ baseUrl }) => {
    const { port } = new URL(baseUrl);
    const raw = await new Promise<string>((resolve, reject) => {
      const socket = net.connect(Number(port), "127.0.0.1", () => {
        socket.write("GET //[ HTTP/1.1\r\nHost: 127.0.0.1\r\nConnection: close\r\n\r\n");
      });
      let received = "";
      socket.setEncoding("utf8");
      socket.on("data", (chunk: string) => {
        received += chunk;
      });
      socket.on("end", () => resolve(received));
      socket.on("error", reject);
    });
    assert.equal(raw.split("\r\n")[0], "HTTP/1.1 400 Bad Request");
    assert.ok(raw.includes('{"error":{"code":400,"type":"Bad Request","message":"Malformed request URL"}}'));

    const after = await fetch(`${baseUrl}/healthz`);
    assert.equal(after.status, 200);
  });
});

test("a script whose environment cannot be built fails with ExecutionFailure", async () => {
  await withServer({}, async ({ baseUrl }) => {
    const response = await fetch(`${baseUrl}/scripts/deploy`, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: JSON.stringify({ target: "x".repeat(200_000) }),
    });
    assert.equal(response.status, 500);
    const body = (await response.json()) as { error: { code: number; message: string } };
    assert.equal(body.error.code, 500);
    assert.ok(body.error.message.startsWith("Failed to start script 'deploy'"));
  });
});

test("no credential store means no challenge", async () => {
  await withServer({ credentialStore: null }, async ({ baseUrl }) => {
    const response = await fetch(`${baseUrl}/script_names`);
    assert.equal(response.status, 200);
    assert.equal(response.headers.get("www-authenticate"), null);
  });
});

test("invalid Basic credentials get 401 with the cloudomate challenge", async () => {
  await withServer({ credentialStore: aliceStore }, async ({ baseUrl }) => {
    const missing = await fetch(`${baseUrl}/script_names`);
    assert.equal(missing.status, 401);
    assert.equal(missing.headers.get("www-authenticate"), "Basic realm=cloudomate");

    const wrong = await fetch(`${baseUrl}/scripts/hello`, { headers: { authorization: basic("alice:nope") } });
    assert.equal(wrong.status, 401);
    assert.equal(wrong.headers.get("www-authenticate"), "Basic realm=cloudomate");
    assert.deepEqual(await wrong.json(), {
      error: { code: 401, type: "Unauthorized", message: "Invalid credentials" },
    });

    const ok = await fetch(`${baseUrl}/scripts/hello`, { headers: { authorization: basic("alice:test-secret") } });
    assert.equal(ok.status, 200);
  });
});

test("healthz is reachable without credentials", async () => {
  await withServer({ credentialStore: aliceStore }, async ({ baseUrl }) => {
    const response = await fetch(`${baseUrl}/healthz`);
    assert.equal(response.status, 200);
    const body = (await response.json()) as { ok: boolean; service: string; scripts: number; loadedAt: string };
    assert.equal(body.ok, true);
    assert.equal(body.service, "cloudomate");
    assert.equal(body.scripts, 3);
    assert.equal(new Date(body.loadedAt).toISOString(), body.loadedAt);
  });
});

test("healthz reports when the current snapshot was built", async () => {
  await withServer({}, async ({ baseUrl }) => {
    const first = (await (await fetch(`${baseUrl}/healthz`)).json()) as { loadedAt: string };
    await new Promise((resolve) => setTimeout(resolve, 20));
    const reload = await fetch(`${baseUrl}/reload`, { method: "POST" });
    assert.equal(reload.status, 200);
    const second = (await (await fetch(`${baseUrl}/healthz`)).json()) as { loadedAt: string };
    assert.ok(Date.parse(second.loadedAt) > Date.parse(first.loadedAt));
  });
});

test("POST /reload picks up added and removed scripts", async () => {
  await withServer({}, async ({ baseUrl, scriptDir, addScript }) => {
    await addScript("fresh.sh", "#!/bin/sh\necho fresh\n");
    await fs.rm(path.join(scriptDir, "cleanup.sh"));

    const before = await fetch(`${baseUrl}/script_names`);
    assert.deepEqual(await before.json(), { script_names: ["cleanup", "deploy", "hello"] });

    const reload = await fetch(`${baseUrl}/reload`, { method: "POST" });
    assert.equal(reload.status, 200);
    assert.deepEqual(await reload.json(), { status: "ok" });

    const after = await fetch(`${baseUrl}/script_names`);
    assert.deepEqual(await after.json(), { script_names: ["deploy", "fresh", "hello"] });

    const run = await fetch(`${baseUrl}/scripts/fresh`);
    assert.deepEqual(await run.json(), { stdout: ["fresh"], return_values: {}, retcode: 0 });
  });
});

test("a request in flight keeps the descriptor it resolved when a reload lands", async () => {
  await withServer({}, async ({ baseUrl, addScript }) => {
    await addScript(
      "slow.sh",
      "#!/bin/sh\n# cloudomate.output: separate\nsleep 0.5\necho cloudomatethecloudgarage_return_value version = 1\n"
    );
    await fetch(`${baseUrl}/reload`, { method: "POST" });

    const inFlight = fetch(`${baseUrl}/scripts/slow`);
    await new Promise((resolve) => setTimeout(resolve, 150));
    await addScript("slow.sh", "#!/bin/sh\n# cloudomate.http_method: post\necho replaced\n");
    await fetch(`${baseUrl}/reload`, { method: "POST" });

    const response = await inFlight;
    assert.equal(response.status, 200);
    const body = (await response.json()) as { stderr?: string[]; return_values: Record<string, string> };
    assert.deepEqual(body.stderr, []);
    assert.deepEqual(body.return_values, { version: "1" });

    const next = await fetch(`${baseUrl}/scripts/slow`);
    assert.equal(next.status, 405);
  });
});

test("GET-only collection routes reject other methods", async () => {
  await withServer({}, async ({ baseUrl }) => {
    const response = await fetch(`${baseUrl}/script_names`, { method: "POST" });
    assert.equal(response.status, 405);
    const reload = await fetch(`${baseUrl}/reload`);
    assert.equal(reload.status, 405);
  });
});
