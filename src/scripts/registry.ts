import fs from "node:fs/promises";
import { constants } from "node:fs";
import path from "node:path";
import { z } from "zod";
import type { Logger } from "../config/logger";
import {
  HTTP_METHODS,
  OUTPUT_MODES,
  toScriptMetadata,
  type ScriptDescriptor,
  type ScriptMetadata,
  type TagQuery,
} from "./model";
import { emptyTagQuery, matchesTagQuery } from "./tagQuery";

const SCRIPT_FILE_PATTERN = /^([\w-]+)(\.[\w-]+)?$/;
const HEADER_PATTERN = /^(?:#|\/\/)\s*cloudomate\.([a-z_]+)\s*:\s*(.*)$/;
const COMMENT_PATTERN = /^(?:#|\/\/)/;

const ScriptHeaderSchema = z.object({
  http_method: z.string().trim().toLowerCase().pipe(z.enum(HTTP_METHODS)).default("get"),
  output: z.string().trim().toLowerCase().pipe(z.enum(OUTPUT_MODES)).default("combined"),
  tags: z
    .string()
    .transform((value) =>
      value
        .split(",")
        .map((entry) => entry.trim())
        .filter(Boolean)
    )
    .default(""),
  description: z.string().trim().optional(),
});

export class ScriptSnapshot {
  readonly builtAt: string;
  private readonly byName: ReadonlyMap<string, ScriptDescriptor>;

  constructor(scripts: Iterable<ScriptDescriptor>, builtAt = new Date().toISOString()) {
    const entries = new Map<string, ScriptDescriptor>();
    for (const script of scripts) {
      if (entries.has(script.name)) continue;
      entries.set(script.name, Object.freeze({ ...script, tags: Object.freeze([...script.tags]) }));
    }
    this.byName = entries;
    this.builtAt = builtAt;
    Object.freeze(this);
  }

  get size(): number {
    return this.byName.size;
  }

  get(name: string): ScriptDescriptor | null {
    return this.byName.get(name) ?? null;
  }

  list(query: TagQuery = emptyTagQuery()): ScriptDescriptor[] {
    return [...this.byName.values()]
      .filter((script) => matchesTagQuery(script, query))
      .sort((a, b) => a.name.localeCompare(b.name));
  }

  names(query?: TagQuery): string[] {
    return this.list(query).map((script) => script.name);
  }

  metadata(query?: TagQuery): ScriptMetadata[] {
    return this.list(query).map(toScriptMetadata);
  }
}

export interface ScriptRegistry {
  /** Current snapshot. Callers keep the returned object for the whole request. */
  snapshot(): ScriptSnapshot;
  reload(): Promise<ScriptSnapshot>;
}

export function parseScriptHeader(source: string): Record<string, string> {
  const fields: Record<string, string> = {};
  const lines = source.split(/\r?\n/);
  for (const [index, rawLine] of lines.entries()) {
    const line = rawLine.trim();
    if (index === 0 && line.startsWith("#!")) continue;
    if (!line) continue;
    if (!COMMENT_PATTERN.test(line)) break;
    const match = line.match(HEADER_PATTERN);
    if (match && match[1] && match[2] !== undefined) {
      fields[match[1]] = match[2];
    }
  }
  return fields;
}

export function scriptNameFromFile(fileName: string): string | null {
  if (fileName.startsWith(".")) return null;
  const match = fileName.match(SCRIPT_FILE_PATTERN);
  return match?.[1] ?? null;
}

async function isExecutable(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

export async function loadScriptDescriptor(filePath: string): Promise<ScriptDescriptor> {
  const name = scriptNameFromFile(path.basename(filePath));
  if (!name) {
    throw new Error(`script file name '${path.basename(filePath)}' does not form a valid script name`);
  }
  const source = await fs.readFile(filePath, "utf8");
  const parsed = ScriptHeaderSchema.safeParse(parseScriptHeader(source));
  if (!parsed.success) {
    const message = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`invalid script header in ${filePath}: ${message}`);
  }
  const header = parsed.data;
  return {
    name,
    path: filePath,
    httpMethod: header.http_method,
    output: header.output,
    tags: header.tags,
    description: header.description || null,
  };
}

export async function buildScriptSnapshot(directory: string, logger: Logger): Promise<ScriptSnapshot> {
  const dirents = await fs.readdir(directory, { withFileTypes: true });
  const files = dirents
    .filter((entry) => entry.isFile())
    .map((entry) => entry.name)
    .sort();

  const scripts: ScriptDescriptor[] = [];
  const seen = new Set<string>();
  for (const fileName of files) {
    const name = scriptNameFromFile(fileName);
    if (!name) continue;
    const filePath = path.join(directory, fileName);
    if (seen.has(name)) {
      logger.warn("script_registry_duplicate_name", { scriptName: name, file: filePath });
      continue;
    }
    if (!(await isExecutable(filePath))) {
      logger.warn("script_registry_not_executable", { scriptName: name, file: filePath });
      continue;
    }
    try {
      scripts.push(await loadScriptDescriptor(filePath));
      seen.add(name);
    } catch (error) {
      logger.warn("script_registry_invalid_script", {
        scriptName: name,
        file: filePath,
        message: error instanceof Error ? error.message : String(error),
      });
    }
  }
  return new ScriptSnapshot(scripts);
}

export type DirectoryRegistryOptions = {
  directory: string;
  logger: Logger;
};

export class DirectoryScriptRegistry implements ScriptRegistry {
  private current: ScriptSnapshot;
  private generation = 0;
  private appliedGeneration = 0;

  private constructor(
    private readonly directory: string,
    private readonly logger: Logger,
    initial: ScriptSnapshot
  ) {
    this.current = initial;
  }

  static async load(options: DirectoryRegistryOptions): Promise<DirectoryScriptRegistry> {
    const directory = path.resolve(process.cwd(), options.directory);
    const initial = await buildScriptSnapshot(directory, options.logger);
    options.logger.info("script_registry_loaded", { directory, scriptCount: initial.size });
    return new DirectoryScriptRegistry(directory, options.logger, initial);
  }

  snapshot(): ScriptSnapshot {
    return this.current;
  }

  async reload(): Promise<ScriptSnapshot> {
    this.generation += 1;
    const generation = this.generation;
    const startedAt = Date.now();
    const next = await buildScriptSnapshot(this.directory, this.logger);
    // A reload that started later may already have been applied.
    if (generation > this.appliedGeneration) {
      this.current = next;
      this.appliedGeneration = generation;
    }
    this.logger.info("script_registry_reloaded", {
      directory: this.directory,
      scriptCount: next.size,
      durationMs: Date.now() - startedAt,
    });
    return this.current;
  }
}
