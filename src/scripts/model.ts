export const HTTP_METHODS = ["get", "post", "put", "delete"] as const;
export type ScriptHttpMethod = (typeof HTTP_METHODS)[number];

export const OUTPUT_MODES = ["combined", "separate"] as const;
export type ScriptOutputMode = (typeof OUTPUT_MODES)[number];

/** Metadata for one registered script. Built once per registry load, never mutated. */
export type ScriptDescriptor = Readonly<{
  name: string;
  path: string;
  httpMethod: ScriptHttpMethod;
  output: ScriptOutputMode;
  tags: readonly string[];
  description: string | null;
}>;

/** Wire shape returned by `/scripts` and `OPTIONS /scripts/{name}`. */
export type ScriptMetadata = {
  name: string;
  http_method: ScriptHttpMethod;
  output: ScriptOutputMode;
  tags: string[];
  description: string | null;
};

/** At most one group is non-empty; all empty matches every script. */
export type TagQuery = {
  tags: string[];
  notTags: string[];
  anyTags: string[];
};

export type ExecutionResult = {
  exitCode: number;
  stdout: string[];
  stderr?: string[];
};

export type ScriptParams = Record<string, unknown>;

export function toScriptMetadata(script: ScriptDescriptor): ScriptMetadata {
  return {
    name: script.name,
    http_method: script.httpMethod,
    output: script.output,
    tags: [...script.tags],
    description: script.description,
  };
}

export function isScriptHttpMethod(value: string): value is ScriptHttpMethod {
  return HTTP_METHODS.some((method) => method === value);
}
