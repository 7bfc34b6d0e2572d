import dotenv from "dotenv";
import { z } from "zod";

dotenv.config();

const BoolFromString = z
  .union([z.enum(["true", "false", "1", "0"]), z.boolean()])
  .transform((value) => value === true || value === "true" || value === "1");

const requiredString = (field: string) =>
  z
    .string()
    .trim()
    .min(1, { message: `${field} must not be empty` });

const OptionalPath = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

const EnvSchema = z.object({
  CLOUDOMATE_HOST: requiredString("CLOUDOMATE_HOST").default("127.0.0.1"),
  CLOUDOMATE_PORT: z.coerce.number().int().min(1).max(65535).default(8080),
  CLOUDOMATE_LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
  CLOUDOMATE_SCRIPT_DIR: requiredString("CLOUDOMATE_SCRIPT_DIR").default("./scripts"),
  CLOUDOMATE_PASSFILE: OptionalPath,
  CLOUDOMATE_FORCE_JSON: BoolFromString.default(false),
  CLOUDOMATE_EXEC_TIMEOUT_MS: z.coerce.number().int().min(1_000).max(3_600_000).default(60_000),
  CLOUDOMATE_EXEC_KILL_GRACE_MS: z.coerce.number().int().min(0).max(60_000).default(2_000),
  CLOUDOMATE_MAX_BODY_BYTES: z.coerce.number().int().min(1_024).max(64 * 1024 * 1024).default(1024 * 1024),
});

export type GatewayEnv = z.infer<typeof EnvSchema>;

export function readEnv(source: NodeJS.ProcessEnv = process.env): GatewayEnv {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    const message = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`Invalid cloudomate env: ${message}`);
  }
  return parsed.data;
}

export function redactEnvForLogs(env: GatewayEnv): Record<string, string | number | boolean | null> {
  return {
    CLOUDOMATE_HOST: env.CLOUDOMATE_HOST,
    CLOUDOMATE_PORT: env.CLOUDOMATE_PORT,
    CLOUDOMATE_LOG_LEVEL: env.CLOUDOMATE_LOG_LEVEL,
    CLOUDOMATE_SCRIPT_DIR: env.CLOUDOMATE_SCRIPT_DIR,
    CLOUDOMATE_PASSFILE: env.CLOUDOMATE_PASSFILE ? "[set]" : null,
    CLOUDOMATE_FORCE_JSON: env.CLOUDOMATE_FORCE_JSON,
    CLOUDOMATE_EXEC_TIMEOUT_MS: env.CLOUDOMATE_EXEC_TIMEOUT_MS,
    CLOUDOMATE_EXEC_KILL_GRACE_MS: env.CLOUDOMATE_EXEC_KILL_GRACE_MS,
    CLOUDOMATE_MAX_BODY_BYTES: env.CLOUDOMATE_MAX_BODY_BYTES,
  };
}
