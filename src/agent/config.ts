import minimist from "minimist";
import { z } from "zod";
import { LOG_LEVELS } from "../obs/log";

export const AgentConfigSchema = z.object({
  moveTimeMs: z.coerce.number().int().min(0).default(1000),
  safetyMarginMs: z.coerce.number().int().min(0).default(50),
  maxDepth: z.coerce.number().int().min(1).max(256).default(64),
  strategy: z.enum(["search", "greedy"]).default("search"),
  placementRule: z.enum(["single-fish", "any"]).default("single-fish"),
  logLevel: z.enum(LOG_LEVELS).default("info"),
});

export type AgentConfig = z.infer<typeof AgentConfigSchema>;

type Env = Record<string, string | undefined>;

// flag name, env name, config key
const SOURCES = [
  ["move-time-ms", "FLOE_MOVE_TIME_MS", "moveTimeMs"],
  ["safety-margin-ms", "FLOE_SAFETY_MARGIN_MS", "safetyMarginMs"],
  ["max-depth", "FLOE_MAX_DEPTH", "maxDepth"],
  ["strategy", "FLOE_STRATEGY", "strategy"],
  ["placement-rule", "FLOE_PLACEMENT_RULE", "placementRule"],
  ["log-level", "FLOE_LOG_LEVEL", "logLevel"],
] as const;

function envValue(env: Env, name: string): string | undefined {
  const v = env[name];
  if (v == null) return undefined;
  const s = v.trim();
  return s.length > 0 ? s : undefined;
}

/**
 * Command-line flags win over FLOE_* environment variables, which win over
 * the schema defaults. Throws a ZodError on invalid values.
 */
export function loadConfig(argv: readonly string[] = process.argv.slice(2), env: Env = process.env): AgentConfig {
  const args = minimist([...argv], {
    string: SOURCES.map(([flag]) => flag),
  });

  const raw: Record<string, string | undefined> = {};
  for (const [flag, envName, key] of SOURCES) {
    const fromArgs: unknown = args[flag];
    raw[key] = typeof fromArgs === "string" && fromArgs.length > 0 ? fromArgs : envValue(env, envName);
  }
  return AgentConfigSchema.parse(raw);
}

export function usage(): string {
  return [
    "floe-agent: plays one game against a judge over stdin/stdout",
    "",
    "Options (environment variable in brackets):",
    "  --move-time-ms <n>      budget per move when the judge sends none [FLOE_MOVE_TIME_MS] (1000)",
    "  --safety-margin-ms <n>  kept back from every budget [FLOE_SAFETY_MARGIN_MS] (50)",
    "  --max-depth <n>         deepest search iteration [FLOE_MAX_DEPTH] (64)",
    "  --strategy <name>       search | greedy [FLOE_STRATEGY] (search)",
    "  --placement-rule <r>    single-fish | any [FLOE_PLACEMENT_RULE] (single-fish)",
    "  --log-level <level>     debug | info | warn | error, logs go to stderr [FLOE_LOG_LEVEL] (info)",
  ].join("\n");
}
