#!/usr/bin/env node
import { ZodError } from "zod";
import { createLogger } from "../obs/log";
import { type AgentConfig, loadConfig, usage } from "./config";
import { EXIT_FAULT, runAgent } from "./runAgent";

async function main(): Promise<number> {
  const argv = process.argv.slice(2);
  if (argv.includes("--help") || argv.includes("-h")) {
    console.log(usage());
    return 0;
  }

  let config: AgentConfig;
  try {
    config = loadConfig(argv, process.env);
  } catch (err) {
    if (err instanceof ZodError) {
      console.error(`invalid configuration:\n${err.issues.map((i) => `  ${i.path.join(".")}: ${i.message}`).join("\n")}`);
      console.error(usage());
      return EXIT_FAULT;
    }
    throw err;
  }

  const log = createLogger({ level: config.logLevel });
  log.debug("config", { ...config });
  return runAgent({ input: process.stdin, output: process.stdout, config, log });
}

main()
  .then((code) => {
    // The judge may keep our stdin open after the game; let the process end anyway.
    process.stdin.destroy();
    process.exitCode = code;
  })
  .catch((err) => {
    // eslint-disable-next-line no-console
    console.error(err);
    process.exit(EXIT_FAULT);
  });
