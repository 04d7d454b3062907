#!/usr/bin/env npx tsx

import { readEnv } from "../src/env";
import { createLogger, normalizeLogLevel } from "../src/lib/logger";
import { TradingDesk } from "../src/pipeline/desk";
import { FixtureMarketDataProvider } from "../src/providers/fixture-market-data";
import { isLLMConfigured } from "../src/providers/llm/factory";

const USAGE =
  "Usage: scripts/analyze.ts --data fixtures/sample-dataset.json --ticker ACME --start 2024-01-01 --end 2024-07-29 " +
  "[--cash 100000] [--shares 0] [--lot-size 100] [--offline] [--trace]";

function parseArgValue(args: string[], name: string): string | undefined {
  const idx = args.indexOf(name);
  if (idx === -1) return undefined;
  return args[idx + 1];
}

function hasFlag(args: string[], name: string): boolean {
  return args.includes(name);
}

function requiredArg(args: string[], name: string): string {
  const value = parseArgValue(args, name);
  if (!value) throw new Error(`${name} is required\n${USAGE}`);
  return value;
}

function numberArg(args: string[], name: string, fallback: number): number {
  const raw = parseArgValue(args, name);
  if (raw === undefined) return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0) throw new Error(`${name} must be a non-negative number`);
  return value;
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  if (hasFlag(args, "--help")) {
    process.stdout.write(`${USAGE}\n`);
    return;
  }

  const env = readEnv();
  const market = await FixtureMarketDataProvider.fromFile(requiredArg(args, "--data"));
  const lotSize = parseArgValue(args, "--lot-size");
  const offline = hasFlag(args, "--offline");
  if (!offline && !isLLMConfigured(env)) {
    process.stderr.write("No LLM API key set; debate and decision will use local defaults.\n");
  }

  const desk = new TradingDesk({
    market,
    env,
    // --offline skips the completion service; debate and decision use local defaults
    llm: offline ? null : undefined,
    config: lotSize ? { lotSize: numberArg(args, "--lot-size", 100) } : undefined,
    logger: createLogger("analyze", normalizeLogLevel(env.DESK_LOG_LEVEL, "warn")),
  });

  const request = {
    ticker: requiredArg(args, "--ticker"),
    startDate: requiredArg(args, "--start"),
    endDate: requiredArg(args, "--end"),
    portfolio: {
      cash: numberArg(args, "--cash", 100_000),
      shares: numberArg(args, "--shares", 0),
    },
  };

  const output = hasFlag(args, "--trace") ? await desk.analyzeWithTrace(request) : await desk.analyze(request);
  process.stdout.write(`${JSON.stringify(output, null, 2)}\n`);
}

main().catch((err: unknown) => {
  process.stderr.write(`${err instanceof Error ? (err.stack ?? err.message) : String(err)}\n`);
  process.exitCode = 1;
});
