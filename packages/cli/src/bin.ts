import { StructuredExchangeNormalizer } from "@structured-exchange/core";
import { createBackend } from "@structured-exchange/providers";
import { parseCliArgs, type CliFlags, type Scenario } from "./args.js";
import { resolveConfig, type ExchangeConfig } from "./config/exchange-config.js";
import { formatResult } from "./report.js";
import { runWeatherScenario } from "./scenarios/weather.js";
import { runRepoSummaryScenario } from "./scenarios/repo-summary.js";

async function main(): Promise<void> {
  const parsed = parseCliArgs(process.argv.slice(2));

  if (parsed.kind === "help") {
    printHelp();
    process.exit(0);
    return;
  }

  if (parsed.kind === "version") {
    console.log("0.1.0");
    process.exit(0);
    return;
  }

  if (parsed.kind === "invalid") {
    console.error(`[structured-exchange] ${parsed.message}`);
    printHelp();
    process.exit(2);
    return;
  }

  const config = await resolveConfig(process.cwd(), {
    ...(parsed.flags.api !== undefined ? { api: parsed.flags.api } : {}),
    ...(parsed.flags.mode !== undefined ? { schemaMode: parsed.flags.mode } : {}),
    ...(parsed.flags.model !== undefined ? { model: parsed.flags.model } : {}),
  });

  const exitCode = await run(parsed.scenario, parsed.flags, config);
  process.exit(exitCode);
}

async function run(scenario: Scenario, flags: CliFlags, config: ExchangeConfig): Promise<number> {
  const apiKey = process.env[config.apiKeyEnv];
  if (!apiKey) {
    console.error(`[structured-exchange] ${config.apiKeyEnv} is not set.`);
    return 1;
  }

  const backend = createBackend(
    config.api === "chat"
      ? { api: "chat", apiKey, model: config.model, baseURL: config.baseURL, schemaMode: config.schemaMode }
      : { api: "responses", apiKey, model: config.model, baseURL: config.baseURL }
  );
  console.info(
    `[structured-exchange] ${backend.backendId}: ${backend.capabilities.transport} transport, ${backend.capabilities.schemaMode} schema mode`
  );

  const normalizer = new StructuredExchangeNormalizer({
    backend,
    onPhaseChange: (phase) => console.info(`[structured-exchange] ${phase}`),
  });

  const report =
    scenario === "weather"
      ? formatResult((await runWeatherScenario(normalizer, { maxToolRounds: config.maxToolRounds })).result)
      : formatResult(await runRepoSummaryScenario(normalizer, flags.repo));

  if (report.stream === "stdout") {
    console.log(report.text);
  } else {
    console.error(report.text);
  }
  return report.exitCode;
}

function printHelp(): void {
  console.log(`
structured-exchange: compare chat-style and responses-style structured output

Usage:
  structured-exchange weather [options]   Tool round trip, then PackAdvice JSON
  structured-exchange extract [options]   Direct RepoSummary extraction
  structured-exchange --help              Show this help
  structured-exchange --version           Show version

Options:
  --api chat|responses    Calling convention (default: responses)
  --mode weak|strict      Schema enforcement for the chat API (default: weak)
  --model <id>            Model id (default: gpt-4o-mini)
  --repo <name>           Repository to summarize (extract only)

Configuration:
  Optional .exchange/config.yaml in the working directory:
    api: chat
    schema_mode: strict
    api_key_env: OPENAI_API_KEY
`);
}

main().catch((err: unknown) => {
  console.error(
    "[structured-exchange] Fatal error:",
    err instanceof Error ? err.message : String(err)
  );
  process.exit(1);
});
