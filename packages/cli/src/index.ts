// Public API
export {
  ExchangeConfigSchema,
  FileConfigSchema,
  defineConfig,
  loadFileConfig,
  resolveConfig,
} from "./config/exchange-config.js";
export type {
  ExchangeConfig,
  ExchangeConfigInput,
  FileConfig,
} from "./config/exchange-config.js";

export { parseCliArgs } from "./args.js";
export type { ParsedArgs, CliFlags, Scenario } from "./args.js";

export { formatResult } from "./report.js";
export type { Report } from "./report.js";

// Scenarios
export {
  WEATHER_QUESTION,
  PACKING_QUESTION,
  GET_WEATHER_TOOL,
  PackAdvice,
  getWeather,
  runWeatherScenario,
} from "./scenarios/weather.js";
export type { WeatherReport, WeatherScenarioOptions } from "./scenarios/weather.js";

export {
  RepoSummary,
  EXTRACTION_INSTRUCTIONS,
  extractionPrompt,
  runRepoSummaryScenario,
} from "./scenarios/repo-summary.js";
