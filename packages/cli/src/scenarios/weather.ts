import { z } from "zod";
import { Type } from "@sinclair/typebox";
import {
  defineOutputSchema,
  defineTool,
  runExchange,
  userTurn,
  type ExchangeOutcome,
  type ExchangePhase,
  type StructuredData,
  type StructuredExchangeNormalizer,
  type ToolHandler,
} from "@structured-exchange/core";

export const WEATHER_QUESTION = "What's the weather in Paris today?";
export const PACKING_QUESTION = "Great, should I pack an umbrella? Return JSON only.";

export const GET_WEATHER_TOOL = defineTool({
  name: "get_weather",
  description: "Get current weather by city.",
  parameters: Type.Object(
    { city: Type.String({ description: "City name, e.g. Paris" }) },
    { additionalProperties: false }
  ),
});

export const PackAdvice = defineOutputSchema("PackAdvice", {
  umbrella: z.boolean(),
  rationale: z.string(),
});
export type PackAdvice = StructuredData<typeof PackAdvice.schema.shape>;

export interface WeatherReport {
  city: string;
  temp_c: number;
  condition: string;
}

// Stand-in for a weather service: same reading for every city.
export const getWeather: ToolHandler = (args): WeatherReport => {
  const city = args["city"];
  if (typeof city !== "string") {
    throw new Error("get_weather expects a string 'city'");
  }
  return { city, temp_c: 17, condition: "rain" };
};

export interface WeatherScenarioOptions {
  maxToolRounds?: number | undefined;
  onPhaseChange?: ((phase: ExchangePhase) => void) | undefined;
}

/**
 * Turn 1 lets the model call get_weather; the tool result and the packing
 * question then go back with PackAdvice enforced.
 */
export function runWeatherScenario(
  normalizer: StructuredExchangeNormalizer,
  options: WeatherScenarioOptions = {}
): Promise<ExchangeOutcome<PackAdvice>> {
  return runExchange([userTurn(WEATHER_QUESTION)], {
    normalizer,
    tools: [GET_WEATHER_TOOL],
    handlers: new Map([[GET_WEATHER_TOOL.name, getWeather]]),
    followUp: () => userTurn(PACKING_QUESTION),
    outputSchema: PackAdvice,
    deferOutputSchema: true,
    maxToolRounds: options.maxToolRounds,
    onPhaseChange: options.onPhaseChange,
  });
}
