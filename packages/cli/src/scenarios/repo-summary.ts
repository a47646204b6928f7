import { z } from "zod";
import {
  defineOutputSchema,
  systemTurn,
  userTurn,
  type ExchangeResult,
  type StructuredData,
  type StructuredExchangeNormalizer,
} from "@structured-exchange/core";

export const RepoSummary = defineOutputSchema("RepoSummary", {
  name: z.string(),
  topics: z.array(z.string()),
  risk_level: z.string(),
});
export type RepoSummary = StructuredData<typeof RepoSummary.schema.shape>;

// JSON mode rejects prompts that never mention JSON
export const EXTRACTION_INSTRUCTIONS =
  "Extract repo info into the schema. Reply with a JSON object.";

export function extractionPrompt(repo: string): string {
  return `Summarize repo: ${repo}. Fields: name, topics[], risk_level.`;
}

/** Single-turn extraction straight into RepoSummary, no tools. */
export function runRepoSummaryScenario(
  normalizer: StructuredExchangeNormalizer,
  repo = "awesome-embeddings"
): Promise<ExchangeResult<RepoSummary>> {
  return normalizer.submit(
    [systemTurn(EXTRACTION_INSTRUCTIONS), userTurn(extractionPrompt(repo))],
    [],
    RepoSummary
  );
}
