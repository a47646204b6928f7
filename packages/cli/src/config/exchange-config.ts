import { z } from "zod";
import { readFile, access } from "node:fs/promises";
import { resolve } from "node:path";
import matter from "gray-matter";

export const ExchangeConfigSchema = z.object({
  // Which calling convention of the hosted API to use
  api: z.enum(["chat", "responses"]).default("responses"),
  model: z.string().min(1).default("gpt-4o-mini"),
  // Only the chat API lets the caller choose; responses is always strict
  schemaMode: z.enum(["weak", "strict"]).default("weak"),
  apiKeyEnv: z.string().min(1).default("OPENAI_API_KEY"),
  baseURL: z.string().url().optional(),
  maxToolRounds: z.number().int().positive().default(4),
}).strict();

export type ExchangeConfig = z.infer<typeof ExchangeConfigSchema>;
export type ExchangeConfigInput = z.input<typeof ExchangeConfigSchema>;

/**
 * defineConfig() validates settings and fills defaults. Fails fast before
 * any request is made.
 *
 * @example
 * const config = defineConfig({ api: "chat", schemaMode: "strict" });
 */
export function defineConfig(input: ExchangeConfigInput = {}): ExchangeConfig {
  return ExchangeConfigSchema.parse(input);
}

export const FileConfigSchema = z.object({
  api: z.enum(["chat", "responses"]).optional(),
  model: z.string().min(1).optional(),
  schema_mode: z.enum(["weak", "strict"]).optional(),
  api_key_env: z.string().min(1).optional(),
  base_url: z.string().url().optional(),
  max_tool_rounds: z.number().int().positive().optional(),
}).strict();

export type FileConfig = z.infer<typeof FileConfigSchema>;

/**
 * Loads and validates .exchange/config.yaml from the project root.
 * Returns undefined if the file does not exist (it is optional).
 * Throws on parse or validation failure.
 */
export async function loadFileConfig(
  projectRoot: string
): Promise<FileConfig | undefined> {
  const configPath = resolve(projectRoot, ".exchange", "config.yaml");

  try {
    await access(configPath);
  } catch {
    return undefined;
  }

  const content = await readFile(configPath, "utf-8");

  let raw: unknown;
  try {
    // gray-matter parses a bare YAML document once it is fenced as frontmatter
    raw = matter(`---\n${content}\n---`).data;
  } catch (err) {
    throw new Error(
      `Failed to parse .exchange/config.yaml: ${err instanceof Error ? err.message : String(err)}`
    );
  }

  const result = FileConfigSchema.safeParse(raw);

  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `${i.path.length > 0 ? i.path.join(".") : "(root)"}: ${i.message}`)
      .join("; ");
    throw new Error(`Invalid .exchange/config.yaml: ${issues}`);
  }

  return result.data;
}

/** Defaults, then .exchange/config.yaml, then explicit overrides. */
export async function resolveConfig(
  projectRoot: string,
  overrides: ExchangeConfigInput = {}
): Promise<ExchangeConfig> {
  const file = await loadFileConfig(projectRoot);

  return defineConfig({
    ...(file?.api !== undefined ? { api: file.api } : {}),
    ...(file?.model !== undefined ? { model: file.model } : {}),
    ...(file?.schema_mode !== undefined ? { schemaMode: file.schema_mode } : {}),
    ...(file?.api_key_env !== undefined ? { apiKeyEnv: file.api_key_env } : {}),
    ...(file?.base_url !== undefined ? { baseURL: file.base_url } : {}),
    ...(file?.max_tool_rounds !== undefined ? { maxToolRounds: file.max_tool_rounds } : {}),
    ...overrides,
  });
}
