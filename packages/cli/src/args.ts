import { z } from "zod";

const ScenarioSchema = z.enum(["weather", "extract"]);
export type Scenario = z.infer<typeof ScenarioSchema>;

const FlagsSchema = z.object({
  api: z.enum(["chat", "responses"]).optional(),
  mode: z.enum(["weak", "strict"]).optional(),
  model: z.string().min(1).optional(),
  repo: z.string().min(1).optional(),
}).strict();
export type CliFlags = z.infer<typeof FlagsSchema>;

export type ParsedArgs =
  | { kind: "help" }
  | { kind: "version" }
  | { kind: "run"; scenario: Scenario; flags: CliFlags }
  | { kind: "invalid"; message: string };

/**
 * Parses `<scenario> [--api chat|responses] [--mode weak|strict]
 * [--model <id>] [--repo <name>]`. Flags take the form `--name value`
 * or `--name=value`.
 */
export function parseCliArgs(argv: readonly string[]): ParsedArgs {
  const [first, ...rest] = argv;

  if (first === undefined || first === "--help" || first === "-h") {
    return { kind: "help" };
  }
  if (first === "--version" || first === "-V") {
    return { kind: "version" };
  }

  const scenario = ScenarioSchema.safeParse(first);
  if (!scenario.success) {
    return { kind: "invalid", message: `Unknown scenario '${first}'.` };
  }

  const raw: Record<string, string> = {};
  for (let i = 0; i < rest.length; i++) {
    const token = rest[i] ?? "";
    if (!token.startsWith("--")) {
      return { kind: "invalid", message: `Unexpected argument '${token}'.` };
    }
    const eq = token.indexOf("=");
    if (eq !== -1) {
      raw[token.slice(2, eq)] = token.slice(eq + 1);
      continue;
    }
    const value = rest[i + 1];
    if (value === undefined || value.startsWith("--")) {
      return { kind: "invalid", message: `Missing value for '${token}'.` };
    }
    raw[token.slice(2)] = value;
    i++;
  }

  const flags = FlagsSchema.safeParse(raw);
  if (!flags.success) {
    const issues = flags.error.issues
      .map((i) => (i.path.length > 0 ? `--${i.path.join(".")}: ${i.message}` : i.message))
      .join("; ");
    return { kind: "invalid", message: issues };
  }

  return { kind: "run", scenario: scenario.data, flags: flags.data };
}
