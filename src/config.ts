import { z } from "zod";
import {
  ALIGNMENTS,
  DEFAULT_BACKGROUND,
  DEFAULT_EXTENSIONS,
  DEFAULT_OUTPUT_FORMAT,
  ENV_BACKGROUND,
  ENV_EXTENSIONS,
  ENV_FORMAT,
  OUTPUT_FORMATS,
} from "./constants.js";
import { invalidInput } from "./errors.js";
import { normalizeExtension, parseColor } from "./utils.js";
import type { StitcherConfig } from "./types.js";

const EnvSchema = z.object({
  [ENV_BACKGROUND]: z.string().min(1).optional(),
  [ENV_EXTENSIONS]: z.string().min(1).optional(),
  [ENV_FORMAT]: z.enum(OUTPUT_FORMATS).optional(),
});

export const ConfigOverridesSchema = z.object({
  background: z.string().min(1, "Background colour cannot be empty").optional(),
  extensions: z.array(z.string().min(1)).min(1, "At least one extension is required").optional(),
  format: z.enum(OUTPUT_FORMATS).optional(),
  align: z.enum(ALIGNMENTS).optional(),
});

export type ConfigOverrides = z.infer<typeof ConfigOverridesSchema>;

export function parseExtensionList(value: string): string[] {
  const extensions = value
    .split(",")
    .map((e) => e.trim())
    .filter((e) => e.length > 0)
    .map(normalizeExtension);
  if (extensions.length === 0) {
    throw invalidInput(`Extension list "${value}" contains no extensions`);
  }
  return extensions;
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join(".") || "value"}: ${i.message}`).join("; ");
}

/**
 * Layers per-call overrides (CLI flags or MCP tool arguments) over a
 * resolved configuration.
 */
export function applyOverrides(base: StitcherConfig, overrides: ConfigOverrides = {}): StitcherConfig {
  const parsed = ConfigOverridesSchema.safeParse(overrides);
  if (!parsed.success) {
    throw invalidInput(`Invalid options: ${formatIssues(parsed.error)}`);
  }
  const opts = parsed.data;

  return {
    background: opts.background ? parseColor(opts.background) : { ...base.background },
    extensions: opts.extensions ? opts.extensions.map(normalizeExtension) : [...base.extensions],
    format: opts.format ?? base.format,
    align: opts.align ?? base.align,
  };
}

/**
 * Resolves the startup configuration: defaults, then environment, then the
 * overrides passed in.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: ConfigOverrides = {}
): StitcherConfig {
  const parsedEnv = EnvSchema.safeParse({
    [ENV_BACKGROUND]: env[ENV_BACKGROUND] || undefined,
    [ENV_EXTENSIONS]: env[ENV_EXTENSIONS] || undefined,
    [ENV_FORMAT]: env[ENV_FORMAT] || undefined,
  });
  if (!parsedEnv.success) {
    throw invalidInput(`Invalid environment configuration: ${formatIssues(parsedEnv.error)}`);
  }

  const envBackground = parsedEnv.data[ENV_BACKGROUND];
  const envExtensions = parsedEnv.data[ENV_EXTENSIONS];
  const envFormat = parsedEnv.data[ENV_FORMAT];

  const base: StitcherConfig = {
    background: envBackground ? parseColor(envBackground) : { ...DEFAULT_BACKGROUND },
    extensions: envExtensions ? parseExtensionList(envExtensions) : [...DEFAULT_EXTENSIONS],
    format: envFormat ?? DEFAULT_OUTPUT_FORMAT,
    align: "start",
  };

  return applyOverrides(base, overrides);
}
