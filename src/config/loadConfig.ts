import type { Config, OutputFormat } from "../types.js";
import { defaultConfig } from "./defaults.js";

export interface CliOverrides {
  format?: string;
  verify?: boolean;
}

function parseOutputFormat(value: string): OutputFormat {
  if (value === "json" || value === "html") return value;
  throw new Error(`Unsupported output format "${value}" (expected json or html)`);
}

export function parseKindLabels(value: string | undefined): Map<number, string> {
  const labels = new Map<number, string>();
  if (!value) return labels;

  for (const entry of value.split(",")) {
    if (!entry.trim()) continue;
    const separator = entry.indexOf("=");
    const kind = separator > 0 ? Number(entry.slice(0, separator).trim()) : NaN;
    const label = entry.slice(separator + 1).trim();
    if (!Number.isInteger(kind) || kind < 0 || !label) {
      console.warn(`Ignoring malformed kind label "${entry.trim()}"`);
      continue;
    }
    labels.set(kind, label);
  }
  return labels;
}

export function loadConfig(cli: CliOverrides = {}, env: NodeJS.ProcessEnv = process.env): Config {
  // CLI flags win over the environment, which wins over the defaults.
  const format = parseOutputFormat(cli.format || env.OUTPUT_FORMAT || defaultConfig.output.format);

  const verifyEnv = env.VERIFY_SIGNATURES?.trim().toLowerCase();
  const verify =
    cli.verify ??
    (verifyEnv ? verifyEnv !== "false" && verifyEnv !== "0" : defaultConfig.verify_signatures);

  const summaryMaxLength = env.SUMMARY_MAX_LENGTH
    ? Number(env.SUMMARY_MAX_LENGTH)
    : defaultConfig.render.summary_max_length;
  if (!Number.isInteger(summaryMaxLength) || summaryMaxLength <= 0) {
    throw new Error("SUMMARY_MAX_LENGTH must be a positive integer");
  }

  return {
    ...defaultConfig,
    kinds: {
      extra_labels: parseKindLabels(env.EXTRA_KIND_LABELS)
    },
    verify_signatures: verify,
    render: {
      ...defaultConfig.render,
      summary_max_length: summaryMaxLength
    },
    output: {
      format
    }
  };
}
