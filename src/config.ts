import fs from "fs";
import path from "path";
import {
  DEFAULT_HISTOGRAM_OPTIONS,
  type HistogramOptions,
} from "./domain/histogram/HistogramOptions";

export interface AppConfig {
  histogram?: Partial<HistogramOptions>;
}

const DEFAULT_CONFIG_FILENAMES = ["lapwatch.config.json"];

export interface LoadedConfig {
  config: AppConfig;
  path?: string;
}

export function loadConfig(configPath?: string): LoadedConfig {
  const searchPaths = configPath
    ? [configPath]
    : DEFAULT_CONFIG_FILENAMES.map((name) => path.resolve(process.cwd(), name));

  for (const candidate of searchPaths) {
    try {
      const resolved = path.resolve(candidate);
      if (!fs.existsSync(resolved)) continue;
      const raw = fs.readFileSync(resolved, "utf8");
      const parsed: unknown = JSON.parse(raw);
      if (!isRecord(parsed)) {
        console.warn(`Ignoring config ${resolved}: expected a JSON object.`);
        continue;
      }

      const config: AppConfig = {};
      if (parsed.histogram !== undefined) {
        config.histogram = normalizeHistogram(parsed.histogram);
      }
      return { config, path: resolved };
    } catch (err) {
      console.warn(`Failed to load config from ${candidate}:`, err);
    }
  }

  return { config: {} };
}

export function resolveHistogramOptions(
  config: AppConfig,
  overrides: Partial<HistogramOptions> = {}
): HistogramOptions {
  return { ...DEFAULT_HISTOGRAM_OPTIONS, ...config.histogram, ...overrides };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function normalizeHistogram(input: unknown): Partial<HistogramOptions> {
  const out: Partial<HistogramOptions> = {};
  if (!isRecord(input)) {
    console.warn('Invalid "histogram" configuration; expected an object.');
    return out;
  }

  for (const [key, value] of Object.entries(input)) {
    switch (key) {
      case "binCount":
        if (typeof value === "number" && Number.isInteger(value) && value > 0) {
          out.binCount = value;
          continue;
        }
        break;
      case "niceRange":
        if (typeof value === "boolean") {
          out.niceRange = value;
          continue;
        }
        break;
      case "clampMaximum":
        if (typeof value === "number" && value >= 0) {
          out.clampMaximum = value;
          continue;
        }
        break;
      case "clampPercentile":
        if (typeof value === "number" && value >= 0 && value < 100) {
          out.clampPercentile = value;
          continue;
        }
        break;
    }
    console.warn(`Invalid histogram option "${key}"; ignoring.`);
  }

  return out;
}
