import { config } from "dotenv";

config();

export interface Settings {
  samples: number;
  workers: number;
  /** Histogram bin count; unset leaves the config file's value in place. */
  bins?: number;
  debug: boolean;
  configPath?: string;
  logFile?: string;
}

function parsePositiveInt(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : undefined;
}

function positiveInt(value: string | undefined, fallback: number): number {
  return parsePositiveInt(value) ?? fallback;
}

export function readSettings(argv: string[], env: NodeJS.ProcessEnv): Settings {
  const settings: Settings = {
    samples: positiveInt(env.LAPWATCH_SAMPLES, 1000),
    workers: positiveInt(env.LAPWATCH_WORKERS, 4),
    debug: env.LAPWATCH_DEBUG === "true",
  };
  const bins = parsePositiveInt(env.LAPWATCH_BINS);
  if (bins !== undefined) settings.bins = bins;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case "--samples":
        settings.samples = positiveInt(argv[++i], settings.samples);
        break;
      case "--workers":
        settings.workers = positiveInt(argv[++i], settings.workers);
        break;
      case "--bins":
        settings.bins = parsePositiveInt(argv[++i]) ?? settings.bins;
        break;
      case "--config":
        if (argv[i + 1]) {
          settings.configPath = argv[++i];
        }
        break;
      case "--log-file":
        if (argv[i + 1]) {
          settings.logFile = argv[++i];
        }
        break;
      case "--debug":
        settings.debug = true;
        break;
      case "--no-debug":
        settings.debug = false;
        break;
      default:
        break;
    }
  }

  return settings;
}

export const SETTINGS = readSettings(process.argv.slice(2), process.env);
