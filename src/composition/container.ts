import { ConsoleLogger } from "../adapters/sys/ConsoleLogger";
import { defaultClock } from "../adapters/sys/HrtimeClock";
import { BenchmarkRunner } from "../app/BenchmarkRunner";
import { loadConfig, resolveHistogramOptions } from "../config";
import type { HistogramOptions } from "../domain/histogram/HistogramOptions";
import type { Settings } from "../env";
import type { LoggerPort } from "../ports/sys/LoggerPort";

export interface ApplicationInstance {
  readonly logger: LoggerPort;
  readonly runner: BenchmarkRunner;
  readonly histogramOptions: HistogramOptions;
}

export function buildApplication(settings: Settings): ApplicationInstance {
  const logger = new ConsoleLogger({ level: settings.debug ? "debug" : "info" });
  const { config: appConfig, path: configPath } = loadConfig(settings.configPath);
  if (configPath) {
    logger.info(`Loaded config from ${configPath}`);
  } else if (settings.configPath) {
    logger.warn(`Config file ${settings.configPath} not found; proceeding with defaults.`);
  }

  const histogramOptions = resolveHistogramOptions(
    appConfig,
    settings.bins === undefined ? {} : { binCount: settings.bins }
  );
  const runner = new BenchmarkRunner({
    clock: defaultClock(),
    logger,
    histogramDefaults: histogramOptions,
  });

  return { logger, runner, histogramOptions };
}
