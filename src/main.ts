import { createHash } from "crypto";
import { renderHistogram } from "./app/HistogramRenderer";
import { buildApplication } from "./composition/container";
import { SETTINGS } from "./env";
import { initializeLogging } from "./runtime/logging";

const payload = Buffer.alloc(1024, 7);

function hashPayload() {
  createHash("sha256").update(payload).digest();
}

async function main() {
  const loggingHandle = initializeLogging(SETTINGS.logFile);
  if (loggingHandle.logPath) {
    console.log(`Logging output to ${loggingHandle.logPath}`);
  }

  try {
    const app = buildApplication(SETTINGS);
    const timer = await app.runner.runConcurrent(SETTINGS.workers, SETTINGS.samples, hashPayload);
    console.log(renderHistogram(timer.histogram(app.histogramOptions.binCount)));
  } finally {
    await loggingHandle.shutdown();
  }
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
