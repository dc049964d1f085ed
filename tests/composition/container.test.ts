import fs from 'fs';
import os from 'os';
import path from 'path';
import { buildApplication } from '../../src/composition/container';
import { BenchmarkRunner } from '../../src/app/BenchmarkRunner';
import { readSettings } from '../../src/env';

jest.mock('dotenv', () => ({ config: jest.fn() }));

describe('buildApplication', () => {
  let infoSpy: jest.SpyInstance;
  let warnSpy: jest.SpyInstance;

  beforeEach(() => {
    infoSpy = jest.spyOn(console, 'info').mockImplementation(() => {});
    warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  test('merges config file options under the CLI bin count', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'lapwatch-app-'));
    const configPath = path.join(dir, 'lapwatch.config.json');
    fs.writeFileSync(configPath, JSON.stringify({ histogram: { binCount: 3, clampPercentile: 95 } }));

    const app = buildApplication({ samples: 10, workers: 1, bins: 6, debug: false, configPath });

    expect(app.runner).toBeInstanceOf(BenchmarkRunner);
    expect(app.histogramOptions).toEqual({
      binCount: 6,
      niceRange: true,
      clampMaximum: 0,
      clampPercentile: 95,
    });
    expect(infoSpy).toHaveBeenCalledWith(`Loaded config from ${configPath}`);
  });

  test('keeps the config file bin count when no bin count is given', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'lapwatch-app-'));
    const configPath = path.join(dir, 'lapwatch.config.json');
    fs.writeFileSync(configPath, JSON.stringify({ histogram: { binCount: 3 } }));

    const app = buildApplication(readSettings(['--config', configPath], {}));

    expect(app.histogramOptions.binCount).toBe(3);
  });

  test('warns when the requested config file is missing', () => {
    const app = buildApplication({
      samples: 10,
      workers: 1,
      debug: false,
      configPath: '/tmp/lapwatch-missing-config.json',
    });

    expect(app.histogramOptions.clampPercentile).toBe(99.9);
    expect(warnSpy).toHaveBeenCalledWith(
      'Config file /tmp/lapwatch-missing-config.json not found; proceeding with defaults.'
    );
  });

  test('runs a small benchmark end to end', async () => {
    const app = buildApplication({ samples: 5, workers: 2, bins: 4, debug: false });
    const timer = await app.runner.runConcurrent(2, 5, () => {});

    expect(timer.count).toBe(10);
    expect(timer.histogram(4).count).toBe(10);
    expect(timer.laps().reduce((a, b) => a + b, 0)).toBeLessThanOrEqual(timer.elapsed());
  });
});
