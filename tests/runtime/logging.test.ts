import fs from 'fs';
import os from 'os';
import path from 'path';
import { initializeLogging } from '../../src/runtime/logging';

describe('initializeLogging', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  test('is a no-op without a log file', async () => {
    const handle = initializeLogging();
    expect(handle.logPath).toBeUndefined();
    await expect(handle.shutdown()).resolves.toBeUndefined();
  });

  test('mirrors console output into the log file until shutdown', async () => {
    jest.spyOn(console, 'info').mockImplementation(() => {});
    jest.spyOn(console, 'error').mockImplementation(() => {});
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'lapwatch-log-'));
    const logFile = path.join(dir, 'nested', 'run.log');

    const handle = initializeLogging(logFile);
    expect(handle.logPath).toBe(logFile);
    console.info('hello', { laps: 3 });
    console.error('bad');
    await handle.shutdown();
    console.info('after shutdown');

    const lines = fs.readFileSync(logFile, 'utf8').trimEnd().split('\n');
    expect(lines).toHaveLength(4);
    expect(lines[0]).toMatch(/^\[\S+\] --- lapwatch session started ---$/);
    expect(lines[1]).toMatch(/^\[\S+\] INFO hello \{"laps":3\}$/);
    expect(lines[2]).toMatch(/^\[\S+\] ERROR bad$/);
    expect(lines[3]).toMatch(/^\[\S+\] --- lapwatch session ended ---$/);
  });

  test('reports an unwritable log file through shutdown instead of crashing', async () => {
    const errorSpy = jest.spyOn(console, 'error').mockImplementation(() => {});
    jest.spyOn(console, 'info').mockImplementation(() => {});
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'lapwatch-log-'));

    const handle = initializeLogging(dir);
    console.info('still printed');

    await expect(handle.shutdown()).rejects.toMatchObject({ code: 'EISDIR' });
    expect(errorSpy).toHaveBeenCalledWith(
      expect.stringContaining(`Log file ${dir} is not writable: EISDIR`)
    );
    await expect(handle.shutdown()).rejects.toMatchObject({ code: 'EISDIR' });
  });
});
