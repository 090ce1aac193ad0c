import { describe, it, expect, vi } from 'vitest';
import { mkdtemp, writeFile, rm } from 'fs/promises';
import os from 'os';
import path from 'path';
import { ScreenAnalyzer } from '../screen-analyzer.js';
import { OraclePerception } from '../oracle-perception.js';
import { FileScreenCapture } from '../file-screen-capture.js';
import { describeScreen } from '../describe-screen.js';
import { LoggerStub } from '../../infra/logger.js';
import { err, ok } from '../../types/result.js';
import type { IOracle } from '../../oracle/index.js';
import type { SnapshotImage } from '../../types/index.js';

const image: SnapshotImage = { data: 'AAAA', mimeType: 'image/png' };
const logger = new LoggerStub();

describe('ScreenAnalyzer', () => {
  it('should map the oracle answer onto a screen state', async () => {
    const ask = vi.fn().mockResolvedValue(
      ok(
        JSON.stringify({
          app_name: 'Notepad',
          screen_state: 'editor',
          page_status: 'Loading',
          description: 'Notepad is opening',
          available_elements: ['File menu', 3],
          warnings: null,
        })
      )
    );
    const analyzer = new ScreenAnalyzer({ ask }, logger);

    const result = await analyzer.analyze(image, { goal: 'open Notepad' });

    expect(result).toEqual(
      ok({
        appName: 'Notepad',
        screenType: 'editor',
        pageStatus: 'loading',
        description: 'Notepad is opening',
        elements: ['File menu', '3'],
        suggestedAction: undefined,
        warnings: [],
      })
    );
    const request = ask.mock.calls[0][0];
    expect(request.purpose).toBe('screen-analysis');
    expect(request.images).toEqual([image]);
    expect(request.prompt).toContain('Describe the attached screenshot for someone trying to: open Notepad.');
  });

  it('should treat an unrecognised page status as unknown', async () => {
    const oracle: IOracle = { ask: vi.fn().mockResolvedValue(ok('{"page_status": "busy"}')) };
    const analyzer = new ScreenAnalyzer(oracle, logger);

    const result = await analyzer.analyze(image);

    expect(result.ok && result.value.pageStatus).toBe('unknown');
  });
});

describe('OraclePerception', () => {
  it('should attach the analyzed state to the snapshot', async () => {
    const oracle: IOracle = {
      ask: vi.fn().mockResolvedValue(ok('{"app_name": "Settings", "page_status": "normal"}')),
    };
    const perception = new OraclePerception(
      { capture: vi.fn().mockResolvedValue(image) },
      new ScreenAnalyzer(oracle, logger),
      logger
    );

    const snapshot = await perception.capture();

    expect(snapshot.image).toEqual(image);
    expect(snapshot.state?.appName).toBe('Settings');
    expect(snapshot.id).toMatch(/^snap-/);
  });

  it('should keep the image when analysis fails', async () => {
    const oracle: IOracle = { ask: vi.fn().mockResolvedValue(err({ kind: 'transport', message: 'offline' })) };
    const perception = new OraclePerception(
      { capture: vi.fn().mockResolvedValue(image) },
      new ScreenAnalyzer(oracle, logger),
      logger
    );

    const snapshot = await perception.capture();

    expect(snapshot.image).toEqual(image);
    expect(snapshot.state).toBeUndefined();
  });
});

describe('FileScreenCapture', () => {
  it('should read the screenshot as base64', async () => {
    const dir = await mkdtemp(path.join(os.tmpdir(), 'capture-'));
    const file = path.join(dir, 'latest.png');
    await writeFile(file, Buffer.from('png-bytes'));

    try {
      const captured = await new FileScreenCapture(file).capture();
      expect(captured).toEqual({ data: Buffer.from('png-bytes').toString('base64'), mimeType: 'image/png' });
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });

  it('should refuse formats it cannot label', () => {
    expect(() => new FileScreenCapture('/tmp/screen.bmp')).toThrow('Unsupported screenshot format');
  });
});

describe('describeScreen', () => {
  it('should list warnings when present', () => {
    expect(
      describeScreen({
        appName: 'Edge',
        screenType: 'browser',
        pageStatus: 'dialog',
        description: 'Cookie banner',
        elements: [],
        warnings: ['pop-up'],
      })
    ).toBe('Application: Edge\nScreen: browser (dialog)\nDescription: Cookie banner\nWarnings: pop-up');
  });
});
