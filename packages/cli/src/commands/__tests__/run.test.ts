import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { parseThreshold, resolveSettings, runCommand } from '../run';

describe('parseThreshold', () => {
  it('accepts percentages', () => {
    expect(parseThreshold('80')).toBe(80);
    expect(parseThreshold('79.5')).toBe(79.5);
  });

  it('rejects values outside 0-100 or not numeric', () => {
    expect(() => parseThreshold('101')).toThrow('--threshold must be a percentage between 0 and 100, got "101"');
    expect(() => parseThreshold('abc')).toThrow('got "abc"');
    expect(() => parseThreshold(' ')).toThrow('got " "');
  });
});

describe('runCommand', () => {
  let tmpDir: string;
  let referencePath: string;
  let candidatePath: string;
  let outputPath: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'aspect-audit-cli-'));
    referencePath = path.join(tmpDir, 'reference.csv');
    candidatePath = path.join(tmpDir, 'candidate.csv');
    outputPath = path.join(tmpDir, 'results.csv');
    fs.writeFileSync(referencePath, 'Review_ID,Reference_Aspect\nR1,"Comfort, Durability"\nR2,Style\n', 'utf-8');
    fs.writeFileSync(candidatePath, 'Review_ID,Aspect\n"R1,Comfort"\n"R1,Durability"\n"R2,Value/Price"\n', 'utf-8');
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('runs the audit with a threshold override and returns the summary', async () => {
    const summary = await runCommand(referencePath, candidatePath, outputPath, { threshold: '60' });

    // R1: perfect, R2: no overlap -> tp 2, fn 1, fp 1
    expect(summary.totalTp).toBe(2);
    expect(summary.totalFn).toBe(1);
    expect(summary.totalFp).toBe(1);
    expect(summary.microF1).toBeCloseTo(200 / 3, 10);
    expect(summary.macroF1).toBe(50);
    expect(summary.threshold).toBe(60);
    expect(summary.decision).toBe('pass');
    expect(fs.existsSync(outputPath)).toBe(true);
  });

  it('finishes normally when the decision is a fail', async () => {
    const summary = await runCommand(referencePath, candidatePath, outputPath, {});

    expect(summary.decision).toBe('fail');
    expect(summary.worstCases).toEqual([
      { reviewId: 'R2', f1: '0.000', detail: 'Missed: Color/Aesthetics | Extra: Value/Price' },
    ]);
  });

  it('exits with code 1 when the audit cannot run', async () => {
    const exitSpy = vi.spyOn(process, 'exit').mockImplementation(() => {
      throw new Error('process.exit');
    });

    await expect(
      runCommand(path.join(tmpDir, 'missing.csv'), candidatePath, outputPath, {})
    ).rejects.toThrow('process.exit');
    expect(exitSpy).toHaveBeenCalledWith(1);
  });
});

describe('resolveSettings', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'aspect-audit-settings-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('lets the threshold flag override the config file', () => {
    const configPath = path.join(tmpDir, 'audit.yaml');
    fs.writeFileSync(configPath, 'schemaVersion: "1.0.0"\nthreshold: 70\nworstCases:\n  limit: 2\n', 'utf-8');

    const settings = resolveSettings({ config: configPath, threshold: '85' });

    expect(settings.threshold).toBe(85);
    expect(settings.worstCaseLimit).toBe(2);
  });

  it('throws for a config path that does not exist', () => {
    expect(() => resolveSettings({ config: path.join(tmpDir, 'nope.yaml') })).toThrow(
      `Config file not found: ${path.join(tmpDir, 'nope.yaml')}`
    );
  });
});
