import { describe, it, expect } from 'vitest';
import {
  DEFAULT_RUN_CONFIG,
  mergeRunConfig,
  validateRunConfig,
} from '../../src/domain/run-config.js';

describe('mergeRunConfig', () => {
  it('should return the base when no overrides are given', () => {
    expect(mergeRunConfig(DEFAULT_RUN_CONFIG)).toEqual(DEFAULT_RUN_CONFIG);
  });

  it('should merge nested blocks field by field', () => {
    const merged = mergeRunConfig(DEFAULT_RUN_CONFIG, {
      cells: 128,
      state1: { energy: 3.4 },
      domain: { xmax: 20 },
    });
    expect(merged.cells).toBe(128);
    expect(merged.steps).toBe(87);
    expect(merged.state1).toEqual({ density: 0.2, energy: 3.4 });
    expect(merged.domain).toEqual({ xmin: 0, xmax: 20, ymin: 0, ymax: 10 });
    expect(merged.state2).toEqual(DEFAULT_RUN_CONFIG.state2);
  });

  it('should not let undefined override fields clobber the base', () => {
    const merged = mergeRunConfig(DEFAULT_RUN_CONFIG, {
      steps: undefined,
      timestep: { rise: undefined, max: 0.08 },
    });
    expect(merged.steps).toBe(87);
    expect(merged.timestep).toEqual({ initial: 0.04, rise: 1.5, max: 0.08 });
  });

  it('should not mutate the base config', () => {
    mergeRunConfig(DEFAULT_RUN_CONFIG, { state2: { xmax: 4 } });
    expect(DEFAULT_RUN_CONFIG.state2.xmax).toBe(1);
  });
});

describe('validateRunConfig', () => {
  it('should accept the default config', () => {
    const result = validateRunConfig(DEFAULT_RUN_CONFIG);
    expect(result).toEqual({ ok: true, config: DEFAULT_RUN_CONFIG });
  });

  it('should reject non-positive cells', () => {
    const result = validateRunConfig({ ...DEFAULT_RUN_CONFIG, cells: 0 });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.issues).toEqual(['cells: Number must be greater than 0']);
    }
  });

  it('should reject an inverted domain', () => {
    const result = validateRunConfig(
      mergeRunConfig(DEFAULT_RUN_CONFIG, { domain: { xmin: 5, xmax: 5 } })
    );
    expect(result).toEqual({ ok: false, issues: ['domain.xmax: domain xmax must be greater than xmin'] });
  });

  it('should reject an inverted state 2 rectangle', () => {
    const result = validateRunConfig(
      mergeRunConfig(DEFAULT_RUN_CONFIG, { state2: { ymin: 2, ymax: 1 } })
    );
    expect(result).toEqual({
      ok: false,
      issues: ['state2.ymax: state 2 ymax must be greater than ymin'],
    });
  });

  it('should reject a zero visit frequency', () => {
    const result = validateRunConfig({ ...DEFAULT_RUN_CONFIG, visitFrequency: 0 });
    expect(result).toEqual({
      ok: false,
      issues: ['visitFrequency: Number must be greater than or equal to 1'],
    });
  });
});
