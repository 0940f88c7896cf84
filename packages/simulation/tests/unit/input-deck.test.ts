/**
 * Unit tests for input deck rendering and parsing
 */

import { describe, it, expect } from 'vitest';
import { DEFAULT_RUN_CONFIG, mergeRunConfig } from '@cloverrun/core';
import { ValidationError } from '@cloverrun/utils';
import {
  formatDeckNumber,
  parseInputDeck,
  renderInputDeck,
} from '../../src/deck/input-deck.js';

const DEFAULT_DECK = [
  '*clover',
  '',
  ' state 1 density=0.2 energy=1.0',
  ' state 2 density=1.0 energy=2.5 geometry=rectangle xmin=0.0 xmax=1.0 ymin=0.0 ymax=1.0',
  '',
  ' x_cells=64',
  ' y_cells=64',
  '',
  ' xmin=0.0',
  ' ymin=0.0',
  ' xmax=10.0',
  ' ymax=10.0',
  '',
  ' initial_timestep=0.04',
  ' timestep_rise=1.5',
  ' max_timestep=0.04',
  ' end_step=87',
  ' test_problem 2',
  '',
  ' visit_frequency=5',
  '',
  '*endclover',
  '',
].join('\n');

describe('formatDeckNumber', () => {
  it('should keep one decimal place on whole numbers', () => {
    expect(formatDeckNumber(10)).toBe('10.0');
    expect(formatDeckNumber(0)).toBe('0.0');
  });

  it('should print fractional values as-is', () => {
    expect(formatDeckNumber(0.04)).toBe('0.04');
    expect(formatDeckNumber(2.5)).toBe('2.5');
  });

  it('should reject non-finite values', () => {
    expect(() => formatDeckNumber(Number.NaN)).toThrow(ValidationError);
  });
});

describe('renderInputDeck', () => {
  it('should render the default config exactly', () => {
    expect(renderInputDeck(DEFAULT_RUN_CONFIG)).toBe(DEFAULT_DECK);
  });

  it('should write the grid size to both axes', () => {
    const text = renderInputDeck(mergeRunConfig(DEFAULT_RUN_CONFIG, { cells: 128, steps: 10 }));
    const lines = text.split('\n');
    expect(lines.filter((l) => l === ' x_cells=128')).toHaveLength(1);
    expect(lines.filter((l) => l === ' y_cells=128')).toHaveLength(1);
    expect(lines).toContain(' end_step=10');
  });
});

describe('parseInputDeck', () => {
  it('should read a rendered deck back', () => {
    const { config, extras } = parseInputDeck(DEFAULT_DECK);
    expect(config).toEqual(DEFAULT_RUN_CONFIG);
    expect(extras).toEqual({});
  });

  it('should accept spaces around equals signs, comments and unknown fields', () => {
    const text = DEFAULT_DECK.replace(' end_step=87', ' end_step = 20\n ! halfway\n tiles_per_chunk=4');
    const { config, extras } = parseInputDeck(text);
    expect(config.steps).toBe(20);
    expect(extras).toEqual({ tiles_per_chunk: '4' });
  });

  it('should reject text without the block markers', () => {
    expect(() => parseInputDeck(' x_cells=10\n')).toThrow(
      'Deck must be enclosed in *clover ... *endclover'
    );
  });

  it('should reject mismatched cell counts', () => {
    const text = DEFAULT_DECK.replace(' y_cells=64', ' y_cells=32');
    expect(() => parseInputDeck(text)).toThrow('x_cells (64) and y_cells (32) must match');
  });

  it('should reject a missing field', () => {
    const text = DEFAULT_DECK.replace(' max_timestep=0.04\n', '');
    expect(() => parseInputDeck(text)).toThrow('Deck is missing max_timestep');
  });

  it('should reject a non-numeric value', () => {
    const text = DEFAULT_DECK.replace(' end_step=87', ' end_step=lots');
    expect(() => parseInputDeck(text)).toThrow('Invalid number for end_step on line 17: lots');
  });

  it('should reject an unsupported geometry', () => {
    const text = DEFAULT_DECK.replace('geometry=rectangle', 'geometry=circle');
    expect(() => parseInputDeck(text)).toThrow('Unsupported state 2 geometry: circle');
  });

  it('should reject a deck describing an invalid run', () => {
    const text = DEFAULT_DECK.replace(' xmax=10.0', ' xmax=-1.0');
    expect(() => parseInputDeck(text)).toThrow(
      'Deck describes an invalid run: domain.xmax: domain xmax must be greater than xmin'
    );
  });
});
