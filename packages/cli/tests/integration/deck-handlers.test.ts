/**
 * Integration tests for the deck handlers against a temporary directory
 */

import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { DEFAULT_RUN_CONFIG } from '@cloverrun/core';
import { DECK_END, renderInputDeck } from '@cloverrun/simulation';
import { NotFoundError, ValidationError } from '@cloverrun/utils';
import { CommandContext } from '../../src/core/command-context.js';
import { generateDeckSchema, parseDeckSchema } from '../../src/command-defs/deck.js';
import { generateDeckHandler } from '../../src/handlers/deck/generate-deck.js';
import { parseDeckHandler } from '../../src/handlers/deck/parse-deck.js';
import { flattenRunConfig } from '../../src/handlers/deck/deck-fields.js';
import { createFakeProject } from '../../../../tests/helpers/fake-clover.js';

describe('deck handlers', () => {
  let dir: string;
  const ctx = new CommandContext({ env: {} });

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'cloverrun-deck-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  describe('generateDeckHandler', () => {
    it('should write the default deck in fixed mode', async () => {
      const file = join(dir, 'decks', 'clover.in');

      const result = await generateDeckHandler(generateDeckSchema.parse({ file, fixed: true }), ctx);

      expect(result).toEqual({
        path: file,
        mode: 'fixed',
        seed: undefined,
        ...flattenRunConfig(DEFAULT_RUN_CONFIG),
      });
      expect(readFileSync(file, 'utf8')).toBe(renderInputDeck(DEFAULT_RUN_CONFIG));
    });

    it('should reproduce a randomized deck from its seed', async () => {
      const first = join(dir, 'a.in');
      const second = join(dir, 'b.in');

      const a = await generateDeckHandler(generateDeckSchema.parse({ file: first, seed: 7 }), ctx);
      const b = await generateDeckHandler(generateDeckSchema.parse({ file: second, seed: 7 }), ctx);

      expect(a.mode).toBe('randomized');
      expect(a.seed).toBe(7);
      expect({ ...a, path: '' }).toEqual({ ...b, path: '' });
      expect(readFileSync(first, 'utf8')).toBe(readFileSync(second, 'utf8'));
    });

    it('should keep pinned fields when randomizing', async () => {
      const file = join(dir, 'pinned.in');

      const result = await generateDeckHandler(
        generateDeckSchema.parse({ file, seed: 3, density1: 0.5, cells: 32, steps: 12 }),
        ctx
      );

      expect(result.density1).toBe(0.5);
      expect(result.cells).toBe(32);
      expect(result.steps).toBe(12);
    });

    it('should write into the binary directory when no file is given', async () => {
      const project = createFakeProject({ withBinary: false });
      try {
        const result = await generateDeckHandler(
          generateDeckSchema.parse({ fixed: true, baseDir: project.baseDir }),
          ctx
        );

        expect(result.path).toBe(join(project.binaryDir, 'clover.in'));
        expect(existsSync(result.path)).toBe(true);
      } finally {
        rmSync(project.baseDir, { recursive: true, force: true });
      }
    });
  });

  describe('parseDeckHandler', () => {
    it('should read back what generate wrote', async () => {
      const file = join(dir, 'clover.in');
      const generated = await generateDeckHandler(generateDeckSchema.parse({ file, seed: 11 }), ctx);

      const parsed = await parseDeckHandler(parseDeckSchema.parse({ file }), ctx);

      expect(parsed).toEqual({ ...generated, mode: undefined, seed: undefined });
    });

    it('should report fields the runner does not model as extras', async () => {
      const file = join(dir, 'clover.in');
      writeFileSync(
        file,
        renderInputDeck(DEFAULT_RUN_CONFIG).replace(DECK_END, ` tiles_per_chunk=1\n${DECK_END}`)
      );

      const parsed = await parseDeckHandler(parseDeckSchema.parse({ file }), ctx);

      expect(parsed.extras).toEqual({ tiles_per_chunk: '1' });
      expect(parsed.cells).toBe(64);
    });

    it('should reject a missing deck', async () => {
      const file = join(dir, 'missing.in');

      await expect(parseDeckHandler(parseDeckSchema.parse({ file }), ctx)).rejects.toThrow(
        NotFoundError
      );
    });

    it('should reject a deck without its enclosing block', async () => {
      const file = join(dir, 'broken.in');
      writeFileSync(file, ' x_cells=10\n');

      await expect(parseDeckHandler(parseDeckSchema.parse({ file }), ctx)).rejects.toThrow(
        ValidationError
      );
    });
  });
});
