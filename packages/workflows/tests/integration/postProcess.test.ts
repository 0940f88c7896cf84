import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdtempSync, readFileSync, realpathSync, rmSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { createShellPostProcessor } from '../../src/simulation/postProcess.js';

describe('createShellPostProcessor', () => {
  let dir: string;

  beforeEach(() => {
    dir = realpathSync(mkdtempSync(join(tmpdir(), 'cloverrun-post-')));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should run in the configured directory with the iteration in its environment', async () => {
    const post = createShellPostProcessor(
      'printf "%s %s" "$CLOVERRUN_ITERATION" "$CLOVERRUN_ITERATION_DIR" > seen.txt',
      { cwd: dir }
    );

    const outcome = await post.run({ iteration: 4, iterationDir: '/data/iteration_4' });

    expect(outcome).toEqual({ ok: true, value: undefined });
    expect(readFileSync(join(dir, 'seen.txt'), 'utf8')).toBe('4 /data/iteration_4');
  });

  it('should report a failing command without throwing', async () => {
    const post = createShellPostProcessor('echo "no display" >&2; exit 3', { cwd: dir });

    const outcome = await post.run({ iteration: 2, iterationDir: dir });

    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.errorCode).toBe('POST_PROCESS_FAILED');
      expect(outcome.errorMessage).toMatch(/^Post-processing command failed for iteration 2: /);
      expect(outcome.errorMessage).toContain('no display');
    }
  });

  it('should keep the command for reporting', () => {
    expect(createShellPostProcessor('make plots', { cwd: dir }).command).toBe('make plots');
  });
});
