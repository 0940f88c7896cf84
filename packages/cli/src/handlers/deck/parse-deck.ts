/**
 * Handler for `deck parse`: read a deck back into its fields.
 */

import { existsSync } from 'fs';
import { readFile } from 'fs/promises';
import { resolve } from 'path';
import { parseInputDeck } from '@cloverrun/simulation';
import { FilesystemError, NotFoundError, errorMessage } from '@cloverrun/utils';
import type { CommandContext } from '../../core/command-context.js';
import type { ParseDeckArgs } from '../../command-defs/deck.js';
import { flattenRunConfig } from './deck-fields.js';

export async function parseDeckHandler(
  args: ParseDeckArgs,
  _ctx: CommandContext
): Promise<Record<string, unknown>> {
  const path = resolve(args.file);
  if (!existsSync(path)) {
    throw new NotFoundError('Input deck', path);
  }

  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (error) {
    throw new FilesystemError(`Failed to read ${path}: ${errorMessage(error)}`, path, 'read');
  }

  const { config, extras } = parseInputDeck(text);
  const result: Record<string, unknown> = { path, ...flattenRunConfig(config) };
  if (Object.keys(extras).length > 0) {
    result.extras = extras;
  }
  return result;
}
