/**
 * Input deck grammar
 *
 * The binary parses clover.in by keyword inside a `*clover ... *endclover`
 * block. Line layout, keyword spelling and the leading space on every field
 * line are reproduced exactly.
 */

import { ValidationError } from '@cloverrun/utils';
import { validateRunConfig, type RunConfig } from '@cloverrun/core';

export const DECK_BEGIN = '*clover';
export const DECK_END = '*endclover';

/**
 * Render a real value the way the deck expects: whole numbers keep one
 * decimal place (10 → "10.0"), everything else prints as-is (0.04 → "0.04").
 */
export function formatDeckNumber(value: number): string {
  if (!Number.isFinite(value)) {
    throw new ValidationError(`Deck values must be finite, got ${value}`, { value });
  }
  return Number.isInteger(value) ? value.toFixed(1) : String(value);
}

/**
 * Render a RunConfig as input deck text
 */
export function renderInputDeck(config: RunConfig): string {
  const n = formatDeckNumber;
  const { state1, state2, domain, timestep } = config;

  const lines = [
    DECK_BEGIN,
    '',
    ` state 1 density=${n(state1.density)} energy=${n(state1.energy)}`,
    ` state 2 density=${n(state2.density)} energy=${n(state2.energy)} geometry=${state2.geometry} xmin=${n(state2.xmin)} xmax=${n(state2.xmax)} ymin=${n(state2.ymin)} ymax=${n(state2.ymax)}`,
    '',
    ` x_cells=${config.cells}`,
    ` y_cells=${config.cells}`,
    '',
    ` xmin=${n(domain.xmin)}`,
    ` ymin=${n(domain.ymin)}`,
    ` xmax=${n(domain.xmax)}`,
    ` ymax=${n(domain.ymax)}`,
    '',
    ` initial_timestep=${n(timestep.initial)}`,
    ` timestep_rise=${n(timestep.rise)}`,
    ` max_timestep=${n(timestep.max)}`,
    ` end_step=${config.steps}`,
    ` test_problem ${config.testProblem}`,
    '',
    ` visit_frequency=${config.visitFrequency}`,
    '',
    DECK_END,
  ];

  return lines.join('\n') + '\n';
}

type FieldMap = Map<string, string>;

function parseNumber(key: string, raw: string | undefined, line: number): number {
  if (raw === undefined || raw.trim() === '') {
    throw new ValidationError(`Missing value for ${key} on line ${line}`, { key, line });
  }
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ValidationError(`Invalid number for ${key} on line ${line}: ${raw}`, {
      key,
      raw,
      line,
    });
  }
  return value;
}

function readPairs(tokens: string[], into: FieldMap, prefix: string, line: number): void {
  for (const token of tokens) {
    const eq = token.indexOf('=');
    if (eq <= 0) {
      throw new ValidationError(`Malformed deck entry '${token}' on line ${line}`, {
        token,
        line,
      });
    }
    into.set(`${prefix}${token.slice(0, eq).toLowerCase()}`, token.slice(eq + 1));
  }
}

/**
 * Parse deck text back into a RunConfig.
 *
 * Accepts `key = value` with spaces around the equals sign, which older
 * hand-written decks use. Fields the runner does not model are returned in
 * `extras` untouched.
 */
export function parseInputDeck(text: string): { config: RunConfig; extras: Record<string, string> } {
  const lines = text.split(/\r?\n/).map((raw) => raw.trim());

  const begin = lines.findIndex((l) => l === DECK_BEGIN);
  const end = lines.findIndex((l) => l === DECK_END);
  if (begin === -1 || end === -1 || end < begin) {
    throw new ValidationError(`Deck must be enclosed in ${DECK_BEGIN} ... ${DECK_END}`, {
      begin,
      end,
    });
  }

  const fields: FieldMap = new Map();
  const lineOf = new Map<string, number>();

  for (let i = begin + 1; i < end; i++) {
    const line = lines[i];
    if (!line || line.startsWith('!')) continue;
    const lineNo = i + 1;
    const tokens = line.replace(/\s*=\s*/g, '=').split(/\s+/);
    const head = tokens[0]?.toLowerCase();

    if (head === 'state') {
      const stateIndex = tokens[1];
      if (stateIndex !== '1' && stateIndex !== '2') {
        throw new ValidationError(`Unsupported state '${stateIndex ?? ''}' on line ${lineNo}`, {
          line: lineNo,
        });
      }
      readPairs(tokens.slice(2), fields, `state${stateIndex}.`, lineNo);
    } else if (head === 'test_problem') {
      fields.set('test_problem', tokens[1] ?? '');
    } else {
      readPairs(tokens, fields, '', lineNo);
    }
    for (const key of fields.keys()) {
      if (!lineOf.has(key)) lineOf.set(key, lineNo);
    }
  }

  const take = (key: string): number => {
    const raw = fields.get(key);
    if (raw === undefined) {
      throw new ValidationError(`Deck is missing ${key}`, { key });
    }
    fields.delete(key);
    return parseNumber(key, raw, lineOf.get(key) ?? 0);
  };

  const xCells = take('x_cells');
  const yCells = take('y_cells');
  if (xCells !== yCells) {
    throw new ValidationError(`x_cells (${xCells}) and y_cells (${yCells}) must match`, {
      xCells,
      yCells,
    });
  }

  const geometry = fields.get('state2.geometry');
  if (geometry !== 'rectangle') {
    throw new ValidationError(`Unsupported state 2 geometry: ${geometry ?? '(missing)'}`, {
      geometry,
    });
  }
  fields.delete('state2.geometry');

  const candidate = {
    cells: xCells,
    state1: { density: take('state1.density'), energy: take('state1.energy') },
    state2: {
      density: take('state2.density'),
      energy: take('state2.energy'),
      geometry,
      xmin: take('state2.xmin'),
      xmax: take('state2.xmax'),
      ymin: take('state2.ymin'),
      ymax: take('state2.ymax'),
    },
    domain: {
      xmin: take('xmin'),
      ymin: take('ymin'),
      xmax: take('xmax'),
      ymax: take('ymax'),
    },
    timestep: {
      initial: take('initial_timestep'),
      rise: take('timestep_rise'),
      max: take('max_timestep'),
    },
    steps: take('end_step'),
    testProblem: take('test_problem'),
    visitFrequency: take('visit_frequency'),
  };

  const validated = validateRunConfig(candidate);
  if (!validated.ok) {
    throw new ValidationError(`Deck describes an invalid run: ${validated.issues.join('; ')}`, {
      issues: validated.issues,
    });
  }

  return { config: validated.config, extras: Object.fromEntries(fields) };
}
