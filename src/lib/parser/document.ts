/**
 * Grid documents and options read from JSON5 text.
 *
 * JSON5 allows unquoted keys, trailing commas and comments:
 *
 *     {
 *       // Sudoku-style board with math-style y axis
 *       grid: '1 2 3|4 5 6|7 8 9',
 *       options: { origin: 'LowerLeft', invertedY: false },
 *     }
 */

import JSON5 from 'json5';
import type { GridOptions } from '../core/options.js';
import { isOrigin } from '../core/origin.js';
import type { Grid } from '../grid.js';
import { parseGrid } from './parser.js';

const BOOLEAN_OPTIONS = ['invertedY', 'neighborYBased', 'wrapX', 'wrapY'] as const;

type MutableOptions = { -readonly [K in keyof GridOptions]?: GridOptions[K] };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseJson5(text: string, what: string): unknown {
  try {
    return JSON5.parse(text);
  } catch (e) {
    throw new Error(`Invalid JSON5 in ${what}: ${e instanceof Error ? e.message : String(e)}`);
  }
}

/**
 * Validate an untyped options object.
 * Unknown keys are ignored with a warning.
 *
 * @throws Error naming the first key with a wrong value
 */
export function readGridOptions(value: unknown): Partial<GridOptions> {
  if (!isRecord(value)) {
    throw new Error(`Grid options must be an object, got ${JSON.stringify(value)}`);
  }

  const options: MutableOptions = {};

  for (const [key, raw] of Object.entries(value)) {
    if (key === 'origin') {
      if (!isOrigin(raw)) {
        throw new Error(`Invalid grid option 'origin': ${JSON.stringify(raw)}`);
      }
      options.origin = raw;
      continue;
    }

    const flag = BOOLEAN_OPTIONS.find(name => name === key);
    if (flag === undefined) {
      console.warn(`Ignoring unknown grid option '${key}'`);
      continue;
    }
    if (typeof raw !== 'boolean') {
      throw new Error(`Invalid grid option '${key}': expected boolean, got ${JSON.stringify(raw)}`);
    }
    options[flag] = raw;
  }

  return options;
}

/**
 * Parse grid options from JSON5 text.
 */
export function parseGridOptions(text: string): Partial<GridOptions> {
  return readGridOptions(parseJson5(text, 'grid options'));
}

/**
 * Build a string grid from a JSON5 document with a `grid` field in the
 * compact format and an optional `options` field.
 *
 * @throws Error for malformed documents, GridError for invalid grids
 */
export function loadGridDocument(text: string): Grid<string> {
  const doc = parseJson5(text, 'grid document');
  if (!isRecord(doc) || typeof doc.grid !== 'string') {
    throw new Error(`Grid document needs a string 'grid' field`);
  }
  const options = doc.options === undefined ? undefined : readGridOptions(doc.options);
  return parseGrid(doc.grid, options);
}
