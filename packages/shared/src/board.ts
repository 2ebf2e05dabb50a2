/**
 * @fileoverview Text rendering of the 3x3 board.
 *
 * Rows are printed as ` a | b | c`, where each cell is either a symbol or,
 * when empty, its own index so players can see which moves remain:
 *
 * ```
 *  0 | 1 | 2
 * ---+---+---
 *  3 | X | 5
 * ---+---+---
 *  6 | 7 | O
 * ```
 */

import type { GameSymbol } from './types.js';

export type Cell = GameSymbol | null;

const ROW_SEPARATOR = '---+---+---';

const BOARD_ROW_PATTERN = /^\s*([0-8XO])\s*\|\s*([0-8XO])\s*\|\s*([0-8XO])\s*$/;

/**
 * Render nine cells as the multi-line board text (no trailing newline).
 */
export function renderBoard(cells: readonly Cell[]): string {
  const rows: string[] = [];
  for (let row = 0; row < 3; row++) {
    const marks = [0, 1, 2].map((col) => {
      const index = row * 3 + col;
      return cells[index] ?? String(index);
    });
    rows.push(` ${marks.join(' | ')}`);
  }
  return rows.join(`\n${ROW_SEPARATOR}\n`);
}

/**
 * Parse one rendered row line. Returns its three cell labels, or null if
 * the line is not a board row.
 */
export function parseBoardRow(line: string): [string, string, string] | null {
  const match = BOARD_ROW_PATTERN.exec(line);
  if (!match) {
    return null;
  }
  const [, first, second, third] = match;
  if (first === undefined || second === undefined || third === undefined) {
    return null;
  }
  return [first, second, third];
}

/**
 * Collect the free cell indices shown in a set of rendered row lines.
 */
export function freeCellsFromRows(rows: readonly string[]): number[] {
  const free: number[] = [];
  for (const line of rows) {
    const labels = parseBoardRow(line);
    if (!labels) continue;
    for (const label of labels) {
      if (/^[0-8]$/.test(label)) {
        free.push(Number(label));
      }
    }
  }
  return free;
}
