/**
 * Plain-text mixture summary.
 *
 * @packageDocumentation
 */

import { parseKey } from '../keys/index.js';
import type { Mixture } from './mixture.js';

/**
 * Horizontal rule between sections.
 */
export const SUMMARY_RULE = '―'.repeat(78);

const KEY_COLUMN_WIDTH = 40;

function formatRow(position: number, label: string, detail?: string): string {
  const index = String(position).padStart(2);
  if (detail === undefined) {
    return `${index}  ${label}`;
  }
  return `${index}  ${label.padEnd(KEY_COLUMN_WIDTH)} ${detail}`;
}

/**
 * Summarizes a mixture: its stored properties with the number of set
 * (non-NaN) values, then its component phases.
 *
 * @param mixture - The mixture to summarize.
 * @returns Newline-separated summary text.
 *
 * @example
 * ```typescript
 * console.log(formatMixture(mix));
 * // mix_01
 * // ――――――――――――――――――――――――――――――――――――――――――――――――――――――――――――――――――――――――――――――
 * // Properties                                  Valid Values
 * //  1  pore.mole_fraction.all                   2 / 2
 * // ...
 * ```
 */
export function formatMixture(mixture: Mixture): string {
  const lines: string[] = [mixture.name, SUMMARY_RULE];

  lines.push(`${'Properties'.padEnd(KEY_COLUMN_WIDTH + 4)} Valid Values`);
  mixture.props().forEach((key, index) => {
    const values = mixture.get(key);
    const valid = values.filter((value) => !Number.isNaN(value)).length;
    const total = mixture.count(parseKey(key).element);
    lines.push(formatRow(index + 1, key, `${String(valid)} / ${String(total)}`));
  });

  lines.push(SUMMARY_RULE, 'Component Phases');
  [...mixture.listComponents().keys()].forEach((name, index) => {
    lines.push(formatRow(index + 1, name));
  });
  lines.push(SUMMARY_RULE);

  return lines.join('\n');
}
