/**
 * formatter.ts — Parameter formatting
 *
 * Converts parameter views into human-readable lines for terminal display.
 */

import chalk from "chalk";
import type { ParameterValue } from "../bridge/types.js";
import type { ParameterView } from "../server/views.js";

/** Numbers are rounded to 12 significant digits; text values are quoted. */
export function formatValue(value: ParameterValue): string {
  if (value === null) return "—";
  if (typeof value === "number") return String(Number(value.toPrecision(12)));
  if (typeof value === "string") return JSON.stringify(value);
  return String(value);
}

/**
 * One line per parameter:  name  value unit  [symbol]  note
 */
export function formatParameterLines(parameters: ParameterView[]): string[] {
  const nameWidth = Math.min(
    Math.max(4, ...parameters.map((p) => p.name.length)),
    32,
  );

  return parameters.map((p) => {
    const name = p.isReadOnly ? chalk.gray(p.name.padEnd(nameWidth)) : chalk.bold(p.name.padEnd(nameWidth));
    const value = `${formatValue(p.value)} ${chalk.gray(p.unit)}`;
    const symbol = p.mapping ? chalk.magenta(`[${p.mapping}]`) : "";
    const note = p.note ? chalk.gray(p.note) : "";
    return ["  " + name, value, symbol, note].filter(Boolean).join("  ");
  });
}
