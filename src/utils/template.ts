/**
 * `{name}` placeholder formatting for command and URL templates.
 */

import type { ParamValue } from "../types/index.js";

/**
 * Replace `{name}` placeholders with values.
 *
 * Placeholders without a value are left untouched so a later stage can
 * fill them (helper URLs receive `{iteration}` only when fetched). Text
 * that is not a bare identifier in braces, such as `{}{`, is kept as is.
 *
 * @param template - Template string
 * @param values - Placeholder values
 * @returns Formatted string
 */
export function formatTemplate(
  template: string,
  values: Readonly<Record<string, ParamValue | undefined>>,
): string {
  return template.replace(/\{(\w+)\}/g, (match, name: string) => {
    const value = values[name];
    return value === undefined ? match : String(value);
  });
}

/**
 * Replace the last space-separated argument of a command.
 *
 * @param command - Command line
 * @param argument - New last argument
 * @returns Updated command line
 */
export function replaceLastArgument(command: string, argument: string): string {
  const index = command.trimEnd().lastIndexOf(" ");
  return index === -1 ? argument : `${command.slice(0, index)} ${argument}`;
}
