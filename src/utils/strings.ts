/**
 * String utilities for infragen
 */

/**
 * Entries of a string map in ascending key order.
 *
 * Maps carry no meaningful order, so anything rendered from one goes through here.
 */
export function sortedEntries(map: Record<string, string>): Array<[string, string]> {
  return Object.entries(map).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
}

/**
 * Turn a service name into an identifier usable as a variable prefix
 */
export function toIdentifier(name: string): string {
  return name.replaceAll("-", "_");
}

/**
 * Quote a value as an HCL string literal
 */
export function hclString(value: string): string {
  return `"${escapeHclTemplate(value.replaceAll("\\", "\\\\").replaceAll('"', '\\"'))}"`;
}

/**
 * Escape HCL template sequences so the text is taken literally
 */
export function escapeHclTemplate(value: string): string {
  return value.replaceAll("${", "$${").replaceAll("%{", "%%{");
}

/**
 * Quote a value for a POSIX shell
 */
export function shellQuote(value: string): string {
  if (/^[\w@%+=:,./-]+$/.test(value)) {
    return value;
  }
  return `'${value.replaceAll("'", `'"'"'`)}'`;
}

/**
 * Indent every line of a string by a number of spaces
 */
export function indent(str: string, spaces: number = 2): string {
  const padding = " ".repeat(spaces);
  return str
    .split("\n")
    .map((line) => (line.length > 0 ? padding + line : line))
    .join("\n");
}

/**
 * Pluralize a word based on count
 */
export function pluralize(word: string, count: number, plural?: string): string {
  if (count === 1) return word;
  return plural ?? `${word}s`;
}
