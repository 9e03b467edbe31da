/**
 * CLI output formatting.
 *
 * Consistent, scannable output with prefixes. Colors go through
 * picocolors and stay off where the terminal does not support them.
 */

import pc from 'picocolors';

let colors = pc.createColors();
let verbose = false;

export function setColor(enabled: boolean): void {
  colors = pc.createColors(enabled && pc.isColorSupported);
}

export function setVerbose(enabled: boolean): void {
  verbose = enabled;
}

export function bold(text: string): string {
  return colors.bold(text);
}

export function cyan(text: string): string {
  return colors.cyan(text);
}

export function red(text: string): string {
  return colors.red(text);
}

/**
 * Print section header.
 */
export function header(text: string): void {
  console.log(colors.bold(text));
  console.log();
}

/**
 * Print info line.
 */
export function info(label: string, value: string): void {
  console.log(`${label}: ${colors.cyan(value)}`);
}

export function success(message: string): void {
  console.log(colors.green(`✅ ${message}`));
}

export function warn(message: string): void {
  console.log(colors.yellow(`⚠️  ${message}`));
}

/**
 * Print error message, with details on a second line.
 */
export function error(message: string, details?: string): void {
  console.error(colors.red(`❌ ${message}`));
  if (details) {
    console.error(colors.red(`   ${details}`));
  }
}

/**
 * Trace line, shown with --verbose only.
 */
export function debug(message: string): void {
  if (verbose) {
    console.error(colors.dim(`· ${message}`));
  }
}

/**
 * Print version bump.
 */
export function versionBump(from: string, to: string, kind: string): void {
  console.log(`Version: ${colors.cyan(from)} → ${colors.green(to)} (${kind})`);
}

/**
 * Print help text.
 */
export function help(text: string): void {
  console.log(text);
}

export function json(data: unknown): void {
  console.log(JSON.stringify(data, null, 2));
}
