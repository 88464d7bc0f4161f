/**
 * Minimal ANSI color/style module for server console output.
 *
 * - Respects NO_COLOR (https://no-color.org) and FORCE_COLOR env vars.
 * - Falls back to process.stdout.isTTY detection.
 */

function isEnabled(): boolean {
  if ("NO_COLOR" in process.env) {
    return false;
  }
  if ("FORCE_COLOR" in process.env) {
    return true;
  }
  return process.stdout.isTTY ?? false;
}

type StyleFn = (text: string) => string;

function make(open: string, close: number): StyleFn {
  const o = `\x1b[${open}m`;
  const c = `\x1b[${close}m`;
  return (t) => (isEnabled() ? `${o}${t}${c}` : t);
}

export const bold = make("1", 22);
export const dim = make("2", 22);

// 256-color orange, used for the service name in the startup banner
export const orange = make("38;5;208", 39);
