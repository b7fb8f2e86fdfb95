// ANSI escape codes
const ESC = "\x1b";
const RESET = `${ESC}[0m`;

const CODES = {
  red: `${ESC}[31m`,
  green: `${ESC}[32m`,
  yellow: `${ESC}[33m`,
  blue: `${ESC}[34m`,
  white: `${ESC}[37m`,
} as const;

export type Colour = keyof typeof CODES;

export function colorize(text: string, colour: Colour): string {
  return `${CODES[colour]}${text}${RESET}`;
}

/**
 * Colour only when writing to a terminal and NO_COLOR is unset.
 */
export function shouldColor(
  stream: { isTTY?: boolean } = process.stdout,
  env: NodeJS.ProcessEnv = process.env
): boolean {
  return stream.isTTY === true && env.NO_COLOR === undefined;
}
