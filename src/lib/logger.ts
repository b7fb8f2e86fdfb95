/**
 * Progress and warning output.
 *
 * Library code reports through a Logger so commands print to the terminal
 * while tests collect the lines.
 */
export interface Logger {
  info: (message: string) => void;
  warn: (message: string) => void;
}

export const consoleLogger: Logger = {
  info: (message) => console.log(message),
  warn: (message) => console.error(message),
};

/** Logger that keeps every line in memory, in the order it was written */
export function createMemoryLogger(): Logger & { lines: string[] } {
  const lines: string[] = [];
  return {
    lines,
    info: (message) => lines.push(message),
    warn: (message) => lines.push(`warn: ${message}`),
  };
}
