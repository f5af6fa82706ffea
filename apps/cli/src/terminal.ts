/**
 * Where front ends send what the user reads. stdout carries reports,
 * stderr carries warnings and errors.
 */
export interface Terminal {
  print(line?: string): void;
  warn(line: string): void;
}

export const consoleTerminal: Terminal = {
  print: (line = '') => console.log(line),
  warn: (line) => console.error(line),
};

export function printLines(terminal: Terminal, lines: string[]): void {
  for (const line of lines) {
    terminal.print(line);
  }
}
