export interface AnalysisLogger {
  info(line: string): void;
  error(line: string): void;
}

export const consoleLogger: AnalysisLogger = {
  info: (line) => console.log(line),
  error: (line) => console.error(line)
};

export function createMemoryLogger(): AnalysisLogger & { lines: string[]; errors: string[] } {
  const lines: string[] = [];
  const errors: string[] = [];
  return {
    lines,
    errors,
    info: (line) => {
      lines.push(line);
    },
    error: (line) => {
      errors.push(line);
    }
  };
}
