import type { LogEntry, LogWriter } from '../src/types.js';

export interface CapturedOutput {
  write: LogWriter;
  lines: string[];
  parsed(): LogEntry[];
  last(): LogEntry | null;
}

/** Collects every line a logger writes so tests can inspect the serialized form */
export function captureOutput(): CapturedOutput {
  const lines: string[] = [];
  const parsed = (): LogEntry[] => lines.map((line): LogEntry => JSON.parse(line));
  return {
    lines,
    write: (line) => {
      lines.push(line);
    },
    parsed,
    last: () => {
      const all = parsed();
      return all.length > 0 ? all[all.length - 1] : null;
    },
  };
}
