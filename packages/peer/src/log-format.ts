import type { LogEntry } from '@recipe-mesh/engine';

/**
 * One human-readable line per entry, for the terminal.
 */
export function formatLogEntry(entry: LogEntry): string {
  const time = new Date(entry.timestamp).toISOString();
  const context = entry.context ? ` ${JSON.stringify(entry.context)}` : '';
  return `${time} ${entry.level.toUpperCase().padEnd(5)} [${entry.module}] ${entry.message}${context}`;
}
