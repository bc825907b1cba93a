// ─────────────────────────────────────────────
//  Logger
//  Tagged console output for battle lifecycle events.
//  Sinks receive every line, even when console output is muted.
// ─────────────────────────────────────────────

export type LogClass = 'system' | 'action' | 'spell' | 'defense' | 'critical' | 'warn';

export interface LogLine {
  text: string;
  type: LogClass;
}

type LogSink = (line: LogLine) => void;

let enabled = true;
let sinks: LogSink[] = [];

export const Logger = {
  log(text: string, type: LogClass = 'action'): void {
    const line: LogLine = { text, type };
    for (const sink of sinks) sink(line);
    if (!enabled) return;
    if (type === 'warn') console.warn(`[WARN] ${text}`);
    else console.log(`[${type.toUpperCase()}] ${text}`);
  },

  warn(text: string): void {
    Logger.log(text, 'warn');
  },

  /** Toggle console output (sinks are unaffected) */
  setEnabled(on: boolean): void {
    enabled = on;
  },

  /** Attach a sink; returns a detach function */
  addSink(sink: LogSink): () => void {
    sinks.push(sink);
    return () => {
      sinks = sinks.filter(s => s !== sink);
    };
  },
};
