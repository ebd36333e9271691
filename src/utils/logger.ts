// Centralized diagnostics for the CLI. Everything goes to stderr so stdout only
// ever carries the rendered tree.
export type LogSink = (line: string) => void;

const stderrSink: LogSink = line => {
  process.stderr.write(`${line}\n`);
};

let sink: LogSink = stderrSink;
let traceEnabled = false;

function fmt(parts: unknown[]): string {
  try {
    const mapped = parts.map(p => {
      if (p instanceof Error) {
        return `${p.name}: ${p.message}` + (p.stack ? `\n${p.stack}` : '');
      }
      if (typeof p === 'object') {
        try {
          return JSON.stringify(p);
        } catch {
          return String(p);
        }
      }
      return String(p);
    });
    return mapped.join(' ');
  } catch {
    return parts.map(p => String(p)).join(' ');
  }
}

function now(): string {
  const d = new Date();
  const pad = (n: number) => (n < 10 ? `0${n}` : String(n));
  return `${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}`;
}

// Redirect output; pass nothing to restore stderr
export function setLogSink(next?: LogSink): void {
  sink = next ?? stderrSink;
}

export function logError(...parts: unknown[]): void {
  sink(`[${now()}] ERROR ${fmt(parts)}`);
}

export function setTraceEnabled(enabled: boolean): void {
  traceEnabled = !!enabled;
}

export function isTraceEnabled(): boolean {
  return traceEnabled;
}

export function logTrace(...parts: unknown[]): void {
  if (!traceEnabled) {
    return;
  }
  sink(`[${now()}] TRACE ${fmt(parts)}`);
}
