export const COLORS = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  cyan: '\x1b[36m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  magenta: '\x1b[35m',
  red: '\x1b[31m',
};

const KIND_COLORS: Record<string, string> = {
  connect: COLORS.magenta,
  connected: COLORS.green,
  disconnected: COLORS.yellow,
  user: COLORS.blue,
  ignored: COLORS.dim,
};

function statusColor(status: unknown): string {
  if (typeof status !== 'number') return COLORS.reset;
  if (status >= 500) return COLORS.red;
  if (status >= 400) return COLORS.yellow;
  return COLORS.green;
}

/** One JSONL log line as a terminal line; lines that are not JSON objects pass through */
export function formatLogLine(line: string, color = true): string {
  let record: unknown;
  try {
    record = JSON.parse(line);
  } catch {
    return line;
  }
  if (typeof record !== 'object' || record === null || Array.isArray(record)) return line;
  const entry = new Map(Object.entries(record));
  const c = (code: string) => (color ? code : '');

  const ts = entry.get('ts');
  const timestamp = typeof ts === 'string' ? ts.substring(11, 23) : '--:--:--.---';
  const event = String(entry.get('event') ?? 'unknown');
  const kind = entry.get('requestKind');
  const status = entry.get('status');

  let details = '';
  for (const key of ['requestKind', 'eventName', 'connectionId', 'origin', 'durMs', 'reason', 'error']) {
    const v = entry.get(key);
    if (v !== undefined) details += ` ${key}=${String(v)}`;
  }

  const kindColor = typeof kind === 'string' ? KIND_COLORS[kind] ?? COLORS.reset : COLORS.reset;
  const statusText = status === undefined ? '   ' : String(status);
  return `${c(COLORS.dim)}${timestamp}${c(COLORS.reset)} ${c(statusColor(status))}${statusText}${c(COLORS.reset)} ${c(kindColor)}${c(COLORS.bold)}${event.padEnd(24)}${c(COLORS.reset)}${details}`;
}
