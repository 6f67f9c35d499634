import * as fs from 'fs';
import * as path from 'path';

export interface WebhookLogEntry {
  ts: string;
  event: string;
  ip?: string;
  method?: string;
  path?: string;
  status?: number;
  durMs?: number;
  bytes?: number;
  hub?: string;
  eventName?: string;
  requestKind?: string;
  connectionId?: string;
  origin?: string;
  error?: string;
  reason?: string;
}

export type LogInput = Omit<WebhookLogEntry, 'ts'>;

/** Append-only JSONL writer; `off` as the path disables it */
export class JsonlLogger {
  private stream: fs.WriteStream | null = null;
  private opened = false;
  private closing: Promise<void> | null = null;

  constructor(readonly logPath: string) {}

  get enabled(): boolean {
    return this.logPath !== 'off';
  }

  private open() {
    if (this.opened || !this.enabled) return;
    this.opened = true;
    try {
      fs.mkdirSync(path.dirname(this.logPath), { recursive: true });
      this.stream = fs.createWriteStream(this.logPath, { flags: 'a' });
      this.stream.on('error', (err) => {
        console.error(`[Webhook] Log stream error: ${err.message}`);
        this.stream = null;
      });
      console.log(`[Webhook] JSONL logging enabled: ${this.logPath}`);
    } catch (e) {
      console.error(`[Webhook] Failed to initialize log stream: ${e instanceof Error ? e.message : String(e)}`);
    }
  }

  log(entry: LogInput) {
    this.open();
    if (!this.stream) return;
    const line: WebhookLogEntry = { ts: new Date().toISOString(), ...entry };
    try {
      this.stream.write(JSON.stringify(line) + '\n');
    } catch (e) {
      console.error(`[Webhook] Failed to write log entry: ${e instanceof Error ? e.message : String(e)}`);
    }
  }

  /** Flushes pending lines; later entries are dropped */
  close(): Promise<void> {
    if (this.closing) return this.closing;
    this.opened = true;
    const stream = this.stream;
    this.stream = null;
    this.closing = stream ? new Promise((resolve) => stream.end(() => resolve())) : Promise.resolve();
    return this.closing;
  }
}
