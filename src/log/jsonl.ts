import * as fs from 'fs';
import * as path from 'path';

export type LogChannel = 'HTTP' | 'WS' | 'CONFIG';

/**
 * Append-only JSONL file, one object per line. A stream error is reported
 * once on the console and turns file logging off; writing never throws.
 */
export class JsonlLog {
  private stream: fs.WriteStream | null = null;

  constructor(readonly channel: LogChannel, readonly file: string | null) {}

  open(): this {
    if (this.stream || !this.file) return this;
    try {
      fs.mkdirSync(path.dirname(this.file), { recursive: true });
      const stream = fs.createWriteStream(this.file, { flags: 'a' });
      stream.on('error', (err) => {
        console.error(`[${this.channel}] Log stream error: ${err.message}`);
        this.stream = null;
      });
      this.stream = stream;
      console.log(`[${this.channel}] JSONL logging enabled: ${this.file}`);
    } catch (err) {
      console.error(`[${this.channel}] Failed to initialize log stream: ${err instanceof Error ? err.message : String(err)}`);
    }
    return this;
  }

  get enabled(): boolean {
    return this.stream !== null;
  }

  write(entry: object): void {
    if (!this.stream) return;
    try {
      this.stream.write(JSON.stringify(entry) + '\n');
    } catch (err) {
      console.error(`[${this.channel}] Failed to write log: ${err instanceof Error ? err.message : String(err)}`);
    }
  }

  /** Flushes buffered lines and closes the file. Later writes are dropped. */
  close(): void {
    this.stream?.end();
    this.stream = null;
  }
}
