import { appendFile, mkdir } from 'node:fs/promises';
import { join } from 'node:path';
import type { StreamMessage } from '../types/index.js';
import { MessageUpdateSchema } from '../schemas/message.schema.js';

/** One NDJSON line for a relayed message. */
export function encodeMessage(message: StreamMessage): string {
  return JSON.stringify(MessageUpdateSchema.parse({ type: 'update', content: message })) + '\n';
}

export class RunLogger {
  private logPath: string;
  private initialized = false;

  constructor(private runDir: string) {
    this.logPath = join(runDir, 'messages.jsonl');
  }

  private async ensureDir(): Promise<void> {
    if (this.initialized) return;
    await mkdir(this.runDir, { recursive: true });
    this.initialized = true;
  }

  async logMessage(message: StreamMessage): Promise<void> {
    await this.ensureDir();
    await appendFile(this.logPath, encodeMessage(message), 'utf-8');
  }

  getRunDir(): string {
    return this.runDir;
  }
}
