// src/utils/sse.ts
import type { Response } from 'express';

export interface EventSink {
  send(event: string, data: string): void;
  close(): void;
}

/** Named server-sent events over an Express response. */
export class SSE implements EventSink {
  private initialized = false;
  private closed = false;

  constructor(private readonly res: Response) {}

  /**
   * Initialize the SSE stream with headers.
   */
  init(): void {
    if (this.initialized) return;

    this.res.status(200);
    this.res.setHeader('Content-Type', 'text/event-stream');
    this.res.setHeader('Cache-Control', 'no-cache, no-transform');
    this.res.setHeader('Connection', 'keep-alive');
    this.res.setHeader('Access-Control-Allow-Origin', '*');
    this.res.setHeader('Access-Control-Allow-Headers', '*');
    // nginx and similar proxies buffer by default
    this.res.setHeader('X-Accel-Buffering', 'no');
    this.res.flushHeaders();

    this.initialized = true;
  }

  /**
   * Writes one event:
   *
   * event: endpoint
   * data: /sse/messages?session_id=...
   *
   * Multi-line data is split into one `data:` line per line.
   */
  send(event: string, data: string): void {
    if (this.closed) return;
    if (!this.initialized) this.init();

    const lines = data.split(/\r?\n/).map((line) => `data: ${line}`);
    this.res.write(`event: ${event}\n${lines.join('\n')}\n\n`);
  }

  /**
   * Close the SSE stream connection.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    if (!this.res.writableEnded) this.res.end();
  }
}
