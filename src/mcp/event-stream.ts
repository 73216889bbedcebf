/**
 * The long-lived MCP event stream: announce the message endpoint, then ping on a fixed
 * interval until the client goes away. connected → heartbeat → closed; closed is final.
 */
import type { SessionRegistry } from '@/mcp/sessions';
import { logger } from '@/services/logger';
import type { EventSink } from '@/utils/sse';
import { errorMessage } from '@/utils/errorResponse';

export type StreamState = 'connected' | 'heartbeat' | 'closed';

export interface EventStreamOptions {
  heartbeatMs: number;
  messagesPath: string;
}

const streamLogger = logger.getSubLogger({ name: 'sse' });

export class McpEventStream {
  readonly sessionId: string;
  private state: StreamState = 'connected';
  private timer: NodeJS.Timeout | undefined;

  constructor(
    private readonly sink: EventSink,
    private readonly sessions: SessionRegistry,
    private readonly options: EventStreamOptions,
  ) {
    this.sessionId = sessions.open();
  }

  get currentState(): StreamState {
    return this.state;
  }

  start(): void {
    if (this.state !== 'connected') return;
    try {
      this.sink.send('endpoint', `${this.options.messagesPath}?session_id=${this.sessionId}`);
    } catch (err) {
      this.fail(err);
      return;
    }
    this.state = 'heartbeat';
    this.timer = setInterval(() => this.beat(), this.options.heartbeatMs);
    streamLogger.info('stream opened', { sessionId: this.sessionId });
  }

  private beat(): void {
    try {
      this.sink.send('ping', 'Server alive');
    } catch (err) {
      this.fail(err);
    }
  }

  /** Reports the failure on the stream if it is still writable, then closes. */
  fail(err: unknown): void {
    if (this.state === 'closed') return;
    const message = errorMessage(err);
    streamLogger.error('stream failed', { sessionId: this.sessionId, err: message });
    try {
      this.sink.send('error', `Server error: ${message}`);
    } catch (sendErr) {
      streamLogger.debug('error event not delivered', { err: errorMessage(sendErr) });
    }
    this.close();
  }

  close(): void {
    if (this.state === 'closed') return;
    this.state = 'closed';
    if (this.timer) clearInterval(this.timer);
    this.timer = undefined;
    this.sessions.close(this.sessionId);
    this.sink.close();
    streamLogger.info('stream closed', { sessionId: this.sessionId });
  }
}
