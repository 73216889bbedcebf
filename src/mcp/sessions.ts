// src/mcp/sessions.ts
import { v4 as uuidv4 } from 'uuid';

/**
 * Ids of the SSE streams currently open. An id is added when a stream opens and
 * dropped when it closes; nothing else is stored against it.
 */
export class SessionRegistry {
  private readonly ids = new Set<string>();

  open(): string {
    const id = uuidv4();
    this.ids.add(id);
    return id;
  }

  close(id: string): boolean {
    return this.ids.delete(id);
  }

  has(id: string): boolean {
    return this.ids.has(id);
  }

  get size(): number {
    return this.ids.size;
  }
}
