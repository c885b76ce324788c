import type { MessageRole } from "../types/Session.js";

/**
 * One remembered turn.
 */
export interface MemoryRecord {
  sessionId: string;
  role: Exclude<MessageRole, "system">;
  content: string;
  /** ISO 8601 */
  timestamp: string;
  toolName?: string;
}

/**
 * Memory backend used by the runtime for recall and persistence.
 * Each append is one atomic write.
 */
export interface MemoryPort {
  append(record: MemoryRecord): Promise<void>;
  search(query: string, limit: number): Promise<MemoryRecord[]>;
}
