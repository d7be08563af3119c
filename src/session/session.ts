/**
 * Session collaborator port.
 * Purpose: the durable conversation record the proposal agent and pipelines read and write.
 * Assumptions: one session per proposal document; callers serialize access to a session.
 * Usage: FileSession for the CLI; tests use the in-memory fake in src/__tests__/fakes.ts.
 */

import type { TaskId } from "../tasks/registry.js";

// =============================================================================
// TYPES
// =============================================================================

export type ConversationRole = "user" | "assistant";

export type ConversationMessage = {
  role: ConversationRole;
  content: string;
  ts: string;
};

/** Settings the user stated in earlier turns; they outlive a single turn. */
export type SessionScopedState = {
  rates: Record<string, number>;
  budget?: string;
  timeline?: string;
};

export type StoredTaskOutput = {
  content: Record<string, string>;
  reason: string;
  updatedAt: string;
};

// =============================================================================
// PORT
// =============================================================================

export interface SessionPort {
  readonly id: string;

  initialIdea: string | null;
  documentTitle: string | null;
  isDocumentGenerated: boolean;
  currentStage: string | null;
  sessionScopedState: SessionScopedState;

  getConversationHistory(limit?: number): ConversationMessage[];
  appendMessage(role: ConversationRole, content: string): void;

  getPriorTaskOutput(taskId: TaskId): StoredTaskOutput | null;
  saveTaskOutput(taskId: TaskId, content: Record<string, string>, reason: string): void;

  save(): Promise<void>;
}

export function emptySessionScopedState(): SessionScopedState {
  return { rates: {} };
}
