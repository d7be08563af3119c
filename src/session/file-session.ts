import { randomUUID } from "node:crypto";
import fs from "node:fs/promises";
import path from "node:path";

import fse from "fs-extra";
import { z } from "zod";

import { UserFacingError, USER_FACING_ERROR_CODES } from "../core/errors.js";
import { isoNow, slugify } from "../core/utils.js";
import { TASK_IDS, type TaskId } from "../tasks/registry.js";

import {
  emptySessionScopedState,
  type ConversationMessage,
  type ConversationRole,
  type SessionPort,
  type SessionScopedState,
  type StoredTaskOutput,
} from "./session.js";

// =============================================================================
// SCHEMA
// =============================================================================

const MessageSchema = z.object({
  role: z.enum(["user", "assistant"]),
  content: z.string(),
  ts: z.string(),
});

const StoredTaskOutputSchema = z.object({
  content: z.record(z.string(), z.string()),
  reason: z.string(),
  updatedAt: z.string(),
});

const SessionDocumentSchema = z.object({
  id: z.string().min(1),
  created_at: z.string(),
  updated_at: z.string(),
  initial_idea: z.string().nullable().default(null),
  document_title: z.string().nullable().default(null),
  document_generated: z.boolean().default(false),
  current_stage: z.string().nullable().default(null),
  scoped_state: z
    .object({
      rates: z.record(z.string(), z.number()).default({}),
      budget: z.string().optional(),
      timeline: z.string().optional(),
    })
    .default({}),
  history: z.array(MessageSchema).default([]),
  task_outputs: z.record(z.enum(TASK_IDS), StoredTaskOutputSchema).default({}),
});

export type SessionDocument = z.infer<typeof SessionDocumentSchema>;

// =============================================================================
// FILE SESSION
// =============================================================================

export class FileSession implements SessionPort {
  private constructor(
    readonly filePath: string,
    private readonly doc: SessionDocument,
  ) {}

  static sessionPath(sessionsDir: string, sessionId: string): string {
    const safeId = slugify(sessionId);
    if (!safeId) {
      throw new UserFacingError({
        code: USER_FACING_ERROR_CODES.session,
        title: "Invalid session id.",
        message: `Session id "${sessionId}" has no usable characters.`,
        hint: "Use letters, digits, or dashes.",
      });
    }
    return path.join(sessionsDir, `${safeId}.json`);
  }

  static async open(sessionsDir: string, sessionId: string): Promise<FileSession> {
    const filePath = FileSession.sessionPath(sessionsDir, sessionId);
    if (!(await fse.pathExists(filePath))) {
      const now = isoNow();
      return new FileSession(
        filePath,
        SessionDocumentSchema.parse({ id: sessionId, created_at: now, updated_at: now }),
      );
    }

    return FileSession.load(filePath);
  }

  static async load(filePath: string): Promise<FileSession> {
    const raw = await fse.readFile(filePath, "utf8");

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      throw createInvalidSessionError(filePath, err);
    }

    const parsed = SessionDocumentSchema.safeParse(json);
    if (!parsed.success) {
      throw createInvalidSessionError(filePath, parsed.error);
    }

    return new FileSession(filePath, parsed.data);
  }

  get id(): string {
    return this.doc.id;
  }

  get initialIdea(): string | null {
    return this.doc.initial_idea;
  }

  set initialIdea(value: string | null) {
    this.doc.initial_idea = value;
  }

  get documentTitle(): string | null {
    return this.doc.document_title;
  }

  set documentTitle(value: string | null) {
    this.doc.document_title = value;
  }

  get isDocumentGenerated(): boolean {
    return this.doc.document_generated;
  }

  set isDocumentGenerated(value: boolean) {
    this.doc.document_generated = value;
  }

  get currentStage(): string | null {
    return this.doc.current_stage;
  }

  set currentStage(value: string | null) {
    this.doc.current_stage = value;
  }

  get sessionScopedState(): SessionScopedState {
    const { rates, budget, timeline } = this.doc.scoped_state;
    return { ...emptySessionScopedState(), rates: { ...rates }, budget, timeline };
  }

  set sessionScopedState(value: SessionScopedState) {
    this.doc.scoped_state = { rates: { ...value.rates }, budget: value.budget, timeline: value.timeline };
  }

  getConversationHistory(limit?: number): ConversationMessage[] {
    const history = this.doc.history;
    return limit === undefined ? [...history] : history.slice(-limit);
  }

  appendMessage(role: ConversationRole, content: string): void {
    this.doc.history.push({ role, content, ts: isoNow() });
  }

  getPriorTaskOutput(taskId: TaskId): StoredTaskOutput | null {
    return this.doc.task_outputs[taskId] ?? null;
  }

  saveTaskOutput(taskId: TaskId, content: Record<string, string>, reason: string): void {
    this.doc.task_outputs[taskId] = { content: { ...content }, reason, updatedAt: isoNow() };
  }

  async save(): Promise<void> {
    this.doc.updated_at = isoNow();
    await writeSessionFile(this.filePath, this.doc);
  }

  toJSON(): SessionDocument {
    return structuredClone(this.doc);
  }
}

// =============================================================================
// INTERNALS
// =============================================================================

function createInvalidSessionError(filePath: string, cause: unknown): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.session,
    title: "Session file invalid.",
    message: `Session file at ${filePath} could not be read.`,
    hint: "Delete the file to start a new session, or restore it from a backup.",
    cause,
  });
}

async function writeSessionFile(filePath: string, doc: SessionDocument): Promise<void> {
  await fse.ensureDir(path.dirname(filePath));

  const tmpPath = `${filePath}.${randomUUID()}.tmp`;
  const handle = await fs.open(tmpPath, "w");

  try {
    await handle.writeFile(JSON.stringify(doc, null, 2) + "\n", "utf8");
    await handle.sync();
    await handle.close();
    await fs.rename(tmpPath, filePath);
  } catch (err) {
    await handle.close().catch(() => undefined);
    await fse.remove(tmpPath).catch(() => undefined);
    throw err;
  }
}
