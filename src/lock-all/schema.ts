/**
 * Lock-All Module - Schemas and Types
 */
import type { Result } from "neverthrow";
import type { ChatError } from "../notifications/index.js";

/**
 * The parts of a button interaction the handler uses.
 * deferReply() and reply() are ephemeral: only the invoking user sees them.
 */
export type LockAllInteraction = Readonly<{
  /** Message carrying the pressed button */
  messageId: string;
  /** Invoking user, for logs */
  userTag: string;
  deferReply: () => Promise<Result<void, ChatError>>;
  reply: (content: string) => Promise<Result<void, ChatError>>;
}>;

/**
 * Per-device lock outcomes of one invocation.
 */
export type LockAllReport = Readonly<{
  locked: ReadonlyArray<string>;
  failed: ReadonlyArray<string>;
}>;
