import { randomUUID } from "node:crypto";
import { toErrorMessage } from "@/lib/errors";
import { createLogger, type Logger } from "@/lib/logger";
import type { ChatRole as CompletionRole } from "@/lib/openai";
import type { ChatMessage, SessionStore } from "@/lib/sessionRepository";
import {
  runQaWorkflow,
  type EvidenceItem,
  type HistoryMessage,
  type QaWorkflowDeps
} from "@/server/qaWorkflow";

export const PROCESSING_FAILURE_ANSWER = "죄송합니다. 요청을 처리하는 중 오류가 발생했습니다. 잠시 후 다시 시도해 주세요.";

export type ChatReply = {
  sessionId: string;
  policyId: number;
  answer: string;
  evidence: EvidenceItem[];
  error: string | null;
};

export type ChatControllerDeps = {
  sessions: SessionStore;
  workflow: QaWorkflowDeps;
  chatHistoryLimit: number;
  newSessionId?: () => string;
  logger?: Logger;
};

const COMPLETION_ROLES: Record<ChatMessage["role"], CompletionRole> = {
  USER: "user",
  ASSISTANT: "assistant",
  SYSTEM: "system"
};

function toHistory(messages: ChatMessage[]): HistoryMessage[] {
  return messages.map((message) => ({ role: COMPLETION_ROLES[message.role], content: message.content }));
}

export function createChatController(deps: ChatControllerDeps) {
  const logger = deps.logger ?? createLogger("chat");
  const newSessionId = deps.newSessionId ?? randomUUID;

  async function prepareSession(sessionId: string, policyId: number, message: string): Promise<HistoryMessage[]> {
    const existing = await deps.sessions.getSession(sessionId);
    if (!existing) {
      logger.info("Creating Q&A session", { sessionId, policyId });
      await deps.sessions.createSession({ sessionId, policyId, workflowType: "QA" });
    }

    const history = await deps.sessions.getChatHistory(sessionId, deps.chatHistoryLimit);
    await deps.sessions.addChatMessage({ sessionId, role: "USER", content: message });
    return toHistory(history);
  }

  return {
    /**
     * Runs one question through the workflow inside a persisted session. Persistence failures come back
     * as an apology envelope instead of a rejection.
     */
    async runQa(params: { sessionId?: string | null; policyId: number; message: string }): Promise<ChatReply> {
      const sessionId = params.sessionId?.trim() || newSessionId();

      try {
        const history = await prepareSession(sessionId, params.policyId, params.message);
        const result = await runQaWorkflow(deps.workflow, {
          sessionId,
          policyId: params.policyId,
          query: params.message,
          history
        });

        await deps.sessions.addChatMessage({
          sessionId,
          role: "ASSISTANT",
          content: result.answer,
          metadata: {
            evidence: result.evidence,
            retrievedPassagesCount: result.retrievedPassages.length,
            webSourcesCount: result.webResults.length
          }
        });

        if (result.webResults.length > 0) {
          await deps.sessions.saveWebSources({ sessionId, policyId: params.policyId, results: result.webResults });
        }

        return {
          sessionId,
          policyId: params.policyId,
          answer: result.answer,
          evidence: result.evidence,
          error: result.error
        };
      } catch (error) {
        logger.error("Failed to run Q&A", { sessionId, policyId: params.policyId, error });
        return {
          sessionId,
          policyId: params.policyId,
          answer: PROCESSING_FAILURE_ANSWER,
          evidence: [],
          error: toErrorMessage(error, "Failed to run Q&A")
        };
      }
    },

    async resetSession(sessionId: string): Promise<boolean> {
      try {
        return await deps.sessions.deleteSession(sessionId);
      } catch (error) {
        logger.error("Failed to reset session", { sessionId, error });
        return false;
      }
    }
  };
}

export type ChatController = ReturnType<typeof createChatController>;
