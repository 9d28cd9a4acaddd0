import type { AnsweredQuery, ChatMessage, ChatSession, ConversationTurn } from "@finscope/shared";
import { ChatSessionNotFoundError } from "../errors.js";
import type { RunOptions } from "../pipeline/types.js";
import type { ChatStoreLike } from "./ChatStore.js";
import type { AskInput } from "./QueryService.js";

export interface QueryAnswerer {
  ask(input: AskInput, runOptions?: RunOptions): Promise<AnsweredQuery>;
}

interface ChatServiceOptions {
  historyLimit: number;
}

const defaultOptions: ChatServiceOptions = {
  historyLimit: 20
};

interface SendMessageInput {
  sessionId: string;
  content: string;
  k?: number;
}

export class ChatService {
  private readonly options: ChatServiceOptions;

  constructor(
    private readonly chatStore: ChatStoreLike,
    private readonly answerer: QueryAnswerer,
    options: Partial<ChatServiceOptions> = {}
  ) {
    this.options = {
      ...defaultOptions,
      ...options
    };
  }

  createSession(input: { title: string; documentIds?: string[] }): ChatSession {
    return this.chatStore.createSession(input);
  }

  listSessions(limit?: number): ChatSession[] {
    return this.chatStore.listSessions(limit);
  }

  getSessionWithMessages(sessionId: string): { session: ChatSession; messages: ChatMessage[] } | null {
    return this.chatStore.getSessionWithMessages(sessionId);
  }

  deleteSession(sessionId: string): boolean {
    return this.chatStore.deleteSession(sessionId);
  }

  /**
   * Answers a question in the context of a session. Earlier turns become the
   * conversation history; both the question and the answer are stored.
   */
  async sendMessage(
    input: SendMessageInput,
    runOptions: RunOptions = {}
  ): Promise<{ message: ChatMessage; result: AnsweredQuery }> {
    const session = this.chatStore.getSessionById(input.sessionId);
    if (!session) {
      throw new ChatSessionNotFoundError(input.sessionId);
    }

    const history: ConversationTurn[] = this.chatStore
      .listMessagesBySession(input.sessionId)
      .slice(-this.options.historyLimit)
      .map((message) => ({ role: message.role, content: message.content }));

    const askInput: AskInput = { query: input.content, history };
    if (session.documentIds.length > 0) {
      askInput.filter = { documentIds: session.documentIds };
    }
    if (input.k !== undefined) {
      askInput.k = input.k;
    }

    const result = await this.answerer.ask(askInput, runOptions);

    const { answer: message } = this.chatStore.addExchange(input.sessionId, input.content, {
      content: result.answer,
      citations: result.citations,
      status: result.status,
      groundingViolation: result.groundingViolation
    });

    return { message, result };
  }
}
