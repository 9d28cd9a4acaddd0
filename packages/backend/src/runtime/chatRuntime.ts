import { appConfig } from "../config.js";
import { ChatStore, type ChatStoreLike } from "../services/ChatStore.js";
import { InMemoryChatStore } from "../services/InMemoryChatStore.js";
import { logger } from "../utils/logger.js";

let chatStoreSingleton: ChatStoreLike | null = null;

function openChatStore(): ChatStoreLike {
  try {
    const store = new ChatStore({ dbPath: appConfig.CHAT_DB_PATH });
    logger.info({ dbPath: appConfig.CHAT_DB_PATH }, "Chat sessions stored in SQLite");
    return store;
  } catch (error) {
    logger.warn({ err: error }, "SQLite chat store unavailable; sessions will not survive a restart");
    return new InMemoryChatStore();
  }
}

export function getChatStoreSingleton(): ChatStoreLike {
  if (!chatStoreSingleton) {
    chatStoreSingleton = openChatStore();
  }

  return chatStoreSingleton;
}

export function closeChatStoreSingleton(): void {
  chatStoreSingleton?.close();
  chatStoreSingleton = null;
}
