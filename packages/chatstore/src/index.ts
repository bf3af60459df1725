export * from "./application/httpStatusFor";
export * from "./application/interfaces/IChatService";
export * from "./application/services/ChildCountRefresher";
export * from "./domain/entities/Application";
export * from "./domain/entities/Chat";
export * from "./domain/entities/ChatEntity";
export * from "./domain/entities/Message";
export * from "./domain/errors";
export * from "./domain/ports/IChatReader";
export * from "./domain/scopes";
export * from "./infrastructure/factories/ChatServiceFactory";
export * from "./infrastructure/factories/LevelDbChatStoreFactory";
export type { ChatDb } from "./infrastructure/leveldb/ChatDb";
