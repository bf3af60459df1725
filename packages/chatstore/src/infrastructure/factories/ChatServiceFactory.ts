import type { ChatEntity, ChatEntityPayload } from "../../domain/entities/ChatEntity";
import type { ILogger, ISequenceAllocator } from "@chatseq/sequencer";
import { ChatService } from "../../application/services/ChatService";
import { ChildCountRefresher } from "../../application/services/ChildCountRefresher";
import { CreateApplication, newToken } from "../../application/usecases/CreateApplication";
import { CreateChat } from "../../application/usecases/CreateChat";
import { CreateMessage } from "../../application/usecases/CreateMessage";
import { RefreshChildCount } from "../../application/usecases/RefreshChildCount";
import { RenameApplication } from "../../application/usecases/RenameApplication";
import type { ILevelDbChatStore } from "./LevelDbChatStoreFactory";

export interface ChatServiceOptions {
  logger?: ILogger;
  generateToken?: () => string;
}

export class ChatServiceFactory {
  create(
    allocator: ISequenceAllocator<ChatEntityPayload, ChatEntity>,
    store: ILevelDbChatStore,
    { logger, generateToken = newToken }: ChatServiceOptions = {}
  ) {
    const { reader, updater, childCounter, validator } = store;
    const refresher = new ChildCountRefresher(
      new RefreshChildCount(childCounter, updater),
      childCounter,
      logger
    );

    return new ChatService(
      reader,
      new CreateApplication(allocator, validator, generateToken, logger),
      new RenameApplication(reader, updater, validator),
      new CreateChat(allocator, reader, refresher),
      new CreateMessage(allocator, reader, validator, refresher),
      refresher
    );
  }
}
