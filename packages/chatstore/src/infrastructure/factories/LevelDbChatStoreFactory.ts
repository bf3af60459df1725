import type { ILogger } from "@chatseq/sequencer";
import { Level } from "level";
import { MemoryLevel } from "memory-level";
import type { IChildCounter } from "../../domain/ports/IChildCounter";
import type { IChatReader } from "../../domain/ports/IChatReader";
import type { IEntityUpdater } from "../../domain/ports/IEntityUpdater";
import type { IPayloadValidator } from "../../domain/ports/IPayloadValidator";
import type { ChatDb } from "../leveldb/ChatDb";
import { LevelDbChatReader } from "../leveldb/LevelDbChatReader";
import { LevelDbChildCounter } from "../leveldb/LevelDbChildCounter";
import { LevelDbCommittedReader } from "../leveldb/LevelDbCommittedReader";
import { LevelDbDurableStore } from "../leveldb/LevelDbDurableStore";
import { LevelDbEntityInserter } from "../leveldb/LevelDbEntityInserter";
import { LevelDbEntityUpdater } from "../leveldb/LevelDbEntityUpdater";
import { LevelDbMaxNumberReader } from "../leveldb/LevelDbMaxNumberReader";
import { LevelDbScopeChecker } from "../leveldb/LevelDbScopeChecker";
import { LevelDbScopeSampler } from "../leveldb/LevelDbScopeSampler";
import { LevelDbSlotReader } from "../leveldb/LevelDbSlotReader";
import { MsgpackSlotSerializer } from "../serialization/MsgpackSlotSerializer";
import { KeyedMutex } from "../util/KeyedMutex";
import { ChatPayloadValidator } from "../validation/ChatPayloadValidator";
import { SchemaCompiler } from "../validation/SchemaCompiler";

export interface ILevelDbChatStore {
  durable: LevelDbDurableStore;
  reader: IChatReader;
  updater: IEntityUpdater;
  childCounter: IChildCounter;
  validator: IPayloadValidator;
  close(): Promise<void>;
}

export interface LevelDbChatStoreConfig {
  now?: () => Date;
  logger?: ILogger;
}

export class LevelDbChatStoreFactory {
  async open(location: string, options: LevelDbChatStoreConfig = {}) {
    const db = new Level<string, Uint8Array>(location, { valueEncoding: "view" });
    await db.open();
    return this.create(db, options);
  }

  /** On an in-memory database, for tests and local runs. */
  createInMemory(options: LevelDbChatStoreConfig = {}) {
    return this.create(new MemoryLevel<string, Uint8Array>({ valueEncoding: "view" }), options);
  }

  create(db: ChatDb, options: LevelDbChatStoreConfig = {}): ILevelDbChatStore {
    const compiler = new SchemaCompiler();
    const serializer = new MsgpackSlotSerializer(compiler);
    const validator = new ChatPayloadValidator(compiler);
    const locks = new KeyedMutex();
    const slots = new LevelDbSlotReader(db, serializer);

    const durable = new LevelDbDurableStore(
      new LevelDbEntityInserter(db, serializer, validator, locks, options.now),
      new LevelDbMaxNumberReader(db),
      new LevelDbScopeChecker(db),
      new LevelDbCommittedReader(slots, locks),
      new LevelDbScopeSampler(db)
    );

    return {
      durable,
      reader: new LevelDbChatReader(db, slots),
      updater: new LevelDbEntityUpdater(db, slots, serializer, locks),
      childCounter: new LevelDbChildCounter(db),
      validator,
      close: async () => {
        await db.close();
        options.logger?.log("Chat store is closed");
      },
    };
  }
}
