import { decode, encode } from "@msgpack/msgpack";
import type { ValidateFunction } from "ajv";
import type { Application } from "../../domain/entities/Application";
import type { Chat } from "../../domain/entities/Chat";
import type { StoredSlot } from "../../domain/entities/ChatEntity";
import type { Message } from "../../domain/entities/Message";
import type { ISerializer } from "../../domain/ports/ISerializer";
import type { SchemaCompiler } from "../validation/SchemaCompiler";
import {
  applicationSlotSchema,
  chatSlotSchema,
  messageSlotSchema,
} from "../validation/schemas";

/** msgpack on the way in; on the way out the shape is checked before it is trusted. */
export class MsgpackSlotSerializer implements ISerializer<StoredSlot> {
  private isApplicationSlot: ValidateFunction<StoredSlot<Application>>;
  private isChatSlot: ValidateFunction<StoredSlot<Chat>>;
  private isMessageSlot: ValidateFunction<StoredSlot<Message>>;

  constructor(private compiler: SchemaCompiler) {
    this.isApplicationSlot = compiler.compile(applicationSlotSchema);
    this.isChatSlot = compiler.compile(chatSlotSchema);
    this.isMessageSlot = compiler.compile(messageSlotSchema);
  }

  serialize(slot: StoredSlot): Uint8Array {
    return encode(slot);
  }

  deserialize(bytes: Uint8Array): StoredSlot {
    const data = decode(bytes);
    if (this.isApplicationSlot(data) || this.isChatSlot(data) || this.isMessageSlot(data)) {
      return data;
    }

    throw new Error(
      `Stored slot is malformed: ${this.compiler.errorsText(this.isMessageSlot.errors, "slot")}`
    );
  }
}
