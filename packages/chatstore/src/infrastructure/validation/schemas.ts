import type { JSONSchemaType } from "ajv";
import type { Application } from "../../domain/entities/Application";
import type { Chat } from "../../domain/entities/Chat";
import type {
  ApplicationPayload,
  ChatPayload,
  MessagePayload,
  StoredSlot,
} from "../../domain/entities/ChatEntity";
import type { Message } from "../../domain/entities/Message";

export const MAX_NAME_LENGTH = 255;
export const MAX_BODY_LENGTH = 65_535;
export const TOKEN_PATTERN = "^[0-9a-f]{32}$";

const positiveInteger = { type: "integer", minimum: 1 } as const;
const count = { type: "integer", minimum: 0 } as const;
const timestamp = { type: "string", minLength: 1 } as const;

export const applicationPayloadSchema: JSONSchemaType<ApplicationPayload> = {
  type: "object",
  properties: {
    kind: { type: "string", const: "application" },
    name: { type: "string", minLength: 1, maxLength: MAX_NAME_LENGTH, pattern: "\\S" },
    token: { type: "string", pattern: TOKEN_PATTERN },
  },
  required: ["kind", "name", "token"],
  additionalProperties: false,
};

export const chatPayloadSchema: JSONSchemaType<ChatPayload> = {
  type: "object",
  properties: {
    kind: { type: "string", const: "chat" },
  },
  required: ["kind"],
  additionalProperties: false,
};

export const messagePayloadSchema: JSONSchemaType<MessagePayload> = {
  type: "object",
  properties: {
    kind: { type: "string", const: "message" },
    body: { type: "string", minLength: 1, maxLength: MAX_BODY_LENGTH },
  },
  required: ["kind", "body"],
  additionalProperties: false,
};

const applicationSchema: JSONSchemaType<Application> = {
  type: "object",
  properties: {
    kind: { type: "string", const: "application" },
    number: positiveInteger,
    token: { type: "string", pattern: TOKEN_PATTERN },
    name: { type: "string" },
    chatsCount: count,
    createdAt: timestamp,
  },
  required: ["kind", "number", "token", "name", "chatsCount", "createdAt"],
};

const chatSchema: JSONSchemaType<Chat> = {
  type: "object",
  properties: {
    kind: { type: "string", const: "chat" },
    appNumber: positiveInteger,
    number: positiveInteger,
    messagesCount: count,
    createdAt: timestamp,
  },
  required: ["kind", "appNumber", "number", "messagesCount", "createdAt"],
};

const messageSchema: JSONSchemaType<Message> = {
  type: "object",
  properties: {
    kind: { type: "string", const: "message" },
    appNumber: positiveInteger,
    chatNumber: positiveInteger,
    number: positiveInteger,
    body: { type: "string" },
    createdAt: timestamp,
  },
  required: ["kind", "appNumber", "chatNumber", "number", "body", "createdAt"],
};

export const applicationSlotSchema: JSONSchemaType<StoredSlot<Application>> = {
  type: "object",
  properties: { attemptId: { type: "string" }, entity: applicationSchema },
  required: ["attemptId", "entity"],
};

export const chatSlotSchema: JSONSchemaType<StoredSlot<Chat>> = {
  type: "object",
  properties: { attemptId: { type: "string" }, entity: chatSchema },
  required: ["attemptId", "entity"],
};

export const messageSlotSchema: JSONSchemaType<StoredSlot<Message>> = {
  type: "object",
  properties: { attemptId: { type: "string" }, entity: messageSchema },
  required: ["attemptId", "entity"],
};
