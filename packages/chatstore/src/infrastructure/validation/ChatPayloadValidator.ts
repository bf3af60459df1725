import type { ValidateFunction } from "ajv";
import type { ChatEntityPayload } from "../../domain/entities/ChatEntity";
import { ValidationError } from "../../domain/errors";
import type { IPayloadValidator } from "../../domain/ports/IPayloadValidator";
import type { SchemaCompiler } from "./SchemaCompiler";
import {
  applicationPayloadSchema,
  chatPayloadSchema,
  messagePayloadSchema,
} from "./schemas";

export class ChatPayloadValidator implements IPayloadValidator {
  private validators: {
    [K in ChatEntityPayload["kind"]]: ValidateFunction<Extract<ChatEntityPayload, { kind: K }>>;
  };

  constructor(private compiler: SchemaCompiler) {
    this.validators = {
      application: compiler.compile(applicationPayloadSchema),
      chat: compiler.compile(chatPayloadSchema),
      message: compiler.compile(messagePayloadSchema),
    };
  }

  check(payload: ChatEntityPayload): ValidationError | undefined {
    const validate = this.validators[payload.kind];
    if (validate(payload)) return undefined;
    return new ValidationError(this.compiler.errorsText(validate.errors));
  }
}
