import type { ChatEntityPayload } from "../entities/ChatEntity";
import type { ValidationError } from "../errors";

export interface IPayloadValidator {
  check(payload: ChatEntityPayload): ValidationError | undefined;
}
