import type { ILogger, ISequenceAllocator } from "@chatseq/sequencer";
import { randomBytes } from "node:crypto";
import type { Application } from "../../domain/entities/Application";
import {
  isApplication,
  type ApplicationPayload,
  type ChatEntity,
  type ChatEntityPayload,
} from "../../domain/entities/ChatEntity";
import type { IPayloadValidator } from "../../domain/ports/IPayloadValidator";
import { APPS_SCOPE } from "../../domain/scopes";
import { expectEntity } from "./expectEntity";

export function newToken() {
  return randomBytes(16).toString("hex");
}

export class CreateApplication {
  constructor(
    private allocator: ISequenceAllocator<ChatEntityPayload, ChatEntity>,
    private validator: IPayloadValidator,
    private generateToken: () => string = newToken,
    private logger?: ILogger
  ) {}

  async execute(name: string): Promise<Application> {
    const payload: ApplicationPayload = { kind: "application", name, token: this.generateToken() };
    const invalid = this.validator.check(payload);
    if (invalid) throw invalid;

    const { record, number } = await this.allocator.allocate(APPS_SCOPE, payload);
    this.logger?.log("Application is created", { number });

    return expectEntity(record, isApplication);
  }
}
