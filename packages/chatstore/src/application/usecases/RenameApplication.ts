import type { Application } from "../../domain/entities/Application";
import { NotFoundError } from "../../domain/errors";
import type { IChatReader } from "../../domain/ports/IChatReader";
import type { IEntityUpdater } from "../../domain/ports/IEntityUpdater";
import type { IPayloadValidator } from "../../domain/ports/IPayloadValidator";

export class RenameApplication {
  constructor(
    private reader: IChatReader,
    private updater: IEntityUpdater,
    private validator: IPayloadValidator
  ) {}

  async execute(token: string, name: string): Promise<Application> {
    const app = await this.reader.getApplication(token);
    if (!app) throw new NotFoundError("application", token);

    const invalid = this.validator.check({ kind: "application", name, token });
    if (invalid) throw invalid;

    const renamed = await this.updater.renameApplication(app.number, name);
    if (!renamed) throw new NotFoundError("application", token);
    return renamed;
  }
}
