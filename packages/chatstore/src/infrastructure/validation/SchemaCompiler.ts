import type {
  Options as AjvOptions,
  ErrorObject,
  JSONSchemaType,
  ValidateFunction,
} from "ajv";
import Ajv from "ajv";

/** One Ajv instance per store; Ajv caches compiled schemas by object. */
export class SchemaCompiler {
  private ajv: Ajv;

  constructor(options?: AjvOptions) {
    this.ajv = new Ajv({
      allErrors: true,
      coerceTypes: false,
      useDefaults: true,
      ...options,
    });
  }

  compile<T>(schema: JSONSchemaType<T>): ValidateFunction<T> {
    return this.ajv.compile(schema);
  }

  errorsText(errors: ErrorObject[] | null | undefined, dataVar = "payload") {
    return this.ajv.errorsText(errors, { dataVar });
  }
}
