export interface Application {
  kind: "application";
  number: number;
  /** 32 hex characters, the public handle of the application. */
  token: string;
  name: string;
  chatsCount: number;
  createdAt: string;
}
