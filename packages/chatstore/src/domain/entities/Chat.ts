export interface Chat {
  kind: "chat";
  appNumber: number;
  number: number;
  messagesCount: number;
  createdAt: string;
}
