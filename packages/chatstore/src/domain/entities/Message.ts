export interface Message {
  kind: "message";
  appNumber: number;
  chatNumber: number;
  number: number;
  body: string;
  createdAt: string;
}
