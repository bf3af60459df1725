export interface IStoreCloser {
  close(): Promise<void>;
}
