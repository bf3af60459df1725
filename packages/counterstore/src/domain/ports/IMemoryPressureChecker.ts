export interface IMemoryPressureChecker {
  isPressured(): boolean;
}
