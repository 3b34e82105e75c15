export interface EngineLogger {
  debug(message: string): void;
  warn(message: string): void;
}
