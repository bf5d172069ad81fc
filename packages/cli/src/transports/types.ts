/** A line-oriented channel to a UCI engine. */
export interface UciTransport {
  send(command: string): void;
  onLine(listener: (line: string) => void): void;
  /** Called once if the engine goes away on its own */
  onExit(listener: (error: Error) => void): void;
  close(): void;
}
