export class DebugLogger {
  enabled: boolean;
  private writeStderr: (line: string) => void;

  constructor(enabled = false, writeStderr: (line: string) => void = (line) => console.error(line)) {
    this.enabled = enabled;
    this.writeStderr = writeStderr;
  }

  debug(message: string): void {
    if (!this.enabled) return;
    this.writeStderr(`[DEBUG] ${new Date().toISOString()} ${message}`);
  }
}
