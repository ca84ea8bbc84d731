/**
 * Minimal tagged logger. Everything goes to stderr: under the stdio transport
 * stdout carries the MCP protocol stream and must stay clean.
 */
export interface Logger {
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
  /** Emitted only when verbose logging is enabled. */
  debug(message: string, ...details: unknown[]): void;
  /** Credential failures get their own category so they stand out in logs. */
  auth(message: string, ...details: unknown[]): void;
}

class ConsoleLogger implements Logger {
  private verbose = false;

  public constructor(private readonly tag: string) {}

  public setVerbose(v: boolean): void {
    this.verbose = v;
  }

  public isVerbose(): boolean {
    return this.verbose;
  }

  public info(message: string, ...details: unknown[]): void {
    console.error(`[${this.tag}] ${message}`, ...details);
  }

  public warn(message: string, ...details: unknown[]): void {
    console.error(`[${this.tag}][warn] ${message}`, ...details);
  }

  public error(message: string, ...details: unknown[]): void {
    console.error(`[${this.tag}][error] ${message}`, ...details);
  }

  public debug(message: string, ...details: unknown[]): void {
    if (!this.verbose) return;
    console.error(`[${this.tag}][verbose] ${message}`, ...details);
  }

  public auth(message: string, ...details: unknown[]): void {
    console.error(`[${this.tag}][auth] ${message}`, ...details);
  }
}

// Shared instance; VERBOSE is applied once config has been read.
export const log = new ConsoleLogger("RAG");
