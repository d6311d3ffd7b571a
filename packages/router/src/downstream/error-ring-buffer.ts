/**
 * Error Ring Buffer
 *
 * Fixed-capacity history of a connection's failures and stderr output, surfaced
 * through health detail.
 */

export type ErrorLogSource = 'stderr' | 'connection' | 'protocol';

export interface ErrorLogEntry {
  timestamp: string; // ISO 8601
  source: ErrorLogSource;
  message: string;
  level: 'error' | 'warn' | 'info';
}

/**
 * Keeps the last N entries; the oldest is dropped when full
 */
export class ErrorRingBuffer {
  private entries: ErrorLogEntry[] = [];
  private readonly maxSize: number;

  constructor(maxSize = 50) {
    this.maxSize = maxSize;
  }

  push(
    message: string,
    level: ErrorLogEntry['level'] = 'error',
    source: ErrorLogSource = 'connection'
  ): void {
    this.entries.push({
      timestamp: new Date().toISOString(),
      source,
      message,
      level,
    });

    if (this.entries.length > this.maxSize) {
      this.entries = this.entries.slice(-this.maxSize);
    }
  }

  getRecent(count: number): ErrorLogEntry[] {
    return count > 0 ? this.entries.slice(-count) : [];
  }
}
