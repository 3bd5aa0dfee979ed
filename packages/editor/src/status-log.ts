export type StatusLevel = 'success' | 'warning' | 'error';

export interface StatusEntry {
  level: StatusLevel;
  message: string;
  timestamp: Date;
}

export const STATUS_LOG_LIMIT = 50;

/** Most recent session messages, oldest dropped first. */
export class StatusLog {
  private readonly items: StatusEntry[] = [];

  constructor(readonly maxEntries: number = STATUS_LOG_LIMIT) {}

  push(level: StatusLevel, message: string): void {
    this.items.push({ level, message, timestamp: new Date() });
    if (this.items.length > this.maxEntries) this.items.splice(0, this.items.length - this.maxEntries);
  }

  success(message: string): void {
    this.push('success', message);
  }

  warning(message: string): void {
    this.push('warning', message);
  }

  error(message: string): void {
    this.push('error', message);
  }

  entries(): readonly StatusEntry[] {
    return this.items;
  }

  last(): StatusEntry | undefined {
    return this.items[this.items.length - 1];
  }

  clear(): void {
    this.items.length = 0;
  }

  get size(): number {
    return this.items.length;
  }
}
