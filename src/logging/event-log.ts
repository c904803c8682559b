import { existsSync, mkdirSync, readFileSync, appendFileSync } from 'fs';
import path from 'path';
import { APP_NAME, APP_VERSION } from '../version.js';

export interface EventLogEntry {
  timestamp: string;
  type: string;
  data: Record<string, unknown>;
}

export interface EventLogExport {
  generatedAt: string;
  app: {
    name: string;
    version: string;
  };
  entries: EventLogEntry[];
}

/**
 * Append-only JSONL file of filter events, one record per line.
 */
export class EventLog {
  private logFile: string;

  constructor(private logsPath: string, fileName = 'filter-events.jsonl') {
    if (!existsSync(logsPath)) {
      mkdirSync(logsPath, { recursive: true });
    }
    this.logFile = path.join(logsPath, fileName);
  }

  getLogFile(): string {
    return this.logFile;
  }

  append(type: string, data: Record<string, unknown>, timestamp: Date = new Date()): void {
    const entry: EventLogEntry = {
      timestamp: timestamp.toISOString(),
      type,
      data,
    };

    appendFileSync(this.logFile, `${JSON.stringify(entry)}\n`, 'utf8');
  }

  readRecent(limit = 200): EventLogEntry[] {
    const lines = this.readLines();
    if (lines.length === 0 || limit <= 0) {
      return [];
    }

    return lines
      .slice(-limit)
      .map((line) => this.parseLine(line))
      .filter((entry): entry is EventLogEntry => entry !== null);
  }

  exportBundle(limit = 2000): EventLogExport {
    return {
      generatedAt: new Date().toISOString(),
      app: {
        name: APP_NAME,
        version: APP_VERSION,
      },
      entries: this.readRecent(limit),
    };
  }

  private readLines(): string[] {
    if (!existsSync(this.logFile)) {
      return [];
    }

    const content = readFileSync(this.logFile, 'utf8');
    return content.split('\n').filter((line) => line.trim().length > 0);
  }

  private parseLine(line: string): EventLogEntry | null {
    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch {
      return null;
    }

    if (
      typeof parsed === 'object' && parsed !== null &&
      'timestamp' in parsed && typeof parsed.timestamp === 'string' &&
      'type' in parsed && typeof parsed.type === 'string' &&
      'data' in parsed && typeof parsed.data === 'object' && parsed.data !== null
    ) {
      return { timestamp: parsed.timestamp, type: parsed.type, data: { ...parsed.data } };
    }
    return null;
  }
}
