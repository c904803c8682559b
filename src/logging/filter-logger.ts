import chalk from 'chalk';
import type { FilterEvent, FilterEventType } from '../filter/event-reporter.js';
import type { EventLog } from './event-log.js';

export interface FilterLoggerOptions {
  /** Print records to the console. */
  console: boolean;
  eventLog?: EventLog | null;
}

const headlineColors: Record<FilterEventType, (text: string) => string> = {
  filter_start: chalk.cyan,
  original_prompt: chalk.blue,
  section_removed: chalk.yellow,
  filtered_prompt: chalk.green,
  filter_summary: chalk.bold.green,
  passthrough: chalk.gray,
};

export function formatEvent(event: FilterEvent): string {
  const [headline, ...body] = event.text.split('\n');
  const color = headlineColors[event.type];
  if (body.length === 0) {
    return color(headline);
  }
  return `${color(headline)}\n${chalk.dim(body.join('\n'))}`;
}

/**
 * Sends rendered filter events to the console and the JSONL event log.
 */
export class FilterLogger {
  private options: FilterLoggerOptions;

  constructor(options: Partial<FilterLoggerOptions> = {}) {
    this.options = {
      console: true,
      eventLog: null,
      ...options,
    };
  }

  emit(events: FilterEvent[]): void {
    for (const event of events) {
      if (this.options.console) {
        console.log(formatEvent(event));
      }
      this.persist(event.type, event.data);
    }
  }

  info(message: string): void {
    if (this.options.console) {
      console.log(`${chalk.gray('[Proxy]')} ${message}`);
    }
  }

  warn(message: string, data: Record<string, unknown> = {}): void {
    if (this.options.console) {
      console.warn(`${chalk.yellow('[Proxy]')} ${message}`);
    }
    this.persist('proxy_warning', { message, ...data });
  }

  error(message: string, data: Record<string, unknown> = {}): void {
    if (this.options.console) {
      console.error(`${chalk.red('[Proxy]')} ${message}`);
    }
    this.persist('proxy_error', { message, ...data });
  }

  private persist(type: string, data: Record<string, unknown>): void {
    if (!this.options.eventLog) {
      return;
    }
    try {
      this.options.eventLog.append(type, data);
    } catch (error) {
      console.warn('[Proxy] Failed to write event log:', error instanceof Error ? error.message : String(error));
    }
  }
}
