import type { LogConsumer } from "./types";

/**
 * Forwards only the lines of allowed services to the wrapped consumer.
 * An empty allow-list forwards everything.
 */
export class FilteredLogConsumer implements LogConsumer {
  private readonly allowed: ReadonlySet<string>;

  constructor(private readonly consumer: LogConsumer, services: Iterable<string>) {
    this.allowed = new Set(services);
  }

  log(service: string, line: string): void {
    if (this.allowed.size > 0 && !this.allowed.has(service)) {
      return;
    }
    this.consumer.log(service, line);
  }
}

export function filterLogConsumer(consumer: LogConsumer, services: Iterable<string>): LogConsumer {
  return new FilteredLogConsumer(consumer, services);
}
