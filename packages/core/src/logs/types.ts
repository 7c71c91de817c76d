/**
 * Receives log lines tagged with the service that produced them.
 * Backends drive `log` once per line, in delivery order.
 */
export interface LogConsumer {
  log(service: string, line: string): void;
}

export type LogEmitter = LogConsumer["log"];
