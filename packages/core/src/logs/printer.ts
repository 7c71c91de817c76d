import type { Presenter } from "../presenter/types";
import type { LogConsumer } from "./types";

/**
 * Prints `service | line`, padding the service column to the widest name seen so far.
 * In JSON mode every line becomes one `{ service, line }` object.
 */
export function createLogPrinter(presenter: Presenter): LogConsumer {
  let width = 0;
  return {
    log(service, line) {
      if (presenter.isJSON) {
        presenter.json({ service, line });
        return;
      }
      width = Math.max(width, service.length);
      presenter.write(`${service.padEnd(width)} | ${line}`);
    },
  };
}
