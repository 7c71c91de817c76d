import type { Presenter } from "./types";

export function createJsonPresenter(): Presenter {
  return {
    isTTY: false,
    isQuiet: false,
    isJSON: true,
    write: (_line) => { },  // no-op in JSON mode
    info: (_line) => { },
    warn: (_line) => { },
    error: (line) =>
      console.log(JSON.stringify({ ok: false, error: { message: line } })),
    json: (payload) => {
      console.log(JSON.stringify(payload));
    },
  };
}
