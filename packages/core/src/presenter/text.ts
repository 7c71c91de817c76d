import type { Presenter } from "./types";

export function createTextPresenter(isQuiet: boolean = false): Presenter {
  const isTTY = process.stdout.isTTY === true;
  return {
    isTTY,
    isQuiet,
    isJSON: false,
    // command output is never silenced; --quiet only drops chatter
    write: (line) => {
      console.log(line);
    },
    info: (line) => {
      if (!isQuiet) {
        console.log(line);
      }
    },
    warn: (line) => {
      if (!isQuiet) {
        console.warn(line);
      }
    },
    error: (line) => console.error(line),
    json: (_payload) => {
      throw new Error("json() called in text mode");
    },
  };
}
