import type { Command } from "./types";

export const version: Command = {
  name: "version",
  describe: "Show the CLI version",
  run(ctx) {
    if (ctx.presenter.isJSON) {
      ctx.presenter.json({ ok: true, version: ctx.cliVersion });
      return 0;
    }
    ctx.presenter.write(ctx.cliVersion);
    return 0;
  },
};
