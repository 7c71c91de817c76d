import { describe, it, expect, vi, beforeEach, afterEach, type Mock, type MockInstance } from "vitest";
import { EcsLogsService, type LogsFetcher } from "@stevedore/backend-ecs";
import type { track } from "@stevedore/cli-metrics";
import type { LogsBackend } from "../commands/index";
import { executeCli } from "../runtime/bootstrap";

function abortError(): Error {
  const error = new Error("This operation was aborted");
  error.name = "AbortError";
  return error;
}

const replay: LogsFetcher = {
  async getLogs(_signal, _project, emit) {
    emit("web", "line1");
    emit("db", "line2");
    emit("web", "line3");
  },
};

describe("executeCli", () => {
  let log: MockInstance<typeof console.log>;
  let error: MockInstance<typeof console.error>;
  let trackFn: Mock<typeof track>;

  beforeEach(() => {
    log = vi.spyOn(console, "log").mockImplementation(() => { });
    error = vi.spyOn(console, "error").mockImplementation(() => { });
    trackFn = vi.fn<typeof track>();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  function run(argv: string[], options: Parameters<typeof executeCli>[1] = {}) {
    return executeCli(argv, {
      env: {},
      cwd: "/work/shop",
      version: "1.2.3",
      signal: new AbortController().signal,
      track: trackFn,
      ...options,
    });
  }

  describe("logs", () => {
    it("should print only the requested services and report success", async () => {
      const argv = ["logs", "-p", "shop", "web"];
      const code = await run(argv, { contextType: "ecs", logsBackend: new EcsLogsService(replay) });

      expect(code).toBe(0);
      expect(log.mock.calls).toEqual([["Attaching to shop: web"], ["web | line1"], ["web | line3"]]);
      expect(trackFn).toHaveBeenCalledWith("ecs", argv, "success", { env: {} });
    });

    it("should drop the attach notice under --quiet", async () => {
      const argv = ["logs", "-q", "-p", "shop", "web"];
      const code = await run(argv, { logsBackend: new EcsLogsService(replay) });

      expect(code).toBe(0);
      expect(log.mock.calls).toEqual([["web | line1"], ["web | line3"]]);
      expect(trackFn).toHaveBeenCalledWith("local", argv, "success", { env: {} });
    });

    it("should default the project to the directory name and pass follow", async () => {
      const logsBackend = { logs: vi.fn<LogsBackend["logs"]>(async () => {}) };

      await run(["logs", "-f", "web", "db"], { logsBackend });

      expect(logsBackend.logs).toHaveBeenCalledWith(
        expect.any(AbortSignal),
        "shop",
        expect.objectContaining({ log: expect.any(Function) }),
        { services: ["web", "db"], follow: true },
      );
    });

    it("should accept --follow=true and --follow=false", async () => {
      const logsBackend = { logs: vi.fn<LogsBackend["logs"]>(async () => {}) };

      await run(["logs", "--follow=true"], { logsBackend });
      await run(["logs", "--follow=false", "web"], { logsBackend });

      expect(logsBackend.logs.mock.calls.map((call) => call[3])).toEqual([
        { services: [], follow: true },
        { services: ["web"], follow: false },
      ]);
    });

    it("should reject any other value on --follow", async () => {
      const logsBackend = { logs: vi.fn<LogsBackend["logs"]>(async () => {}) };

      const code = await run(["logs", "--follow=always"], { logsBackend });

      expect(code).toBe(64);
      expect(error).toHaveBeenCalledWith('Flag --follow takes true or false, got "always"');
      expect(logsBackend.logs).not.toHaveBeenCalled();
    });

    it("should treat --json after -- as a service name", async () => {
      const logsBackend = { logs: vi.fn<LogsBackend["logs"]>(async () => {}) };

      await run(["logs", "--", "--json"], { logsBackend });

      expect(logsBackend.logs.mock.calls[0]?.[3]).toEqual({ services: ["--json"], follow: false });
      expect(log.mock.calls).toEqual([["Attaching to shop: --json"]]);
    });

    it("should print JSON lines under --json", async () => {
      await run(["--json", "logs", "db"], { logsBackend: new EcsLogsService(replay) });

      expect(log.mock.calls).toEqual([['{"service":"db","line":"line2"}']]);
    });

    it("should end a canceled follow cleanly and report it as canceled", async () => {
      const controller = new AbortController();
      const fetcher: LogsFetcher = {
        async getLogs(_signal, _project, emit) {
          emit("web", "ready");
          controller.abort();
          throw abortError();
        },
      };

      const code = await run(["logs", "--follow"], {
        signal: controller.signal,
        logsBackend: new EcsLogsService(fetcher),
      });

      expect(code).toBe(0);
      expect(log.mock.calls).toEqual([["Attaching to shop"], ["web | ready"]]);
      expect(trackFn).toHaveBeenCalledWith("local", ["logs", "--follow"], "canceled", { env: {} });
    });

    it("should surface backend failures and report them", async () => {
      const fetcher: LogsFetcher = {
        async getLogs() {
          throw new Error("project shop not found");
        },
      };

      const code = await run(["logs"], { logsBackend: new EcsLogsService(fetcher) });

      expect(code).toBe(1);
      expect(error).toHaveBeenCalledWith("project shop not found");
      expect(trackFn).toHaveBeenCalledWith("local", ["logs"], "failure", { env: {} });
    });

    it("should stop a follow on SIGINT and remove its handler", async () => {
      const fetcher: LogsFetcher = {
        getLogs: (signal, _project, emit) =>
          new Promise<void>((_resolve, reject) => {
            emit("web", "ready");
            signal.addEventListener("abort", () => reject(abortError()), { once: true });
          }),
      };
      const listeners = process.listenerCount("SIGINT");

      const pending = executeCli(["logs", "-f"], {
        env: {},
        cwd: "/work/shop",
        track: trackFn,
        logsBackend: new EcsLogsService(fetcher),
      });
      expect(process.listenerCount("SIGINT")).toBe(listeners + 1);
      process.emit("SIGINT", "SIGINT");

      expect(await pending).toBe(0);
      expect(log.mock.calls).toEqual([["Attaching to shop"], ["web | ready"]]);
      expect(trackFn).toHaveBeenCalledWith("local", ["logs", "-f"], "canceled", { env: {} });
      expect(process.listenerCount("SIGINT")).toBe(listeners);
    });

    it("should fail without a logs backend", async () => {
      const code = await run(["logs"]);

      expect(code).toBe(69);
      expect(error).toHaveBeenCalledWith('No logs backend for context type "local"');
    });
  });

  describe("version", () => {
    it("should print the version", async () => {
      expect(await run(["version"])).toBe(0);
      expect(log).toHaveBeenCalledWith("1.2.3");
    });

    it("should treat --version as the version command", async () => {
      await run(["--version"]);

      expect(log).toHaveBeenCalledWith("1.2.3");
      expect(trackFn).toHaveBeenCalledWith("local", ["--version"], "success", { env: {} });
    });

    it("should print JSON under --json", async () => {
      await run(["version", "--json"]);

      expect(log).toHaveBeenCalledWith('{"ok":true,"version":"1.2.3"}');
    });
  });

  describe("errors and help", () => {
    it("should reject unknown commands with a usage exit code", async () => {
      const code = await run(["frobnicate", "now"]);

      expect(code).toBe(64);
      expect(error).toHaveBeenCalledWith("Unknown command: frobnicate");
      expect(trackFn).toHaveBeenCalledWith("local", ["frobnicate", "now"], "failure", { env: {} });
    });

    it("should report parse errors", async () => {
      const code = await run(["--log-level", "loud", "logs"]);

      expect(code).toBe(64);
      expect(error).toHaveBeenCalledWith("Invalid log level: loud");
    });

    it("should print help without a command", async () => {
      expect(await run([])).toBe(0);
      expect(log.mock.calls[0]).toEqual(["Usage: stevedore [OPTIONS] COMMAND"]);
      expect(log).toHaveBeenCalledWith("  logs     View output from the services of a project");
    });

    it("should print command help with flags and examples", async () => {
      const logsBackend = { logs: vi.fn<LogsBackend["logs"]>(async () => {}) };

      expect(await run(["logs", "--help"], { logsBackend })).toBe(0);
      expect(log.mock.calls[0]).toEqual(["Usage: stevedore logs [OPTIONS]"]);
      expect(log).toHaveBeenCalledWith("  stevedore logs -f -p shop web");
      expect(logsBackend.logs).not.toHaveBeenCalled();
    });

    it("should take the context type from the environment", async () => {
      await run(["version"], { env: { STEVEDORE_CONTEXT_TYPE: "ecs" } });

      expect(trackFn).toHaveBeenCalledWith("ecs", ["version"], "success", {
        env: { STEVEDORE_CONTEXT_TYPE: "ecs" },
      });
    });
  });
});
