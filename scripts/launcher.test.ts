import { describe, it, expect, vi } from "vitest";
import {
  Launcher,
  browserCommand,
  buildServiceSteps,
  chatPageUrl,
  colorize,
  trainingCommand,
  type LauncherDeps,
  type ManagedProcess,
} from "./launcher.js";

const ports = { actionServer: 5055, dialogueServer: 5005, frontend: 8000 };

class FakeChild implements ManagedProcess {
  readonly kill = vi.fn(() => true);
  private errorListener: ((error: Error) => void) | undefined;

  once(_event: "error", listener: (error: Error) => void): this {
    this.errorListener = listener;
    return this;
  }

  fail(error: Error): void {
    this.errorListener?.(error);
  }
}

function createDeps(overrides: Partial<LauncherDeps> = {}) {
  const children: FakeChild[] = [];
  const deps: LauncherDeps = {
    spawn: vi.fn(() => {
      const child = new FakeChild();
      children.push(child);
      return child;
    }),
    isOnPath: vi.fn(() => true),
    hasTrainedModel: vi.fn(() => true),
    runToCompletion: vi.fn(() => 0),
    openBrowser: vi.fn(),
    sleep: vi.fn(async () => {}),
    print: vi.fn(),
    printError: vi.fn(),
    ...overrides,
  };
  return { deps, children };
}

describe("buildServiceSteps", () => {
  it("starts the action server, dialogue server and frontend in order", () => {
    const steps = buildServiceSteps(ports, "/usr/bin/node");

    expect(steps.map((step) => step.waitMs)).toEqual([3000, 5000, 2000]);
    expect(steps[0]?.args).toEqual([
      "--import",
      "tsx",
      "apps/actions/src/server.ts",
    ]);
    expect(steps[1]).toMatchObject({
      command: "rasa",
      args: [
        "run",
        "--enable-api",
        "--cors",
        "*",
        "--port",
        "5005",
        "--endpoints",
        "rasa/endpoints.yml",
        "--credentials",
        "rasa/credentials.yml",
        "--model",
        "models",
      ],
    });
    expect(steps[2]?.command).toBe("/usr/bin/node");
  });
});

describe("trainingCommand", () => {
  it("trains from the files under rasa/ into models/", () => {
    expect(trainingCommand()).toEqual({
      command: "rasa",
      args: [
        "train",
        "--domain",
        "rasa/domain.yml",
        "--data",
        "rasa/data",
        "--config",
        "rasa/config.yml",
        "--out",
        "models",
      ],
    });
  });
});

describe("chatPageUrl", () => {
  it("points at the chat page on the frontend port", () => {
    expect(chatPageUrl(8000)).toBe("http://localhost:8000/new_interface.html");
  });
});

describe("browserCommand", () => {
  it("picks the opener for each platform", () => {
    expect(browserCommand("http://x", "darwin")).toEqual({
      command: "open",
      args: ["http://x"],
    });
    expect(browserCommand("http://x", "linux").command).toBe("xdg-open");
    expect(browserCommand("http://x", "win32").args).toEqual([
      "/c",
      "start",
      "",
      "http://x",
    ]);
  });
});

describe("colorize", () => {
  it("wraps text in ANSI codes", () => {
    expect(colorize("ok", "green")).toBe("\u001b[92mok\u001b[0m");
    expect(colorize("hi", "blue", true)).toBe("\u001b[1m\u001b[94mhi\u001b[0m");
  });
});

describe("Launcher", () => {
  it("stops before spawning anything when rasa is missing", async () => {
    const { deps } = createDeps({ isOnPath: vi.fn(() => false) });
    const launcher = new Launcher("/srv/mindease", ports, deps);

    await expect(launcher.start()).resolves.toBe(false);
    expect(deps.spawn).not.toHaveBeenCalled();
    expect(deps.printError).toHaveBeenCalledWith(
      colorize("✗ The 'rasa' executable was not found on PATH.", "red"),
    );
  });

  it("trains a dialogue model first when none exists", async () => {
    const { deps } = createDeps({ hasTrainedModel: vi.fn(() => false) });
    const launcher = new Launcher("/srv/mindease", ports, deps);

    await expect(launcher.start()).resolves.toBe(true);

    expect(deps.hasTrainedModel).toHaveBeenCalledWith("/srv/mindease/models");
    expect(deps.runToCompletion).toHaveBeenCalledWith(
      "rasa",
      trainingCommand().args,
      "/srv/mindease",
    );
    expect(deps.spawn).toHaveBeenCalledTimes(3);
  });

  it("stops when training fails", async () => {
    const { deps } = createDeps({
      hasTrainedModel: vi.fn(() => false),
      runToCompletion: vi.fn(() => 2),
    });
    const launcher = new Launcher("/srv/mindease", ports, deps);

    await expect(launcher.start()).resolves.toBe(false);
    expect(deps.spawn).not.toHaveBeenCalled();
    expect(deps.printError).toHaveBeenCalledWith(
      colorize("✗ Training failed with exit code 2.", "red"),
    );
  });

  it("starts every service with its wait, then opens the chat page", async () => {
    const { deps } = createDeps();
    const launcher = new Launcher("/srv/mindease", ports, deps);

    await expect(launcher.start()).resolves.toBe(true);

    expect(deps.runToCompletion).not.toHaveBeenCalled();
    expect(deps.spawn).toHaveBeenCalledTimes(3);
    expect(vi.mocked(deps.spawn).mock.calls[1]?.[0]).toBe("rasa");
    expect(vi.mocked(deps.spawn).mock.calls[1]?.[2]).toBe("/srv/mindease");
    expect(vi.mocked(deps.sleep).mock.calls).toEqual([[3000], [5000], [2000]]);
    expect(deps.openBrowser).toHaveBeenCalledWith(
      "http://localhost:8000/new_interface.html",
    );
    expect(launcher.running).toBe(3);
  });

  it("fails when a service cannot be spawned", async () => {
    const { deps, children } = createDeps();
    deps.sleep = vi.fn(async () => {
      children[0]?.fail(new Error("spawn ENOENT"));
    });
    const launcher = new Launcher("/srv/mindease", ports, deps);

    await expect(launcher.start()).rejects.toThrow(
      "Action server on port 5055 failed: spawn ENOENT",
    );
    expect(deps.openBrowser).not.toHaveBeenCalled();
  });

  it("stop() terminates every child", async () => {
    const { deps, children } = createDeps();
    const launcher = new Launcher("/srv/mindease", ports, deps);
    await launcher.start();

    launcher.stop();

    expect(children).toHaveLength(3);
    for (const child of children) {
      expect(child.kill).toHaveBeenCalledWith("SIGTERM");
    }
    expect(launcher.running).toBe(0);
  });
});
