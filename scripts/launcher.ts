import { spawn, spawnSync } from "node:child_process";
import { existsSync, readdirSync } from "node:fs";
import { join } from "node:path";
import { setTimeout as delay } from "node:timers/promises";

const COLORS = {
  green: "\u001b[92m",
  yellow: "\u001b[93m",
  red: "\u001b[91m",
  blue: "\u001b[94m",
  bold: "\u001b[1m",
  reset: "\u001b[0m",
} as const;

export type Color = Exclude<keyof typeof COLORS, "bold" | "reset">;

export function colorize(message: string, color: Color, bold = false): string {
  return `${bold ? COLORS.bold : ""}${COLORS[color]}${message}${COLORS.reset}`;
}

export interface ServiceStep {
  label: string;
  command: string;
  args: string[];
  /** Settle time before the next step starts. */
  waitMs: number;
}

export interface LaunchPorts {
  actionServer: number;
  dialogueServer: number;
  frontend: number;
}

export const MODELS_DIR = "models";

/**
 * `rasa train` over the domain, rules and pipeline under rasa/.
 */
export function trainingCommand(): { command: string; args: string[] } {
  return {
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
      MODELS_DIR,
    ],
  };
}

/**
 * Start order: action server, dialogue server, then the frontend.
 */
export function buildServiceSteps(
  ports: LaunchPorts,
  nodePath: string = process.execPath,
): ServiceStep[] {
  return [
    {
      label: `Action server on port ${ports.actionServer}`,
      command: nodePath,
      args: ["--import", "tsx", "apps/actions/src/server.ts"],
      waitMs: 3000,
    },
    {
      label: `Dialogue server on port ${ports.dialogueServer}`,
      command: "rasa",
      args: [
        "run",
        "--enable-api",
        "--cors",
        "*",
        "--port",
        String(ports.dialogueServer),
        "--endpoints",
        "rasa/endpoints.yml",
        "--credentials",
        "rasa/credentials.yml",
        "--model",
        MODELS_DIR,
      ],
      waitMs: 5000,
    },
    {
      label: `Frontend on port ${ports.frontend}`,
      command: nodePath,
      args: ["--import", "tsx", "apps/frontend/src/server.ts"],
      waitMs: 2000,
    },
  ];
}

export function chatPageUrl(frontendPort: number): string {
  return `http://localhost:${frontendPort}/new_interface.html`;
}

/**
 * Command that opens a URL in the desktop's default browser.
 */
export function browserCommand(
  url: string,
  platform: NodeJS.Platform = process.platform,
): { command: string; args: string[] } {
  switch (platform) {
    case "darwin":
      return { command: "open", args: [url] };
    case "win32":
      return { command: "cmd", args: ["/c", "start", "", url] };
    default:
      return { command: "xdg-open", args: [url] };
  }
}

/** The part of a child process the launcher manages. */
export interface ManagedProcess {
  kill(signal?: NodeJS.Signals): boolean;
  once(event: "error", listener: (error: Error) => void): unknown;
}

export interface LauncherDeps {
  spawn: (command: string, args: string[], cwd: string) => ManagedProcess;
  isOnPath: (executable: string) => boolean;
  hasTrainedModel: (modelsDir: string) => boolean;
  /** Runs a command in the foreground and resolves to its exit code. */
  runToCompletion: (command: string, args: string[], cwd: string) => number;
  openBrowser: (url: string) => void;
  sleep: (ms: number) => Promise<void>;
  print: (line: string) => void;
  printError: (line: string) => void;
}

export const defaultLauncherDeps: LauncherDeps = {
  spawn: (command, args, cwd) => spawn(command, args, { cwd, stdio: "inherit" }),
  isOnPath: (executable) => {
    const probe = process.platform === "win32" ? "where" : "which";
    return spawnSync(probe, [executable], { stdio: "ignore" }).status === 0;
  },
  hasTrainedModel: (modelsDir) =>
    existsSync(modelsDir) &&
    readdirSync(modelsDir).some((file) => file.endsWith(".tar.gz")),
  runToCompletion: (command, args, cwd) =>
    spawnSync(command, args, { cwd, stdio: "inherit" }).status ?? 1,
  openBrowser: (url) => {
    const { command, args } = browserCommand(url);
    const child = spawn(command, args, { stdio: "ignore", detached: true });
    child.on("error", () => {
      console.log(colorize(`Open ${url} in your browser`, "yellow"));
    });
    child.unref();
  },
  sleep: async (ms) => {
    await delay(ms);
  },
  print: (line) => console.log(line),
  printError: (line) => console.error(line),
};

/**
 * Starts every local service in order and stops them all together.
 */
export class Launcher {
  private readonly children: ManagedProcess[] = [];
  private spawnError: Error | undefined;

  constructor(
    private readonly rootDir: string,
    private readonly ports: LaunchPorts,
    private readonly deps: LauncherDeps = defaultLauncherDeps,
  ) {}

  get running(): number {
    return this.children.length;
  }

  /**
   * Returns false when a prerequisite is missing; throws if a service fails
   * to spawn.
   */
  async start(): Promise<boolean> {
    const { print, printError } = this.deps;
    print(colorize("=== MindEase Support Chatbot ===\n", "blue", true));

    if (!this.deps.isOnPath("rasa")) {
      printError(colorize("✗ The 'rasa' executable was not found on PATH.", "red"));
      print(colorize("Install it with: pip install rasa", "yellow"));
      return false;
    }
    print(colorize("✓ Dialogue server executable found.", "green"));

    if (!this.deps.hasTrainedModel(join(this.rootDir, MODELS_DIR))) {
      print(colorize("No trained dialogue model found, training one...", "yellow"));
      const { command, args } = trainingCommand();
      const exitCode = this.deps.runToCompletion(command, args, this.rootDir);
      if (exitCode !== 0) {
        printError(colorize(`✗ Training failed with exit code ${exitCode}.`, "red"));
        return false;
      }
      print(colorize("✓ Dialogue model trained.", "green"));
    }

    for (const step of buildServiceSteps(this.ports)) {
      print(colorize(`Starting ${step.label}...`, "blue"));
      const child = this.deps.spawn(step.command, step.args, this.rootDir);
      child.once("error", (error) => {
        this.spawnError ??= error;
      });
      this.children.push(child);
      await this.deps.sleep(step.waitMs);
      if (this.spawnError) {
        throw new Error(`${step.label} failed: ${this.spawnError.message}`);
      }
      print(colorize(`✓ ${step.label} started`, "green"));
    }

    const url = chatPageUrl(this.ports.frontend);
    print(colorize(`Opening browser at ${url}`, "blue"));
    this.deps.openBrowser(url);
    print(colorize("\nAll servers are running. Press Ctrl+C to stop.", "green", true));
    return true;
  }

  stop(): void {
    this.deps.print(colorize("\nShutting down all servers...", "yellow"));
    for (const child of this.children.splice(0)) {
      child.kill("SIGTERM");
    }
    this.deps.print(colorize("All servers have been stopped.", "green"));
  }
}
