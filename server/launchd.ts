import { spawn } from "child_process";
import fs from "fs";
import path from "path";
import { describeError } from "./calendar_errors.js";

export const SERVICE_ACTIONS = ["install", "uninstall", "start", "stop", "restart"] as const;
export type ServiceAction = (typeof SERVICE_ACTIONS)[number];

export type CommandResult = {
  stdout: string;
  stderr: string;
  exitCode: number | null;
};

export type CommandRunner = (command: string, args: string[]) => Promise<CommandResult>;

export type ServiceOptions = {
  label: string;
  homeDir: string;
  programArguments: string[];
  runCommand?: CommandRunner;
  out?: (line: string) => void;
  err?: (line: string) => void;
};

export class LaunchdError extends Error {
  code: "launchctl_failed" | "io";
  details?: Record<string, unknown>;

  constructor(code: "launchctl_failed" | "io", message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = "LaunchdError";
    this.code = code;
    this.details = details;
  }
}

export function runCommand(command: string, args: string[]): Promise<CommandResult> {
  return new Promise((resolve, reject) => {
    const child = spawn(command, args, {
      env: process.env,
      stdio: ["ignore", "pipe", "pipe"],
    });

    let stdout = "";
    let stderr = "";
    child.stdout?.on("data", (chunk) => {
      stdout += chunk.toString();
    });
    child.stderr?.on("data", (chunk) => {
      stderr += chunk.toString();
    });
    child.on("error", (err) => reject(err));
    child.on("close", (code) => resolve({ stdout, stderr, exitCode: code }));
  });
}

function escapeXml(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}

/** A per-user launch agent that keeps the daemon running. */
export class LaunchAgentService {
  readonly label: string;
  private readonly homeDir: string;
  private readonly programArguments: string[];
  private readonly run: CommandRunner;
  private readonly out: (line: string) => void;
  private readonly err: (line: string) => void;

  constructor(options: ServiceOptions) {
    this.label = options.label;
    this.homeDir = options.homeDir;
    this.programArguments = options.programArguments;
    this.run = options.runCommand ?? runCommand;
    this.out = options.out ?? ((line) => console.log(line));
    this.err = options.err ?? ((line) => console.error(line));
  }

  plistPath(): string {
    return path.join(this.homeDir, "Library", "LaunchAgents", `${this.label}.plist`);
  }

  logPath(kind: "log" | "err"): string {
    return path.join(this.homeDir, "Library", "Logs", `eventually.${kind}`);
  }

  isInstalled(): boolean {
    return fs.existsSync(this.plistPath());
  }

  plistContents(): string {
    const args = this.programArguments
      .map((arg) => `        <string>${escapeXml(arg)}</string>`)
      .join("\n");
    return `<?xml version="1.0" encoding="UTF-8"?>
<!DOCTYPE plist PUBLIC "-//Apple//DTD PLIST 1.0//EN" "http://www.apple.com/DTDs/PropertyList-1.0.dtd">
<plist version="1.0">
<dict>
    <key>Label</key>
    <string>${escapeXml(this.label)}</string>
    <key>ProgramArguments</key>
    <array>
${args}
    </array>
    <key>RunAtLoad</key>
    <true/>
    <key>KeepAlive</key>
    <true/>
    <key>StandardOutPath</key>
    <string>${escapeXml(this.logPath("log"))}</string>
    <key>StandardErrorPath</key>
    <string>${escapeXml(this.logPath("err"))}</string>
</dict>
</plist>
`;
  }

  async execute(action: ServiceAction): Promise<void> {
    switch (action) {
      case "install":
        return this.install();
      case "uninstall":
        return this.uninstall();
      case "start":
        return this.start();
      case "stop":
        return this.stop();
      case "restart":
        return this.restart();
    }
  }

  async install(): Promise<void> {
    const plistPath = this.plistPath();
    if (this.isInstalled()) {
      this.err(`existing launch agent detected at \`${plistPath}\`, skipping installation`);
      return;
    }
    try {
      fs.mkdirSync(path.dirname(plistPath), { recursive: true });
      fs.mkdirSync(path.dirname(this.logPath("log")), { recursive: true });
      fs.writeFileSync(plistPath, this.plistContents(), "utf8");
    } catch (err) {
      throw new LaunchdError("io", `Failed to write ${plistPath}: ${describeError(err)}`, {
        path: plistPath,
      });
    }
    this.out(`installed launch agent to \`${plistPath}\``);
  }

  async uninstall(): Promise<void> {
    const plistPath = this.plistPath();
    if (!this.isInstalled()) {
      this.err(`no launch agent detected at \`${plistPath}\`, skipping uninstallation`);
      return;
    }
    try {
      await this.stop();
    } catch (err) {
      this.err(`failed to stop service: ${describeError(err)}`);
    }
    try {
      fs.rmSync(plistPath);
    } catch (err) {
      throw new LaunchdError("io", `Failed to remove ${plistPath}: ${describeError(err)}`, {
        path: plistPath,
      });
    }
    this.out(`removed existing launch agent at \`${plistPath}\``);
  }

  async start(): Promise<void> {
    if (!this.isInstalled()) await this.install();
    this.out("starting service...");
    const result = await this.run("launchctl", ["load", this.plistPath()]);
    if (result.exitCode !== 0) {
      if (result.stderr.includes("already loaded")) {
        this.out("service already running");
        return;
      }
      throw new LaunchdError("launchctl_failed", `Failed to start service: ${result.stderr.trim()}`, {
        exitCode: result.exitCode,
      });
    }
    this.out("service started");
  }

  async stop(): Promise<void> {
    this.out("stopping service...");
    const result = await this.run("launchctl", ["unload", this.plistPath()]);
    if (result.exitCode !== 0) {
      if (result.stderr.includes("Could not find")) {
        this.out("service not running");
        return;
      }
      throw new LaunchdError("launchctl_failed", `Failed to stop service: ${result.stderr.trim()}`, {
        exitCode: result.exitCode,
      });
    }
    this.out("service stopped");
  }

  async restart(): Promise<void> {
    await this.stop();
    await this.start();
  }
}
