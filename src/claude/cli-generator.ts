import fs from "fs";
import { execSync, spawn, type SpawnOptions } from "child_process";
import type { Readable } from "stream";
import { StreamParser } from "./stream-parser.js";
import { buildFactPrompt } from "../content/prompt.js";
import { parseContent } from "../content/response-parser.js";
import { createAbortError } from "../tracking/tasks.js";
import type {
  ContentGenerator,
  ContentRequest,
  ContentResult,
  Language,
} from "../tracking/types.js";

/** The slice of ChildProcess the generator relies on. */
export interface CliProcess {
  stdout: Readable | null;
  stderr: Readable | null;
  readonly killed: boolean;
  kill(signal?: NodeJS.Signals): boolean;
  once(event: "close", listener: (code: number | null) => void): unknown;
  once(event: "error", listener: (err: Error) => void): unknown;
}

export type SpawnCli = (command: string, args: string[], options: SpawnOptions) => CliProcess;

export interface ClaudeCliGeneratorOptions {
  binary: string;
  model?: string;
  /** Place shown when the answer names none. */
  fallbackPlace: (language: Language) => string;
  spawnCli?: SpawnCli;
}

const KILL_GRACE_MS = 5_000;
const STDERR_TAIL_CHARS = 500;

/**
 * Resolve the absolute path to the `claude` CLI binary.
 * Tries `which claude` first, then falls back to common install locations.
 */
export function findClaudeBinary(): string {
  const candidates = [
    (() => {
      try {
        return execSync("which claude", { encoding: "utf-8" }).trim();
      } catch {
        return null;
      }
    })(),
    "/usr/local/bin/claude",
    "/opt/homebrew/bin/claude",
    `${process.env.HOME}/.local/bin/claude`,
    `${process.env.HOME}/.npm-global/bin/claude`,
  ];

  for (const p of candidates) {
    if (!p) continue;
    try {
      const real = fs.realpathSync(p);
      fs.accessSync(real, fs.constants.X_OK);
      console.log(`[claude] Found binary: ${p} -> ${real}`);
      return real;
    } catch {
      // try the next candidate
    }
  }

  console.warn("[claude] Binary not found, falling back to 'claude'");
  return "claude";
}

/** Send SIGTERM, escalating to SIGKILL if the process is still alive after the grace period. */
function terminate(child: CliProcess): void {
  child.kill("SIGTERM");
  const killTimer = setTimeout(() => {
    if (!child.killed) {
      console.warn("[claude] Process didn't respond to SIGTERM, sending SIGKILL");
      child.kill("SIGKILL");
    }
  }, KILL_GRACE_MS);
  killTimer.unref();
}

/**
 * Generates one nearby fact per call by running `claude -p` and reading its
 * stream-json output. Aborting the request kills the process.
 */
export class ClaudeCliGenerator implements ContentGenerator {
  private readonly options: ClaudeCliGeneratorOptions;
  private readonly spawnCli: SpawnCli;

  constructor(options: ClaudeCliGeneratorOptions) {
    this.options = options;
    this.spawnCli = options.spawnCli ?? spawn;
  }

  async generate(request: ContentRequest): Promise<ContentResult> {
    const text = await this.run(buildFactPrompt(request), request.signal);
    return parseContent(text, this.options.fallbackPlace(request.language));
  }

  private buildArgs(prompt: string): string[] {
    const args = ["-p", prompt, "--output-format", "stream-json", "--verbose"];
    if (this.options.model) {
      args.push("--model", this.options.model);
    }
    return args;
  }

  private run(prompt: string, signal: AbortSignal): Promise<string> {
    if (signal.aborted) return Promise.reject(createAbortError());

    const child = this.spawnCli(this.options.binary, this.buildArgs(prompt), {
      stdio: ["ignore", "pipe", "pipe"],
      env: { ...process.env, CLAUDECODE: undefined },
    });

    const parser = new StreamParser();
    let deltaText = "";
    let assistantText = "";
    let resultText: string | undefined;
    let resultError: string | undefined;
    let stderrTail = "";

    parser.onEvent = (event) => {
      switch (event.kind) {
        case "delta":
          deltaText += event.text;
          break;
        case "assistant_complete":
          assistantText += event.text;
          break;
        case "result":
          if (event.success) resultText = event.result;
          else resultError = event.error;
          break;
        default:
          break;
      }
    };

    child.stdout?.on("data", (chunk: Buffer) => parser.feed(chunk.toString("utf-8")));
    child.stderr?.on("data", (chunk: Buffer) => {
      stderrTail = (stderrTail + chunk.toString("utf-8")).slice(-STDERR_TAIL_CHARS);
    });

    return new Promise<string>((resolve, reject) => {
      let settled = false;
      const settle = (fn: () => void) => {
        if (settled) return;
        settled = true;
        signal.removeEventListener("abort", onAbort);
        fn();
      };

      const onAbort = () => {
        terminate(child);
        settle(() => reject(createAbortError()));
      };
      signal.addEventListener("abort", onAbort, { once: true });

      child.once("error", (err) => {
        settle(() => reject(new Error(`Failed to run claude: ${err.message}`)));
      });

      child.once("close", (code) => {
        parser.flush();
        const text = (resultText ?? (assistantText || deltaText)).trim();

        if (resultError !== undefined) {
          settle(() => reject(new Error(`claude reported an error: ${resultError}`)));
          return;
        }
        if (code !== 0 && !text) {
          const detail = stderrTail.trim() ? `: ${stderrTail.trim()}` : "";
          settle(() => reject(new Error(`claude exited with code ${code}${detail}`)));
          return;
        }
        if (!text) {
          settle(() => reject(new Error("claude returned no text")));
          return;
        }
        settle(() => resolve(text));
      });
    });
  }
}
