import { EventEmitter } from "events";
import { PassThrough } from "stream";
import type { SpawnOptions } from "child_process";
import { describe, it, expect, vi } from "vitest";
import { ClaudeCliGenerator, type CliProcess } from "../cli-generator.js";
import { isAbortError } from "../../tracking/tasks.js";
import type { ContentRequest } from "../../tracking/types.js";

class FakeChild extends EventEmitter implements CliProcess {
  stdout = new PassThrough();
  stderr = new PassThrough();
  killed = false;
  signals: Array<NodeJS.Signals | undefined> = [];

  kill(signal?: NodeJS.Signals): boolean {
    this.killed = true;
    this.signals.push(signal);
    return true;
  }

  out(...lines: string[]): void {
    this.stdout.emit("data", Buffer.from(lines.map((line) => `${line}\n`).join("")));
  }

  err(text: string): void {
    this.stderr.emit("data", Buffer.from(text));
  }
}

function setup(model?: string) {
  const child = new FakeChild();
  const spawnCli = vi.fn((_command: string, _args: string[], _options: SpawnOptions) => child);
  const generator = new ClaudeCliGenerator({
    binary: "/usr/bin/claude",
    model,
    fallbackPlace: () => "near you",
    spawnCli,
  });
  return { child, spawnCli, generator };
}

function request(signal: AbortSignal = new AbortController().signal): ContentRequest {
  return {
    position: { latitude: 48.8566, longitude: 2.3522 },
    exclusions: [],
    language: "en",
    signal,
  };
}

const ANSWER = "<answer>\\nLocation: Old Mill\\nInteresting fact: It still turns.\\n</answer>";

describe("ClaudeCliGenerator", () => {
  it("runs the CLI in stream-json mode and parses the final result", async () => {
    const { child, spawnCli, generator } = setup("test-model");

    const pending = generator.generate(request());
    child.out(
      '{"type":"system","subtype":"init","model":"test-model"}',
      `{"type":"result","subtype":"success","result":"${ANSWER}"}`
    );
    child.emit("close", 0);

    await expect(pending).resolves.toEqual({
      place: "Old Mill",
      summary: "It still turns.",
      companionPosition: undefined,
      raw: "<answer>\nLocation: Old Mill\nInteresting fact: It still turns.\n</answer>",
    });

    const [command, args] = spawnCli.mock.calls[0];
    expect(command).toBe("/usr/bin/claude");
    expect(args[0]).toBe("-p");
    expect(args[1]).toContain("48.856600, 2.352200");
    expect(args.slice(2)).toEqual(["--output-format", "stream-json", "--verbose", "--model", "test-model"]);
  });

  it("falls back to streamed text when no result event arrives", async () => {
    const { child, generator } = setup();

    const pending = generator.generate(request());
    child.out(
      '{"type":"content_block_delta","index":0,"delta":{"type":"text_delta","text":"A quiet "}}',
      '{"type":"content_block_delta","index":0,"delta":{"type":"text_delta","text":"square."}}'
    );
    child.emit("close", 0);

    const result = await pending;
    expect(result.summary).toBe("A quiet square.");
    expect(result.place).toBe("near you");
  });

  it("rejects when the CLI reports an error", async () => {
    const { child, generator } = setup();

    const pending = generator.generate(request());
    child.out('{"type":"result","subtype":"error","is_error":true,"error":"rate limited"}');
    child.emit("close", 1);

    await expect(pending).rejects.toThrow("claude reported an error: rate limited");
  });

  it("includes the stderr tail when the CLI exits without output", async () => {
    const { child, generator } = setup();

    const pending = generator.generate(request());
    child.err("boom\n");
    child.emit("close", 2);

    await expect(pending).rejects.toThrow("claude exited with code 2: boom");
  });

  it("rejects when the CLI exits cleanly with nothing to say", async () => {
    const { child, generator } = setup();

    const pending = generator.generate(request());
    child.emit("close", 0);

    await expect(pending).rejects.toThrow("claude returned no text");
  });

  it("rejects when the process cannot be started", async () => {
    const { child, generator } = setup();

    const pending = generator.generate(request());
    child.emit("error", new Error("spawn claude ENOENT"));

    await expect(pending).rejects.toThrow("Failed to run claude: spawn claude ENOENT");
  });

  it("kills the process and rejects with an AbortError when aborted", async () => {
    const { child, generator } = setup();
    const controller = new AbortController();

    const pending = generator.generate(request(controller.signal));
    controller.abort();

    const err: unknown = await pending.catch((e: unknown) => e);
    expect(isAbortError(err)).toBe(true);
    expect(child.signals).toEqual(["SIGTERM"]);
  });

  it("does not start the process for an already aborted request", async () => {
    const { spawnCli, generator } = setup();
    const controller = new AbortController();
    controller.abort();

    await expect(generator.generate(request(controller.signal))).rejects.toThrow("The operation was aborted");
    expect(spawnCli).not.toHaveBeenCalled();
  });
});
