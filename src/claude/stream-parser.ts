import { StreamEventSchema, type ParsedEvent, type StreamEvent } from "./types.js";

/**
 * Incrementally parses NDJSON output from the Claude CLI streaming format.
 * Call `feed(chunk)` with raw stdout data; the parser buffers partial lines
 * and invokes `onEvent` for each recognised event.
 */
export class StreamParser {
  private buffer = "";
  public onEvent: (event: ParsedEvent) => void = () => {};

  /**
   * Feed a raw string chunk (may contain zero, one, or many newline-delimited
   * JSON objects, and may end with an incomplete line).
   */
  feed(chunk: string): void {
    this.buffer += chunk;
    const lines = this.buffer.split("\n");

    // The last element is either "" (chunk ended with \n) or an incomplete line
    this.buffer = lines.pop() ?? "";

    for (const line of lines) {
      this.handleLine(line);
    }
  }

  /** Flush a final line that was not newline-terminated. Call when the process exits. */
  flush(): void {
    this.handleLine(this.buffer);
    this.buffer = "";
  }

  private handleLine(line: string): void {
    const trimmed = line.trim();
    if (!trimmed) return;

    let json: unknown;
    try {
      json = JSON.parse(trimmed);
    } catch {
      // Non-JSON lines (e.g. stderr leaking into stdout) are ignored
      return;
    }

    const result = StreamEventSchema.safeParse(json);
    if (!result.success) return;

    const parsed = this.translate(result.data);
    if (parsed) this.onEvent(parsed);
  }

  private translate(raw: StreamEvent): ParsedEvent | null {
    switch (raw.type) {
      case "system":
        return raw.subtype === "init" ? { kind: "init", model: raw.model } : null;

      case "content_block_delta":
        if (raw.delta.type === "text_delta" && raw.delta.text) {
          return { kind: "delta", text: raw.delta.text };
        }
        return null;

      case "assistant": {
        const text = raw.message.content
          .map((block) => ("text" in block && typeof block.text === "string" ? block.text : ""))
          .join("");
        return { kind: "assistant_complete", text };
      }

      case "result":
        if (raw.subtype === "success" && !raw.is_error) {
          return {
            kind: "result",
            success: true,
            result: raw.result,
            totalCostUsd: raw.total_cost_usd,
            durationMs: raw.duration_ms,
          };
        }
        return {
          kind: "result",
          success: false,
          error: raw.error ?? raw.result ?? raw.subtype,
        };
    }
  }
}
