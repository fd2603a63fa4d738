import { describe, it, expect } from "vitest";
import { StreamParser } from "../stream-parser.js";
import type { ParsedEvent } from "../types.js";

function collect(parser: StreamParser): ParsedEvent[] {
  const events: ParsedEvent[] = [];
  parser.onEvent = (event) => events.push(event);
  return events;
}

describe("StreamParser", () => {
  it("buffers a line split across chunks", () => {
    const parser = new StreamParser();
    const events = collect(parser);

    parser.feed('{"type":"content_block_delta","index":0,"delta":{"type":"text_d');
    expect(events).toEqual([]);
    parser.feed('elta","text":"Hello"}}\n');

    expect(events).toEqual([{ kind: "delta", text: "Hello" }]);
  });

  it("parses several events in one chunk and flushes the last unterminated line", () => {
    const parser = new StreamParser();
    const events = collect(parser);

    parser.feed(
      '{"type":"system","subtype":"init","session_id":"s1","model":"test-model"}\n' +
        '{"type":"assistant","message":{"content":[{"type":"text","text":"Hi "},{"type":"tool_use","id":"t1"},{"type":"text","text":"there"}]}}\n' +
        '{"type":"result","subtype":"success","result":"Hi there","total_cost_usd":0.01,"duration_ms":1200}'
    );
    expect(events).toHaveLength(2);
    parser.flush();

    expect(events).toEqual([
      { kind: "init", model: "test-model" },
      { kind: "assistant_complete", text: "Hi there" },
      { kind: "result", success: true, result: "Hi there", totalCostUsd: 0.01, durationMs: 1200 },
    ]);
  });

  it("ignores non-JSON lines and unknown event types", () => {
    const parser = new StreamParser();
    const events = collect(parser);

    parser.feed("warning: something on stdout\n");
    parser.feed('{"type":"ping"}\n');
    parser.feed('{"type":"content_block_delta","index":0,"delta":{"type":"input_json_delta"}}\n');

    expect(events).toEqual([]);
  });

  it("reports failed results with the most specific message available", () => {
    const parser = new StreamParser();
    const events = collect(parser);

    parser.feed('{"type":"result","subtype":"error","is_error":true,"error":"rate limited"}\n');
    parser.feed('{"type":"result","subtype":"error_max_turns","is_error":true}\n');

    expect(events).toEqual([
      { kind: "result", success: false, error: "rate limited" },
      { kind: "result", success: false, error: "error_max_turns" },
    ]);
  });
});
