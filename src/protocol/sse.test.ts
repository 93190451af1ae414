import { describe, expect, it } from "vitest";
import { collect } from "../testing/listen";
import { formatSseData, readSseData } from "./sse";

function streamOf(...chunks: string[]): ReadableStream<Uint8Array> {
  const encoder = new TextEncoder();
  return new ReadableStream<Uint8Array>({
    start(controller) {
      for (const chunk of chunks) {
        controller.enqueue(encoder.encode(chunk));
      }
      controller.close();
    },
  });
}

describe("formatSseData", () => {
  it("frames one JSON payload", () => {
    expect(formatSseData({ type: "run.created" })).toBe('data: {"type":"run.created"}\n\n');
  });
});

describe("readSseData", () => {
  it("reassembles frames split across chunks", async () => {
    const frames = await collect(
      readSseData(
        streamOf('data: {"a":1}\n', "\ndata: li", "ne1\ndata: line2\r\n\r\n", ": comment\n\nevent: x\ndata: tail")
      )
    );

    expect(frames).toEqual(['{"a":1}', "line1\nline2", "tail"]);
  });

  it("cancels the body when the consumer stops early", async () => {
    let cancelled = false;
    const body = new ReadableStream<Uint8Array>({
      start(controller) {
        controller.enqueue(new TextEncoder().encode("data: 1\n\ndata: 2\n\n"));
      },
      cancel() {
        cancelled = true;
      },
    });

    for await (const frame of readSseData(body)) {
      expect(frame).toBe("1");
      break;
    }
    expect(cancelled).toBe(true);
  });
});
