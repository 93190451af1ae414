/**
 * Server-sent events framing shared by the host routes and remote clients.
 * Only `data:` fields matter to the run protocol; other fields and comments
 * are skipped.
 */

export function formatSseData(data: unknown): string {
  return `data: ${JSON.stringify(data)}\n\n`;
}

/** Yield the data payload of each event frame read from `body`. */
export async function* readSseData(body: ReadableStream<Uint8Array>): AsyncGenerator<string, void, undefined> {
  const reader = body.getReader();
  const decoder = new TextDecoder();
  let buffer = "";
  let dataLines: string[] = [];
  let finished = false;

  try {
    for (;;) {
      const { done, value } = await reader.read();
      if (done) {
        buffer += decoder.decode();
      } else {
        buffer += decoder.decode(value, { stream: true });
      }

      let newline = buffer.search(/\r?\n/);
      while (newline !== -1) {
        const line = buffer.slice(0, newline);
        buffer = buffer.slice(buffer[newline] === "\r" ? newline + 2 : newline + 1);
        if (line === "") {
          if (dataLines.length > 0) {
            yield dataLines.join("\n");
            dataLines = [];
          }
        } else if (line.startsWith("data:")) {
          dataLines.push(line.slice(5).replace(/^ /, ""));
        }
        newline = buffer.search(/\r?\n/);
      }

      if (done) {
        if (buffer.startsWith("data:")) {
          dataLines.push(buffer.slice(5).replace(/^ /, ""));
        }
        if (dataLines.length > 0) {
          yield dataLines.join("\n");
        }
        finished = true;
        return;
      }
    }
  } finally {
    if (!finished) {
      // consumer stopped early or the read failed
      await reader.cancel().catch((error: unknown) => {
        console.error("[SSE] Failed to cancel response body:", error);
      });
    }
    reader.releaseLock();
  }
}
