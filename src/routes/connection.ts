import type { Response } from "express";
import { AgentError } from "../protocol/errors";

/** A signal that aborts when the client goes away before the response is finished. */
export function abortOnDisconnect(res: Response): AbortSignal {
  const controller = new AbortController();
  res.on("close", () => {
    if (!res.writableFinished) {
      console.log("[Server] Client disconnected, cancelling work");
      controller.abort(new AgentError("Cancelled", "Client disconnected"));
    }
  });
  return controller.signal;
}
