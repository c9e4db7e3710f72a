import type { MessagePort } from "node:worker_threads";
import { getGroundedError } from "../utils/error-parser";
import { decodeAll, encodeAll } from "./entry-codec";
import { CodecAction, type CodecWorkerRequest, type CodecWorkerResponse } from "./interfaces";

/**
 * Answers one worker request. It never throws: a failure becomes a failed
 * `Result` carrying the rendered message, because the response has to survive
 * a structured clone.
 */
export function handleCodecRequest(request: CodecWorkerRequest): CodecWorkerResponse {
  const { id } = request;

  switch (request.action) {
    case CodecAction.EncodeAll:
      try {
        const data = encodeAll(request.payload);
        return { id, action: CodecAction.EncodeAll, result: { success: true, data, error: null } };
      } catch (error) {
        return {
          id,
          action: CodecAction.EncodeAll,
          result: { success: false, data: null, error: getGroundedError(error) },
        };
      }

    case CodecAction.DecodeAll:
      try {
        const { entries, skipped } = decodeAll(request.payload);
        return {
          id,
          action: CodecAction.DecodeAll,
          result: {
            success: true,
            data: { entries, skipped: skipped.map((error) => error.message) },
            error: null,
          },
        };
      } catch (error) {
        return {
          id,
          action: CodecAction.DecodeAll,
          result: { success: false, data: null, error: getGroundedError(error) },
        };
      }
  }
}

/** Relays every request arriving on `port` through `handleCodecRequest`. */
export function serveCodecRequests(port: MessagePort): void {
  port.on("message", (request: CodecWorkerRequest) => {
    port.postMessage(handleCodecRequest(request));
  });
}
