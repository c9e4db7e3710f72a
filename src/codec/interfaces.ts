import type { Entry, Result } from "../models";

/**
 * Build entry name of the worker bundle. The build emits it as
 * `<name>.js` beside the main bundle, where `WorkerCodecRunner` looks for it.
 */
export const CODEC_WORKER_ENTRY = "codec-worker";

/**
 * Messages the main thread may send to the codec worker. Only batch work
 * crosses the thread boundary; single frames are cheap enough to stay put.
 */
export const enum CodecAction {
  EncodeAll = "ENCODE_ALL",
  DecodeAll = "DECODE_ALL",
}

export type CodecRequestBody =
  | { action: CodecAction.EncodeAll; payload: Map<string, Entry> }
  | { action: CodecAction.DecodeAll; payload: Uint8Array };

/** A request as posted to the worker. `id` pairs it with its response. */
export type CodecWorkerRequest = CodecRequestBody & { id: number };

/**
 * Error objects lose their subclass when structured-cloned, so failures and
 * skipped records travel as plain messages and are rebuilt on the main side.
 */
export interface DecodedBatch {
  entries: Map<string, Entry>;
  skipped: string[];
}

export type CodecWorkerResponse =
  | { id: number; action: CodecAction.EncodeAll; result: Result<Uint8Array, string> }
  | { id: number; action: CodecAction.DecodeAll; result: Result<DecodedBatch, string> };
