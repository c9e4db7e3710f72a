import { parentPort } from "node:worker_threads";
import { serveCodecRequests } from "./codec-engine";

// Entry point of the worker bundle; the codec itself lives in codec-engine.
if (!parentPort) {
  throw new Error("codec-worker must be started as a worker thread");
}
serveCodecRequests(parentPort);
