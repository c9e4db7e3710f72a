import type { EventEmitter } from "node:events";
import { Worker } from "node:worker_threads";
import type { Entry } from "../models";
import { DecodeError, EncodeError, VaultError } from "../utils/errors";
import { decodeAll, encodeAll, type BatchDecodeResult } from "./entry-codec";
import {
  CODEC_WORKER_ENTRY,
  CodecAction,
  type CodecRequestBody,
  type CodecWorkerRequest,
  type CodecWorkerResponse,
} from "./interfaces";

/** Where batch encode/decode of the consolidated file runs. */
export interface CodecRunner {
  encodeAll(entries: ReadonlyMap<string, Entry>): Promise<Uint8Array>;
  decodeAll(bytes: Uint8Array): Promise<BatchDecodeResult>;
  close(): Promise<void>;
}

const nextMacrotask = () => new Promise<void>((resolve) => setImmediate(resolve));

/**
 * Runs the codec on the calling thread, but only after the current burst of
 * synchronous work has finished.
 */
export class InlineCodecRunner implements CodecRunner {
  public async encodeAll(entries: ReadonlyMap<string, Entry>): Promise<Uint8Array> {
    await nextMacrotask();
    return encodeAll(entries);
  }

  public async decodeAll(bytes: Uint8Array): Promise<BatchDecodeResult> {
    await nextMacrotask();
    return decodeAll(bytes);
  }

  public async close(): Promise<void> {}
}

/** The part of a `worker_threads` Worker the runner talks to. */
export interface CodecWorkerPort extends EventEmitter {
  postMessage(message: CodecWorkerRequest): void;
  terminate(): Promise<number>;
}

export interface WorkerCodecRunnerOptions {
  /** Defaults to spawning the `codec-worker.js` bundle next to this module. */
  createWorker?: () => CodecWorkerPort;
}

interface PendingRequest {
  resolve: (response: CodecWorkerResponse) => void;
  reject: (error: VaultError) => void;
}

function spawnCodecWorker(): CodecWorkerPort {
  return new Worker(new URL(`./${CODEC_WORKER_ENTRY}.js`, import.meta.url));
}

/**
 * Moves batch encode/decode to a worker thread. The worker is spawned on first
 * use; requests are matched to responses by id, so several may be in flight.
 */
export class WorkerCodecRunner implements CodecRunner {
  private worker: CodecWorkerPort | null = null;
  private nextId = 1;
  private readonly pending = new Map<number, PendingRequest>();
  private readonly createWorker: () => CodecWorkerPort;

  constructor(options: WorkerCodecRunnerOptions = {}) {
    this.createWorker = options.createWorker ?? spawnCodecWorker;
  }

  private ensureWorker(): CodecWorkerPort {
    if (this.worker) return this.worker;

    const worker = this.createWorker();
    worker.on("message", (response: CodecWorkerResponse) => {
      const request = this.pending.get(response.id);
      if (!request) return;
      this.pending.delete(response.id);
      request.resolve(response);
    });
    worker.on("error", (error: Error) => {
      this.failAll(new VaultError("Codec worker crashed", { cause: error }));
    });
    worker.on("exit", (code: number) => {
      this.worker = null;
      this.failAll(new VaultError(`Codec worker exited with code ${code}`));
    });

    this.worker = worker;
    return worker;
  }

  private failAll(error: VaultError): void {
    const requests = [...this.pending.values()];
    this.pending.clear();
    for (const request of requests) request.reject(error);
  }

  private request(body: CodecRequestBody): Promise<CodecWorkerResponse> {
    const worker = this.ensureWorker();
    const id = this.nextId++;
    return new Promise((resolve, reject) => {
      this.pending.set(id, { resolve, reject });
      worker.postMessage({ ...body, id });
    });
  }

  public async encodeAll(entries: ReadonlyMap<string, Entry>): Promise<Uint8Array> {
    const response = await this.request({
      action: CodecAction.EncodeAll,
      payload: new Map(entries),
    });
    if (response.action !== CodecAction.EncodeAll) {
      throw new VaultError(`Codec worker answered ${response.action} to ${CodecAction.EncodeAll}`);
    }
    if (!response.result.success) {
      throw new EncodeError(response.result.error);
    }
    return response.result.data;
  }

  public async decodeAll(bytes: Uint8Array): Promise<BatchDecodeResult> {
    const response = await this.request({ action: CodecAction.DecodeAll, payload: bytes });
    if (response.action !== CodecAction.DecodeAll) {
      throw new VaultError(`Codec worker answered ${response.action} to ${CodecAction.DecodeAll}`);
    }
    if (!response.result.success) {
      throw new DecodeError(response.result.error);
    }
    const { entries, skipped } = response.result.data;
    return { entries, skipped: skipped.map((message) => new DecodeError(message)) };
  }

  public async close(): Promise<void> {
    const worker = this.worker;
    if (!worker) return;
    this.worker = null;
    this.failAll(new VaultError("Codec runner closed"));
    worker.removeAllListeners();
    await worker.terminate();
  }
}
