import {
  SubmissionDocumentSchema,
  toWireDocument,
  type SubmissionDocument,
  type SubmissionDocumentInput,
} from "@docsubmit/submission-contracts";
import { z } from "zod";
import { SerializationError, TransportError, ValidationError } from "./errors.js";
import { silentLogger, type SubmissionLogger } from "./logger.js";
import { ThrottledGate, type GateSnapshot, type ThrottleConfig } from "./throttled-gate.js";
import { FetchHttpTransport, type HttpResponse, type HttpTransport } from "./transport.js";

export const DEFAULT_ENDPOINT_URL = "https://ismp.crpt.ru/api/v3/lk/documents/create";

export interface SubmissionClientOptions {
  throttle: ThrottleConfig;
  endpointUrl?: string;
  transport?: HttpTransport;
  logger?: SubmissionLogger;
  now?: () => number;
}

export interface CreateDocumentOptions {
  signal?: AbortSignal;
  /** Bounds the wait for throttle capacity only; the request itself is not affected. */
  acquireTimeoutMs?: number;
}

const EndpointUrlSchema = z.string().url();

export class SubmissionClient {
  readonly endpointUrl: string;
  private readonly gate: ThrottledGate;
  private readonly transport: HttpTransport;
  private readonly logger: SubmissionLogger;

  constructor(options: SubmissionClientOptions) {
    const endpointUrl = EndpointUrlSchema.safeParse(options.endpointUrl ?? DEFAULT_ENDPOINT_URL);
    if (!endpointUrl.success) {
      throw new ValidationError("Invalid submission endpoint URL", { details: endpointUrl.error.flatten() });
    }
    this.endpointUrl = endpointUrl.data;
    this.logger = options.logger ?? silentLogger;
    this.gate = new ThrottledGate(options.throttle, { now: options.now, logger: this.logger });
    this.transport = options.transport ?? new FetchHttpTransport();
  }

  /**
   * Submits one signed document and resolves with the endpoint's response body.
   *
   * Waits for throttle capacity first; the wait is abandoned with an
   * `InterruptedWaitError` when `options.signal` aborts or `options.acquireTimeoutMs`
   * passes. Only `options.signal` is handed to the transport once the request is
   * under way.
   */
  async createDocument(
    document: SubmissionDocumentInput,
    signature: string,
    options: CreateDocumentOptions = {},
  ): Promise<string> {
    const parsed = SubmissionDocumentSchema.safeParse(document);
    if (!parsed.success) {
      throw new ValidationError("Invalid document", { details: parsed.error.flatten() });
    }
    if (typeof signature !== "string" || signature.length === 0) {
      throw new ValidationError("Signature must be a non-empty string");
    }

    const body = this.serialize(parsed.data);
    const response = await this.gate.run(
      () => this.post(body, signature, options.signal),
      { signal: options.signal, timeoutMs: options.acquireTimeoutMs },
    );

    if (response.status < 200 || response.status >= 300) {
      this.logger.warn({ status: response.status, docId: parsed.data.docId }, "submission endpoint returned non-2xx status");
    }
    return response.body;
  }

  throttleSnapshot(): GateSnapshot {
    return this.gate.snapshot();
  }

  private serialize(document: SubmissionDocument): string {
    try {
      return JSON.stringify(toWireDocument(document));
    } catch (error) {
      throw new SerializationError("Failed to serialize document", error);
    }
  }

  private async post(body: string, signature: string, signal?: AbortSignal): Promise<HttpResponse> {
    this.logger.debug({ url: this.endpointUrl, bytes: body.length }, "submitting document");
    try {
      return await this.transport.send({
        url: this.endpointUrl,
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          Signature: signature,
        },
        body,
        signal,
      });
    } catch (error) {
      this.logger.error({ err: error, url: this.endpointUrl }, "document submission request failed");
      throw new TransportError("Document submission request failed", error);
    }
  }
}
