export {
  InterruptedWaitError,
  SerializationError,
  SubmissionError,
  TransportError,
  ValidationError,
  type SubmissionErrorCode,
} from "./errors.js";
export { silentLogger, type SubmissionLogger } from "./logger.js";
export {
  DEFAULT_ENDPOINT_URL,
  SubmissionClient,
  type CreateDocumentOptions,
  type SubmissionClientOptions,
} from "./submission-client.js";
export {
  ThrottleConfigSchema,
  ThrottledGate,
  type AcquireOptions,
  type GatePermit,
  type GateSnapshot,
  type ThrottleConfig,
  type ThrottledGateOptions,
} from "./throttled-gate.js";
export { TIME_UNITS, isTimeUnit, timeUnitToMillis, type TimeUnit } from "./time-unit.js";
export {
  DEFAULT_TRANSPORT_TIMEOUT_MS,
  FetchHttpTransport,
  type HttpRequest,
  type HttpResponse,
  type HttpTransport,
} from "./transport.js";
