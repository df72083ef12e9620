/**
 * Notehub client
 *
 * Implements NotehubGateway on the Notehub JavaScript SDK (@blues-inc/notehub-js).
 * Each call gets its own ApiClient carrying the session token in the
 * `api_key` (X-Session-Token) authentication, so concurrent calls for
 * different accounts never share credentials.
 *
 * The raw JSON body of each response is validated with the zod schemas in
 * ./types.ts, which keeps fields the SDK models do not know about.
 *
 * Status mapping:
 * - 401/403            -> AuthenticationError
 * - 408/429/5xx        -> TransientError
 * - other non-2xx      -> RemoteApiError
 * - network / timeout  -> TransientError
 */

import NotehubJs, {
  type ApiResponse,
  type AuthorizationApi,
  type DeviceApi,
  type EventApi,
  type ProjectApi,
} from "@blues-inc/notehub-js";
import * as z from "zod/v4";
import type { Credential } from "../auth/session-types.js";
import {
  AuthenticationError,
  NotehubError,
  RemoteApiError,
  TransientError,
  errorMessage,
} from "../shared/errors.js";
import { logger as defaultLogger, startTimer, type Logger } from "../shared/logger.js";
import {
  DEFAULT_NOTEFILE_ID,
  DeviceListSchema,
  EventListSchema,
  LoginResponseSchema,
  ProjectListSchema,
  type DeviceFilter,
  type DeviceList,
  type EventFilter,
  type EventList,
  type NoteAck,
  type NoteInput,
  type NotehubGateway,
  type ProjectList,
} from "./types.js";

export const NOTEHUB_API_BASE = "https://api.notefile.net";
export const REQUEST_TIMEOUT_MS = 30 * 1000;
export const DEFAULT_EVENT_PAGE_SIZE = 50;
export const DEFAULT_EVENT_PAGE_NUM = 1;

/**
 * The SDK operations this client uses.
 */
export interface NotehubApis {
  authorization: Pick<AuthorizationApi, "loginWithHttpInfo">;
  projects: Pick<ProjectApi, "getProjectsWithHttpInfo">;
  devices: Pick<DeviceApi, "getProjectDevicesWithHttpInfo" | "handleNoteAddWithHttpInfo">;
  events: Pick<EventApi, "getProjectEventsWithHttpInfo">;
}

/** Build the SDK operations for one call, authenticated with `token` when given. */
export type NotehubApiFactory = (token?: string) => NotehubApis;

export interface NotehubClientOptions {
  baseUrl?: string;
  requestTimeoutMs?: number;
  /** Replaces the SDK, mainly for tests */
  apis?: NotehubApiFactory;
  logger?: Logger;
}

export function createNotehubApis(baseUrl: string, requestTimeoutMs: number): NotehubApiFactory {
  return (token) => {
    const apiClient = new NotehubJs.ApiClient(baseUrl);
    apiClient.timeout = requestTimeoutMs;
    if (token !== undefined) {
      apiClient.authentications.api_key.apiKey = token;
    }
    return {
      authorization: new NotehubJs.AuthorizationApi(apiClient),
      projects: new NotehubJs.ProjectApi(apiClient),
      devices: new NotehubJs.DeviceApi(apiClient),
      events: new NotehubJs.EventApi(apiClient),
    };
  };
}

export class NotehubClient implements NotehubGateway {
  private readonly requestTimeoutMs: number;
  private readonly apis: NotehubApiFactory;
  private readonly logger: Logger;

  constructor(options: NotehubClientOptions = {}) {
    this.requestTimeoutMs = options.requestTimeoutMs ?? REQUEST_TIMEOUT_MS;
    this.apis = options.apis ?? createNotehubApis(options.baseUrl ?? NOTEHUB_API_BASE, this.requestTimeoutMs);
    this.logger = options.logger ?? defaultLogger;
  }

  async login(credential: Credential, signal?: AbortSignal): Promise<string> {
    let response: z.output<typeof LoginResponseSchema>;
    try {
      response = await this.call(
        "login",
        LoginResponseSchema,
        () =>
          this.apis().authorization.loginWithHttpInfo({
            username: credential.identity,
            password: credential.secret,
          }),
        signal
      );
    } catch (error) {
      // Notehub answers a bad password with a plain 4xx
      if (error instanceof RemoteApiError && error.status >= 400 && error.status < 500) {
        throw new AuthenticationError(`Notehub login rejected: ${error.message}`, { cause: error });
      }
      throw error;
    }

    const token = response.session_token;
    if (token === undefined || token.trim() === "") {
      throw new AuthenticationError("Notehub login response did not include a session token");
    }
    return token;
  }

  async listProjects(token: string): Promise<ProjectList> {
    return this.call("getProjects", ProjectListSchema, () => this.apis(token).projects.getProjectsWithHttpInfo());
  }

  async listDevices(token: string, projectUid: string, filter: DeviceFilter = {}): Promise<DeviceList> {
    const opts = {
      deviceUID: filter.deviceUid,
      tag: filter.tag,
      serialNumber: filter.serialNumber,
      fleetUID: filter.fleetUid,
      pageSize: filter.pageSize,
      pageNum: filter.pageNum,
    };
    return this.call("getProjectDevices", DeviceListSchema, () =>
      this.apis(token).devices.getProjectDevicesWithHttpInfo(projectUid, opts)
    );
  }

  async listEvents(token: string, projectUid: string, filter: EventFilter = {}): Promise<EventList> {
    const opts = {
      pageSize: filter.pageSize ?? DEFAULT_EVENT_PAGE_SIZE,
      pageNum: filter.pageNum ?? DEFAULT_EVENT_PAGE_NUM,
      deviceUID: filter.deviceUid,
      serialNumber: filter.serialNumber,
      fleetUID: filter.fleetUid,
      notecardFirmware: filter.notecardFirmware,
      location: filter.location,
      hostFirmware: filter.hostFirmware,
      hostName: filter.hostName,
      productUID: filter.productUid,
      sku: filter.sku,
      files: filter.files,
      selectFields: filter.selectFields,
    };
    return this.call("getProjectEvents", EventListSchema, () =>
      this.apis(token).events.getProjectEventsWithHttpInfo(projectUid, opts)
    );
  }

  async sendNote(token: string, projectUid: string, deviceUid: string, input: NoteInput): Promise<NoteAck> {
    const notefileId = input.notefileId ?? DEFAULT_NOTEFILE_ID;
    const note = new NotehubJs.Note();
    if (input.body !== undefined) note.body = input.body;
    if (input.payload !== undefined) note.payload = input.payload;

    await this.call("handleNoteAdd", z.unknown(), () =>
      this.apis(token).devices.handleNoteAddWithHttpInfo(projectUid, deviceUid, notefileId, note)
    );
    return { projectUid, deviceUid, notefileId, sent: true };
  }

  private async call<S extends z.ZodType>(
    operation: string,
    schema: S,
    invoke: () => Promise<ApiResponse>,
    signal?: AbortSignal
  ): Promise<z.output<S>> {
    const elapsed = startTimer();
    let status = 0;
    try {
      let result: ApiResponse;
      try {
        result = await abortable(operation, invoke(), signal);
      } catch (error) {
        if (error instanceof NotehubError) throw error;
        const failure = toSdkFailure(error);
        status = failure.status ?? 0;
        throw this.toGatewayError(operation, failure, error);
      }

      status = result.response.status;
      const parsed = schema.safeParse(result.response.body ?? {});
      if (!parsed.success) {
        throw new RemoteApiError(
          `Notehub ${operation} returned an unexpected response: ${z.prettifyError(parsed.error)}`,
          status
        );
      }

      this.logger.debug({
        event: "api_call",
        service: "notehub",
        operation,
        status,
        duration_ms: elapsed(),
        success: true,
      });
      return parsed.data;
    } catch (error) {
      this.logger.warn({
        event: "api_call",
        service: "notehub",
        operation,
        status,
        duration_ms: elapsed(),
        success: false,
        error: errorMessage(error),
      });
      throw error;
    }
  }

  /**
   * Map an SDK rejection to the error taxonomy.
   */
  private toGatewayError(operation: string, failure: SdkFailure, error: unknown): NotehubError {
    if (failure.status !== undefined) {
      const message = `Notehub ${operation} failed (${failure.status}): ${failure.detail}`;
      return statusError(failure.status, message, error);
    }
    if (failure.timedOut) {
      return new TransientError(`Notehub ${operation} timed out after ${this.requestTimeoutMs}ms`, { cause: error });
    }
    return new TransientError(`Could not reach Notehub: ${failure.detail}`, { cause: error });
  }
}

interface SdkFailure {
  status?: number;
  timedOut: boolean;
  detail: string;
}

/**
 * The SDK rejects with `{ status, body, response, error }`; `status` is absent
 * when no response arrived.
 */
function toSdkFailure(error: unknown): SdkFailure {
  if (error === null || typeof error !== "object") {
    return { timedOut: false, detail: errorMessage(error) };
  }

  const cause = "error" in error ? error.error : error;
  const timedOut =
    cause !== null &&
    typeof cause === "object" &&
    (("timeout" in cause && typeof cause.timeout === "number") || ("code" in cause && cause.code === "ECONNABORTED"));

  if ("status" in error && typeof error.status === "number") {
    const text = "response" in error ? responseText(error.response) : undefined;
    return { status: error.status, timedOut, detail: errorText("body" in error ? error.body : undefined, text) };
  }
  return { timedOut, detail: errorMessage(cause instanceof Error ? cause : error) };
}

function responseText(response: unknown): string | undefined {
  if (response !== null && typeof response === "object" && "text" in response && typeof response.text === "string") {
    return response.text;
  }
  return undefined;
}

function statusError(status: number, message: string, cause: unknown): NotehubError {
  if (status === 401 || status === 403) return new AuthenticationError(message, { cause });
  if (status === 408 || status === 429 || status >= 500) return new TransientError(message, { cause });
  return new RemoteApiError(message, status, { cause });
}

/**
 * Pull the message out of a Notehub error body ({"err": "..."}), falling back to the raw text.
 */
function errorText(body: unknown, text: string | undefined): string {
  if (body !== null && typeof body === "object") {
    if ("err" in body && typeof body.err === "string") return body.err;
    if ("error" in body && typeof body.error === "string") return body.error;
  }
  const trimmed = (text ?? "").trim();
  if (trimmed === "") return "no response body";
  return trimmed.length > 200 ? `${trimmed.slice(0, 200)}...` : trimmed;
}

/**
 * Settle early with a TransientError when `signal` aborts. The SDK takes no
 * signal, so the request itself runs on until its own timeout.
 */
function abortable<T>(operation: string, promise: Promise<T>, signal: AbortSignal | undefined): Promise<T> {
  if (signal === undefined) return promise;
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new TransientError(`Notehub ${operation} was aborted`));
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener("abort", onAbort, { once: true });
    }
    const cleanup = () => signal.removeEventListener("abort", onAbort);
    promise.then(
      (value) => {
        cleanup();
        resolve(value);
      },
      (error: unknown) => {
        cleanup();
        reject(error);
      }
    );
  });
}

