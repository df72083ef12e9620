/**
 * Declarations for the parts of @blues-inc/notehub-js this server calls.
 * The package is generated JavaScript and ships no types of its own.
 */
declare module "@blues-inc/notehub-js" {
  /** Resolved value of every `*WithHttpInfo` call. */
  export interface ApiResponse {
    data: unknown;
    response: {
      status: number;
      /** Parsed JSON body */
      body: unknown;
      text?: string;
    };
  }

  export interface ApiKeyAuthentication {
    type: "apiKey";
    in: "header";
    name: string;
    apiKey?: string;
  }

  export class ApiClient {
    constructor(basePath?: string);
    basePath: string;
    /** Request timeout in milliseconds */
    timeout: number;
    authentications: { api_key: ApiKeyAuthentication };
  }

  export interface LoginRequest {
    username: string;
    password: string;
  }

  export class AuthorizationApi {
    constructor(apiClient?: ApiClient);
    loginWithHttpInfo(loginRequest: LoginRequest): Promise<ApiResponse>;
  }

  export class ProjectApi {
    constructor(apiClient?: ApiClient);
    getProjectsWithHttpInfo(): Promise<ApiResponse>;
  }

  export interface GetProjectDevicesOpts {
    pageSize?: number;
    pageNum?: number;
    deviceUID?: string[];
    tag?: string[];
    serialNumber?: string[];
    fleetUID?: string;
  }

  export class Note {
    constructor();
    body?: Record<string, unknown>;
    payload?: string;
  }

  export class DeviceApi {
    constructor(apiClient?: ApiClient);
    getProjectDevicesWithHttpInfo(projectUID: string, opts?: GetProjectDevicesOpts): Promise<ApiResponse>;
    handleNoteAddWithHttpInfo(
      projectUID: string,
      deviceUID: string,
      notefileID: string,
      note: Note
    ): Promise<ApiResponse>;
  }

  export interface GetProjectEventsOpts {
    pageSize?: number;
    pageNum?: number;
    deviceUID?: string[];
    serialNumber?: string[];
    notecardFirmware?: string[];
    location?: string[];
    hostFirmware?: string[];
    hostName?: string[];
    productUID?: string[];
    sku?: string[];
    fleetUID?: string;
    files?: string;
    selectFields?: string;
  }

  export class EventApi {
    constructor(apiClient?: ApiClient);
    getProjectEventsWithHttpInfo(projectUID: string, opts?: GetProjectEventsOpts): Promise<ApiResponse>;
  }

  /** The CommonJS module object, as seen through a default import. */
  const NotehubJs: {
    ApiClient: typeof ApiClient;
    AuthorizationApi: typeof AuthorizationApi;
    ProjectApi: typeof ProjectApi;
    DeviceApi: typeof DeviceApi;
    EventApi: typeof EventApi;
    Note: typeof Note;
  };
  export default NotehubJs;
}
