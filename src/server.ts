import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import * as z from "zod/v4";
import { buildServerInstructions } from "./server-instructions.js";
import { errorCode, errorMessage, NotehubError, toToolErrorResult } from "./shared/errors.js";
import { startTimer } from "./shared/logger.js";
import {
  TOOL_METADATA,
  getToolDescription,
  getProjects,
  summarizeProjects,
  GetProjectsInput,
  GetProjectsOutput,
  getProjectDevices,
  summarizeDevices,
  GetProjectDevicesInput,
  GetProjectDevicesOutput,
  getProjectEvents,
  summarizeEvents,
  GetProjectEventsInput,
  GetProjectEventsOutput,
  sendNote,
  summarizeNote,
  SendNoteInput,
  SendNoteOutput,
  type CredentialParams,
  type ToolName,
} from "./tools/index.js";
import { sessionKeyOf } from "./tools/session-call.js";
import type { ToolContext } from "./types.js";

export const SERVER_NAME = "notehub-mcp";
export const SERVER_VERSION = "1.0.0";

const CREDENTIAL_FIELDS = new Set(["username", "password"]);

export interface NotehubServerOptions {
  /** Session reuse window advertised in the server instructions */
  sessionTtlMs?: number;
}

export class NotehubMcp {
  readonly server: McpServer;

  constructor(
    private readonly ctx: ToolContext,
    options: NotehubServerOptions = {}
  ) {
    this.server = new McpServer(
      {
        name: SERVER_NAME,
        version: SERVER_VERSION,
      },
      {
        capabilities: {
          tools: {},
          prompts: { listChanged: true },
        },
        instructions: buildServerInstructions(options.sessionTtlMs),
      }
    );
  }

  init(): this {
    // Read-only listings
    this.server.registerTool(
      "get-projects",
      {
        title: TOOL_METADATA["get-projects"].title,
        description: getToolDescription("get-projects"),
        inputSchema: GetProjectsInput,
        outputSchema: GetProjectsOutput,
        annotations: {
          readOnlyHint: true,
          destructiveHint: false,
          idempotentHint: true,
          openWorldHint: true,
        },
      },
      async (args) =>
        this.runTool("get-projects", args, () => getProjects(args, this.ctx), summarizeProjects)
    );

    this.server.registerTool(
      "get-project-devices",
      {
        title: TOOL_METADATA["get-project-devices"].title,
        description: getToolDescription("get-project-devices"),
        inputSchema: GetProjectDevicesInput,
        outputSchema: GetProjectDevicesOutput,
        annotations: {
          readOnlyHint: true,
          destructiveHint: false,
          idempotentHint: true,
          openWorldHint: true,
        },
      },
      async (args) =>
        this.runTool(
          "get-project-devices",
          args,
          () => getProjectDevices(args, this.ctx),
          (result) => summarizeDevices(args.projectUid, result)
        )
    );

    this.server.registerTool(
      "get-project-events",
      {
        title: TOOL_METADATA["get-project-events"].title,
        description: getToolDescription("get-project-events"),
        inputSchema: GetProjectEventsInput,
        outputSchema: GetProjectEventsOutput,
        annotations: {
          readOnlyHint: true,
          destructiveHint: false,
          idempotentHint: true,
          openWorldHint: true,
        },
      },
      async (args) =>
        this.runTool(
          "get-project-events",
          args,
          () => getProjectEvents(args, this.ctx),
          (result) => summarizeEvents(args.projectUid, result)
        )
    );

    // Writes to a device queue
    this.server.registerTool(
      "send-note",
      {
        title: TOOL_METADATA["send-note"].title,
        description: getToolDescription("send-note"),
        inputSchema: SendNoteInput,
        outputSchema: SendNoteOutput,
        annotations: {
          readOnlyHint: false,
          destructiveHint: false,
          idempotentHint: false,
          openWorldHint: true,
        },
      },
      async (args) => this.runTool("send-note", args, () => sendNote(args, this.ctx), summarizeNote)
    );

    this.server.registerPrompt(
      "device-activity-report",
      {
        title: "Device Activity Report",
        description: "Summarize recent activity for every device in a Notehub project: last contact, notefiles seen and anything that looks wrong.",
        argsSchema: {
          projectUid: z.string().meta({ description: "UID of the Notehub project to report on" }),
        },
      },
      async ({ projectUid }) => ({
        messages: [
          {
            role: "user" as const,
            content: {
              type: "text" as const,
              text:
                `Build an activity report for Notehub project ${projectUid}. ` +
                "Use get-project-devices to list the devices, then get-project-events to read their recent events. " +
                "For each device give its last contact time, the notefiles it sent, and flag devices that have gone quiet or report low battery in _health.qo.",
            },
          },
        ],
      })
    );

    return this;
  }

  async connect(transport: Transport): Promise<void> {
    await this.server.connect(transport);
  }

  async close(): Promise<void> {
    await this.server.close();
  }

  private async runTool<T extends Record<string, unknown>>(
    tool: ToolName,
    params: CredentialParams,
    call: () => Promise<T>,
    summarize: (result: T) => string
  ): Promise<CallToolResult> {
    const timer = startTimer();
    const sessionKey = sessionKeyOf(params);

    this.ctx.logger.debug({
      event: "tool_started",
      tool,
      session_key: sessionKey,
      args: withoutCredentials(params),
    });

    try {
      const result = await call();

      this.ctx.logger.info({
        event: "tool_completed",
        tool,
        session_key: sessionKey,
        duration_ms: timer(),
      });

      return {
        content: [{ type: "text" as const, text: summarize(result) }],
        structuredContent: result,
      };
    } catch (error) {
      const failure = {
        event: "tool_failed" as const,
        tool,
        session_key: sessionKey,
        error: errorMessage(error),
        error_code: errorCode(error),
        duration_ms: timer(),
      };
      if (error instanceof NotehubError) {
        this.ctx.logger.warn(failure);
      } else {
        this.ctx.logger.error(failure);
      }

      return toToolErrorResult(error);
    }
  }
}

/**
 * Build and register a server for the given dependencies.
 */
export function createNotehubServer(ctx: ToolContext, options: NotehubServerOptions = {}): NotehubMcp {
  return new NotehubMcp(ctx, options).init();
}

function withoutCredentials(params: object): Record<string, unknown> {
  const args: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(params)) {
    if (!CREDENTIAL_FIELDS.has(key)) {
      args[key] = value;
    }
  }
  return args;
}
