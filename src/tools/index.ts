export { TOOL_METADATA, getToolDescription } from "./descriptions.js";
export type { ToolMetadata, ToolName } from "./descriptions.js";
export { CredentialInput, requireFields, withSession } from "./session-call.js";
export type { CredentialParams } from "./session-call.js";
export { getProjects, summarizeProjects, GetProjectsInput, GetProjectsOutput } from "./get-projects.js";
export type { GetProjectsParams } from "./get-projects.js";
export {
  getProjectDevices,
  summarizeDevices,
  GetProjectDevicesInput,
  GetProjectDevicesOutput,
} from "./get-project-devices.js";
export type { GetProjectDevicesParams } from "./get-project-devices.js";
export {
  getProjectEvents,
  summarizeEvents,
  GetProjectEventsInput,
  GetProjectEventsOutput,
} from "./get-project-events.js";
export type { GetProjectEventsParams } from "./get-project-events.js";
export { sendNote, summarizeNote, SendNoteInput, SendNoteOutput } from "./send-note.js";
export type { SendNoteParams } from "./send-note.js";
