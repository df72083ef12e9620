import { ProjectListSchema, type ProjectList } from "../notehub/types.js";
import type { ToolContext } from "../types.js";
import { CredentialInput, withSession, type CredentialParams } from "./session-call.js";

export const GetProjectsInput = {
  ...CredentialInput,
};

export const GetProjectsOutput = ProjectListSchema.shape;

export type GetProjectsParams = CredentialParams;

export async function getProjects(params: GetProjectsParams, ctx: ToolContext): Promise<ProjectList> {
  return withSession(ctx, "get-projects", params, (token) => ctx.gateway.listProjects(token));
}

export function summarizeProjects(result: ProjectList): string {
  if (result.projects.length === 0) {
    return "No Notehub projects are visible to this account.";
  }
  const lines = result.projects.map((project) => `- ${project.label ?? "(unnamed)"} (${project.uid})`);
  return `Found ${result.projects.length} project(s):\n${lines.join("\n")}`;
}
