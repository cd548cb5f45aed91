/**
 * Projects visible to the caller.
 */

import {
  decodeInt64,
  decodeResource,
  decodeString,
  encodeInt64,
  getOr,
  ROOT_PATH,
  type JsonObject,
} from "../codec/json.js";
import { DebugFormatter, type DebugRenderer } from "../debug/index.js";

export interface ProjectReference {
  project_id: string;
}

/**
 * Project as returned by `projects.list`.
 */
export interface Project {
  kind: string;
  id: string;
  friendly_name: string;
  numeric_id: bigint;
  project_reference: ProjectReference;
}

export function parseProjectReference(json: JsonObject, path: string = ROOT_PATH): ProjectReference {
  return { project_id: getOr(json, "projectId", decodeString, "", path) };
}

export function parseProject(json: JsonObject, path: string = ROOT_PATH): Project {
  return {
    kind: getOr(json, "kind", decodeString, "", path),
    id: getOr(json, "id", decodeString, "", path),
    friendly_name: getOr(json, "friendlyName", decodeString, "", path),
    numeric_id: getOr(json, "numericId", decodeInt64, 0n, path),
    project_reference: getOr(
      json,
      "projectReference",
      decodeResource(parseProjectReference),
      { project_id: "" },
      path
    ),
  };
}

export function serializeProject(project: Project): Record<string, unknown> {
  return {
    kind: project.kind,
    id: project.id,
    friendlyName: project.friendly_name,
    numericId: encodeInt64(project.numeric_id),
    projectReference: { projectId: project.project_reference.project_id },
  };
}

export const debugProject: DebugRenderer<Project> = (project, name, options, indent) =>
  new DebugFormatter(name, options, indent)
    .stringField("kind", project.kind)
    .stringField("id", project.id)
    .stringField("friendly_name", project.friendly_name)
    .field("numeric_id", project.numeric_id)
    .subMessage("project_reference", project.project_reference, (ref, refName, refOptions, refIndent) =>
      new DebugFormatter(refName, refOptions, refIndent).stringField("project_id", ref.project_id).build()
    )
    .build();
