/**
 * System variables of a script or multi-statement query.
 */

import { decodeMap, decodeResource, encodeMap, getOr, ROOT_PATH, type JsonObject } from "../codec/json.js";
import { DebugFormatter, type DebugRenderer } from "../debug/index.js";
import {
  debugStandardSqlDataType,
  parseStandardSqlDataType,
  serializeStandardSqlDataType,
  type StandardSqlDataType,
} from "./standard-sql.js";
import { debugStruct, parseStruct, serializeStruct, type Struct } from "./value.js";

export interface SystemVariables {
  types: Record<string, StandardSqlDataType>;
  values: Struct;
}

export function createSystemVariables(): SystemVariables {
  return { types: {}, values: { fields: {} } };
}

export function serializeSystemVariables(vars: SystemVariables): Record<string, unknown> {
  return {
    types: encodeMap(vars.types, serializeStandardSqlDataType),
    values: serializeStruct(vars.values),
  };
}

export function parseSystemVariables(json: JsonObject, path: string = ROOT_PATH): SystemVariables {
  return {
    types: getOr(json, "types", decodeMap(decodeResource(parseStandardSqlDataType)), {}, path),
    values: getOr(json, "values", decodeResource(parseStruct), { fields: {} }, path),
  };
}

export const debugSystemVariables: DebugRenderer<SystemVariables> = (vars, name, options, indent) =>
  new DebugFormatter(name, options, indent)
    .messageMap("types", vars.types, debugStandardSqlDataType)
    .subMessage("values", vars.values, debugStruct)
    .build();
