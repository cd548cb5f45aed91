/**
 * Dataset resources for BigQuery.
 */

import {
  decodeArray,
  decodeBool,
  decodeDuration,
  decodeResource,
  decodeString,
  decodeStringMap,
  decodeTimestamp,
  encodeDuration,
  encodeTimestamp,
  getOptional,
  getOr,
  ROOT_PATH,
  type JsonObject,
} from "../codec/json.js";
import { DebugFormatter, type DebugRenderer } from "../debug/index.js";
import {
  createDatasetReference,
  debugDatasetReference,
  debugEncryptionConfiguration,
  debugRoutineReference,
  debugTableReference,
  parseDatasetReference,
  parseEncryptionConfiguration,
  parseRoutineReference,
  parseTableReference,
  serializeDatasetReference,
  serializeEncryptionConfiguration,
  serializeRoutineReference,
  serializeTableReference,
  type DatasetReference,
  type EncryptionConfiguration,
  type RoutineReference,
  type TableReference,
} from "./common.js";

/**
 * Dataset access entry.
 *
 * Exactly one grantee (email, group, domain, special group, IAM member,
 * authorized view or routine) is normally set.
 */
export interface DatasetAccessEntry {
  /** READER, WRITER or OWNER. */
  role: string;
  user_by_email: string;
  group_by_email: string;
  domain: string;

  /** projectReaders, projectWriters, projectOwners or allAuthenticatedUsers. */
  special_group: string;

  iam_member: string;
  view?: TableReference;
  routine?: RoutineReference;
}

/**
 * Source of a linked dataset.
 */
export interface LinkedDatasetSource {
  source_dataset: DatasetReference;
}

/**
 * Complete dataset metadata and configuration.
 */
export interface Dataset {
  kind: string;
  etag: string;
  id: string;
  self_link: string;
  friendly_name: string;
  description: string;
  location: string;
  default_collation: string;

  /** DEFAULT or LINKED. */
  type: string;

  is_case_insensitive: boolean;
  labels: Record<string, string>;
  access: DatasetAccessEntry[];
  dataset_reference: DatasetReference;

  /** Milliseconds; 0 when unset. */
  default_table_expiration: number;
  /** Milliseconds; 0 when unset. */
  default_partition_expiration: number;

  creation_time: Date;
  last_modified_time: Date;

  default_encryption_configuration?: EncryptionConfiguration;
  linked_dataset_source?: LinkedDatasetSource;
}

/**
 * Dataset as returned by `datasets.list`.
 */
export interface ListFormatDataset {
  kind: string;
  id: string;
  friendly_name: string;
  location: string;
  type: string;
  labels: Record<string, string>;
  dataset_reference: DatasetReference;
}

/**
 * Parse dataset access entry from BigQuery JSON response.
 */
export function parseDatasetAccessEntry(json: JsonObject, path: string = ROOT_PATH): DatasetAccessEntry {
  const entry: DatasetAccessEntry = {
    role: getOr(json, "role", decodeString, "", path),
    user_by_email: getOr(json, "userByEmail", decodeString, "", path),
    group_by_email: getOr(json, "groupByEmail", decodeString, "", path),
    domain: getOr(json, "domain", decodeString, "", path),
    special_group: getOr(json, "specialGroup", decodeString, "", path),
    iam_member: getOr(json, "iamMember", decodeString, "", path),
  };

  const view = getOptional(json, "view", decodeResource(parseTableReference), path);
  if (view) entry.view = view;

  const routine = getOptional(json, "routine", decodeResource(parseRoutineReference), path);
  if (routine) entry.routine = routine;

  return entry;
}

/**
 * Serialize dataset access entry; empty grantees are left out.
 */
export function serializeDatasetAccessEntry(entry: DatasetAccessEntry): Record<string, unknown> {
  const json: Record<string, unknown> = {};
  if (entry.role) json.role = entry.role;
  if (entry.user_by_email) json.userByEmail = entry.user_by_email;
  if (entry.group_by_email) json.groupByEmail = entry.group_by_email;
  if (entry.domain) json.domain = entry.domain;
  if (entry.special_group) json.specialGroup = entry.special_group;
  if (entry.iam_member) json.iamMember = entry.iam_member;
  if (entry.view) json.view = serializeTableReference(entry.view);
  if (entry.routine) json.routine = serializeRoutineReference(entry.routine);
  return json;
}

function parseLinkedDatasetSource(json: JsonObject, path: string): LinkedDatasetSource {
  return {
    source_dataset: getOr(
      json,
      "sourceDataset",
      decodeResource(parseDatasetReference),
      createDatasetReference(),
      path
    ),
  };
}

/**
 * Parse dataset from BigQuery JSON response.
 */
export function parseDataset(json: JsonObject, path: string = ROOT_PATH): Dataset {
  const dataset: Dataset = {
    kind: getOr(json, "kind", decodeString, "", path),
    etag: getOr(json, "etag", decodeString, "", path),
    id: getOr(json, "id", decodeString, "", path),
    self_link: getOr(json, "selfLink", decodeString, "", path),
    friendly_name: getOr(json, "friendlyName", decodeString, "", path),
    description: getOr(json, "description", decodeString, "", path),
    location: getOr(json, "location", decodeString, "", path),
    default_collation: getOr(json, "defaultCollation", decodeString, "", path),
    type: getOr(json, "type", decodeString, "", path),
    is_case_insensitive: getOr(json, "isCaseInsensitive", decodeBool, false, path),
    labels: getOr(json, "labels", decodeStringMap, {}, path),
    access: getOr(json, "access", decodeArray(decodeResource(parseDatasetAccessEntry)), [], path),
    dataset_reference: getOr(
      json,
      "datasetReference",
      decodeResource(parseDatasetReference),
      createDatasetReference(),
      path
    ),
    default_table_expiration: getOr(json, "defaultTableExpirationMs", decodeDuration, 0, path),
    default_partition_expiration: getOr(json, "defaultPartitionExpirationMs", decodeDuration, 0, path),
    creation_time: getOr(json, "creationTime", decodeTimestamp, new Date(0), path),
    last_modified_time: getOr(json, "lastModifiedTime", decodeTimestamp, new Date(0), path),
  };

  const encryption = getOptional(
    json,
    "defaultEncryptionConfiguration",
    decodeResource(parseEncryptionConfiguration),
    path
  );
  if (encryption) dataset.default_encryption_configuration = encryption;

  const linked = getOptional(json, "linkedDatasetSource", decodeResource(parseLinkedDatasetSource), path);
  if (linked) dataset.linked_dataset_source = linked;

  return dataset;
}

/**
 * Serialize dataset to BigQuery JSON format.
 */
export function serializeDataset(dataset: Dataset): Record<string, unknown> {
  const json: Record<string, unknown> = {
    kind: dataset.kind,
    etag: dataset.etag,
    id: dataset.id,
    selfLink: dataset.self_link,
    friendlyName: dataset.friendly_name,
    description: dataset.description,
    location: dataset.location,
    defaultCollation: dataset.default_collation,
    type: dataset.type,
    isCaseInsensitive: dataset.is_case_insensitive,
    labels: dataset.labels,
    access: dataset.access.map(serializeDatasetAccessEntry),
    datasetReference: serializeDatasetReference(dataset.dataset_reference),
    defaultTableExpirationMs: encodeDuration(dataset.default_table_expiration),
    defaultPartitionExpirationMs: encodeDuration(dataset.default_partition_expiration),
    creationTime: encodeTimestamp(dataset.creation_time),
    lastModifiedTime: encodeTimestamp(dataset.last_modified_time),
  };

  if (dataset.default_encryption_configuration) {
    json.defaultEncryptionConfiguration = serializeEncryptionConfiguration(dataset.default_encryption_configuration);
  }
  if (dataset.linked_dataset_source) {
    json.linkedDatasetSource = {
      sourceDataset: serializeDatasetReference(dataset.linked_dataset_source.source_dataset),
    };
  }

  return json;
}

/**
 * Parse a `datasets.list` entry.
 */
export function parseListFormatDataset(json: JsonObject, path: string = ROOT_PATH): ListFormatDataset {
  return {
    kind: getOr(json, "kind", decodeString, "", path),
    id: getOr(json, "id", decodeString, "", path),
    friendly_name: getOr(json, "friendlyName", decodeString, "", path),
    location: getOr(json, "location", decodeString, "", path),
    type: getOr(json, "type", decodeString, "", path),
    labels: getOr(json, "labels", decodeStringMap, {}, path),
    dataset_reference: getOr(
      json,
      "datasetReference",
      decodeResource(parseDatasetReference),
      createDatasetReference(),
      path
    ),
  };
}

export const debugDatasetAccessEntry: DebugRenderer<DatasetAccessEntry> = (entry, name, options, indent) =>
  new DebugFormatter(name, options, indent)
    .stringField("role", entry.role)
    .stringField("user_by_email", entry.user_by_email)
    .stringField("group_by_email", entry.group_by_email)
    .stringField("domain", entry.domain)
    .stringField("special_group", entry.special_group)
    .stringField("iam_member", entry.iam_member)
    .optionalSubMessage("view", entry.view, debugTableReference)
    .optionalSubMessage("routine", entry.routine, debugRoutineReference)
    .build();

export const debugDataset: DebugRenderer<Dataset> = (dataset, name, options, indent) =>
  new DebugFormatter(name, options, indent)
    .stringField("kind", dataset.kind)
    .stringField("etag", dataset.etag)
    .stringField("id", dataset.id)
    .stringField("self_link", dataset.self_link)
    .stringField("friendly_name", dataset.friendly_name)
    .stringField("description", dataset.description)
    .stringField("type", dataset.type)
    .stringField("location", dataset.location)
    .stringField("default_collation", dataset.default_collation)
    .field("is_case_insensitive", dataset.is_case_insensitive)
    .durationField("default_table_expiration", dataset.default_table_expiration)
    .durationField("default_partition_expiration", dataset.default_partition_expiration)
    .timestampField("creation_time", dataset.creation_time)
    .timestampField("last_modified_time", dataset.last_modified_time)
    .mapField("labels", dataset.labels)
    .subMessages("access", dataset.access, debugDatasetAccessEntry)
    .subMessage("dataset_reference", dataset.dataset_reference, debugDatasetReference)
    .optionalSubMessage(
      "default_encryption_configuration",
      dataset.default_encryption_configuration,
      debugEncryptionConfiguration
    )
    .optionalSubMessage(
      "linked_dataset_source",
      dataset.linked_dataset_source,
      (linked, linkedName, linkedOptions, linkedIndent) =>
        new DebugFormatter(linkedName, linkedOptions, linkedIndent)
          .subMessage("source_dataset", linked.source_dataset, debugDatasetReference)
          .build()
    )
    .build();

export const debugListFormatDataset: DebugRenderer<ListFormatDataset> = (dataset, name, options, indent) =>
  new DebugFormatter(name, options, indent)
    .stringField("kind", dataset.kind)
    .stringField("id", dataset.id)
    .stringField("friendly_name", dataset.friendly_name)
    .stringField("location", dataset.location)
    .stringField("type", dataset.type)
    .mapField("labels", dataset.labels)
    .subMessage("dataset_reference", dataset.dataset_reference, debugDatasetReference)
    .build();
