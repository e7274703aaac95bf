/**
 * @module jsonld
 *
 * Builds the JSON-LD `Dataset` document from a classification. Each
 * descriptor becomes one `variableMeasured` entry carrying its role, path and
 * local attributes.
 */

import {
  DEFAULT_DATASET_NAME,
  DEFAULT_ENCODING_FORMAT,
  LINKED_DATA_CONTEXT,
} from "./constants.js";
import { displayName } from "./classify.js";
import { decodeText } from "./text.js";
import type {
  AttributeName,
  AttributeScalar,
  AttributeValue,
  Classification,
  LinkedDataDocument,
  NodeDescriptor,
  PropertyValue,
  PropertyValueContent,
  TaxonomyGroup,
  VariableEntry,
  VariableRole,
} from "./types.js";

export interface LinkedDataOptions {
  /** Document name (default: 'Array Dataset') */
  name?: string;
  /** Media type of the source container (default: 'application/x-hdf5') */
  encodingFormat?: string;
}

/** Group order in the document, with each group's role tag */
const GROUP_ROLES: ReadonlyArray<readonly [TaxonomyGroup, VariableRole]> = [
  ["measures", "Measure"],
  ["dimensions", "Dimension"],
  ["attributes", "Attribute"],
];

function toJsonScalar(value: AttributeScalar): string | number | boolean | null {
  if (value instanceof Uint8Array) return decodeText(value);
  if (typeof value === "bigint") {
    const asNumber = Number(value);
    return Number.isSafeInteger(asNumber) ? asNumber : value.toString();
  }
  // JSON has no NaN or Infinity
  if (typeof value === "number" && !Number.isFinite(value)) {
    return String(value);
  }
  return value;
}

function isScalarList(
  value: AttributeValue,
): value is readonly AttributeScalar[] {
  return Array.isArray(value);
}

function toPropertyContent(value: AttributeValue): PropertyValueContent {
  if (isScalarList(value)) {
    return value.map((item) => toJsonScalar(item));
  }
  return toJsonScalar(value);
}

function toPropertyName(name: AttributeName): string {
  return typeof name === "string" ? name : decodeText(name);
}

/**
 * Convert local attributes to schema.org PropertyValues, in source order.
 */
export function toPropertyValues(
  attributes: ReadonlyMap<AttributeName, AttributeValue>,
): PropertyValue[] {
  const properties: PropertyValue[] = [];
  for (const [name, value] of attributes) {
    properties.push({
      "@type": "PropertyValue",
      name: toPropertyName(name),
      value: toPropertyContent(value),
    });
  }
  return properties;
}

function toVariableEntry(
  descriptor: NodeDescriptor,
  role: VariableRole,
  encodingFormat: string,
): VariableEntry {
  return {
    "@type": "PropertyValue",
    name: displayName(descriptor.path),
    path: `/${descriptor.path}`,
    encodingFormat,
    role,
    additionalProperty: toPropertyValues(descriptor.localAttributes),
  };
}

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

/**
 * Assemble the linked-data document.
 *
 * Entries are ordered measures, then dimensions, then attributes, each in
 * classification order. The returned document is frozen.
 */
export function buildLinkedDataDocument(
  classification: Classification,
  options: LinkedDataOptions = {},
): LinkedDataDocument {
  const {
    name = DEFAULT_DATASET_NAME,
    encodingFormat = DEFAULT_ENCODING_FORMAT,
  } = options;

  const variableMeasured: VariableEntry[] = [];
  for (const [group, role] of GROUP_ROLES) {
    for (const descriptor of classification[group]) {
      variableMeasured.push(toVariableEntry(descriptor, role, encodingFormat));
    }
  }

  const document: LinkedDataDocument = {
    "@context": { ...LINKED_DATA_CONTEXT },
    "@type": "Dataset",
    name,
    variableMeasured,
  };
  return deepFreeze(document);
}

/**
 * Serialize a document as JSON text. Field order is fixed by assembly, so
 * equal inputs give identical text.
 */
export function serializeLinkedDataDocument(
  document: LinkedDataDocument,
  indent = 2,
): string {
  return JSON.stringify(document, null, indent);
}
