/**
 * array-ld
 *
 * Classifies the array nodes of hierarchical scientific files into measures,
 * dimensions and attributes, and describes them as a JSON-LD `Dataset`.
 *
 * @example
 * ```typescript
 * import { runPipeline, serializeLinkedDataDocument } from 'array-ld'
 *
 * const { document, diagnostics } = runPipeline(
 *   [
 *     { path: 'x', shape: [10], dtype: '<f8' },
 *     { path: 'y', shape: [10, 5], dtype: '<f4', attributes: { units: 'K' } },
 *     { path: 'units', shape: [], dtype: '|S8' },
 *   ],
 *   { name: 'Example Dataset' }
 * )
 *
 * console.log(serializeLinkedDataDocument(document))
 * ```
 *
 * @packageDocumentation
 */

// Pipeline
export {
  runPipeline,
  describeSource,
  type PipelineOptions,
  type PipelineResult,
} from "./pipeline.js";

// Stages
export {
  extractDescriptor,
  extractDescriptors,
  normalizeAttributeValue,
  normalizePath,
  parseShape,
  type CollectionExtraction,
  type DescriptorExtraction,
} from "./descriptor.js";
export {
  detectDimensionCandidates,
  hasAxisLabel,
  isDimensionCandidate,
  type CandidateDetection,
} from "./candidates.js";
export {
  assertPartition,
  classifyDescriptor,
  classifyDescriptors,
  displayName,
  firstAxisLengths,
  type ClassificationOutcome,
} from "./classify.js";
export {
  buildLinkedDataDocument,
  serializeLinkedDataDocument,
  toPropertyValues,
  type LinkedDataOptions,
} from "./jsonld.js";

// Element types
export {
  canonicalElementType,
  dtypeTag,
  isNumericElementType,
} from "./element-type.js";

export { decodeText } from "./text.js";

// Readers
export type { ArrayNodeSource } from "./source.js";

// Errors and logging
export {
  ArrayLdError,
  EmptyInputError,
  StructuralViolationError,
  type ArrayLdErrorCode,
} from "./errors.js";
export { consoleLogger, silentLogger, type Logger } from "./logger.js";
export { err, ok, type Err, type Ok, type Result } from "./result.js";

// Constants
export {
  DEFAULT_DATASET_NAME,
  DEFAULT_ENCODING_FORMAT,
  ENCODING_FORMATS,
  LINKED_DATA_CONTEXT,
  TIME_NAME_MARKER,
} from "./constants.js";

export type {
  AttributeName,
  AttributeScalar,
  AttributeValue,
  Classification,
  DescriptorCollection,
  Diagnostic,
  DiagnosticCode,
  DiagnosticStage,
  DimensionCandidateSet,
  ElementType,
  LinkedDataContext,
  LinkedDataDocument,
  NodeDescriptor,
  PropertyValue,
  PropertyValueContent,
  RawArrayNode,
  RawAxisLabel,
  Shape,
  TaxonomyGroup,
  VariableEntry,
  VariableRole,
} from "./types.js";
