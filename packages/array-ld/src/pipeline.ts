/**
 * @module pipeline
 *
 * Runs extraction, candidate detection, classification and assembly in
 * sequence. Per-node problems are collected as diagnostics; only an empty
 * input or a broken partition fails the run.
 */

import { detectDimensionCandidates } from "./candidates.js";
import { classifyDescriptors } from "./classify.js";
import { extractDescriptors } from "./descriptor.js";
import { EmptyInputError } from "./errors.js";
import { buildLinkedDataDocument } from "./jsonld.js";
import type { Logger } from "./logger.js";
import { consoleLogger } from "./logger.js";
import type { ArrayNodeSource } from "./source.js";
import type {
  Classification,
  DescriptorCollection,
  Diagnostic,
  DimensionCandidateSet,
  LinkedDataDocument,
  RawArrayNode,
} from "./types.js";

export interface PipelineOptions {
  /** Document name */
  name?: string;
  /** Media type of the source container */
  encodingFormat?: string;
  /** Receives diagnostics and stage summaries (default: console) */
  logger?: Logger;
}

export interface PipelineResult {
  document: LinkedDataDocument;
  descriptors: DescriptorCollection;
  candidates: DimensionCandidateSet;
  classification: Classification;
  /** Every recoverable per-node problem, in stage order */
  diagnostics: Diagnostic[];
}

function report(logger: Logger, diagnostics: readonly Diagnostic[]): void {
  for (const diagnostic of diagnostics) {
    logger.warn(`${diagnostic.path}: ${diagnostic.message}`, {
      stage: diagnostic.stage,
      code: diagnostic.code,
      shape: diagnostic.shape,
    });
  }
}

/**
 * Classify a collection of array nodes and build its linked-data document.
 *
 * @throws {EmptyInputError} if no node survives extraction
 * @throws {StructuralViolationError} if classification is not a partition
 */
export function runPipeline(
  nodes: Iterable<RawArrayNode>,
  options: PipelineOptions = {},
): PipelineResult {
  const logger = options.logger ?? consoleLogger;

  const extraction = extractDescriptors(nodes);
  report(logger, extraction.diagnostics);
  const { descriptors } = extraction;
  if (descriptors.size === 0) {
    throw new EmptyInputError();
  }

  const detection = detectDimensionCandidates(descriptors);
  report(logger, detection.diagnostics);
  const { candidates } = detection;

  const outcome = classifyDescriptors(descriptors, candidates);
  report(logger, outcome.diagnostics);
  const { classification } = outcome;

  logger.debug("Classified array nodes", {
    nodes: descriptors.size,
    candidates: candidates.size,
    measures: classification.measures.length,
    dimensions: classification.dimensions.length,
    attributes: classification.attributes.length,
  });

  const document = buildLinkedDataDocument(classification, {
    name: options.name,
    encodingFormat: options.encodingFormat,
  });

  return {
    document,
    descriptors,
    candidates,
    classification,
    diagnostics: [
      ...extraction.diagnostics,
      ...detection.diagnostics,
      ...outcome.diagnostics,
    ],
  };
}

/**
 * Read every node from a source, then run the pipeline over them.
 * The source's encoding format is used unless one is given.
 */
export async function describeSource(
  source: ArrayNodeSource,
  options: PipelineOptions = {},
): Promise<PipelineResult> {
  const nodes: RawArrayNode[] = [];
  for await (const node of source.nodes()) {
    nodes.push(node);
  }
  return runPipeline(nodes, {
    ...options,
    encodingFormat: options.encodingFormat ?? source.encodingFormat,
  });
}
