/**
 * Ingest Module
 */

export {
  IngestPipeline,
  createIngestPipeline,
  type IngestDependencies,
  type IngestMode,
  type IngestOptions,
  type IngestPipelineOptions,
  type IngestResult,
} from './pipeline.js';
