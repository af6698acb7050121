export { BatchUploader, partition } from './upload-batches.js';
export type { BatchUploaderOptions, RecordOutcome, UploadReport } from './upload-batches.js';
export { closeWorkDay } from './close-work-day.js';
export { runShipmentPipeline } from './run-pipeline.js';
export type { PipelineOptions, PipelineSource, PipelineSummary, RowReport, RowStatus } from './run-pipeline.js';
