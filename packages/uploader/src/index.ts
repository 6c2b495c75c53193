export {
	DEFAULT_CONFIG_PATH,
	loadUploaderConfig,
	parseUploaderConfig,
	type UploaderConfig,
} from "./config.js";
export { batchRows, ndjsonProducer, readNdjsonRows, type RowProducer } from "./producer.js";
export {
	type BatchReport,
	DEFAULT_BATCH_SIZE,
	isAbortError,
	runUploader,
	type UploaderOptions,
	type UploadSummary,
} from "./uploader.js";
