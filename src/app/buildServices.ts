import type { AppConfig } from "@/config";
import { BatchOrchestratorDefault } from "@/services/BatchOrchestrator";
import { ClassifierHttp } from "@/services/Classifier";
import { CommandRunnerSpawn } from "@/services/CommandRunner";
import { FileSystemScannerDefault } from "@/services/FileSystemScanner";
import { ImageValidatorSharp } from "@/services/ImageValidator";
import { JobStatusStore } from "@/services/JobStatus";
import { MetadataWriterExifTool } from "@/services/MetadataWriter";
import { TaggingPipelineDefault } from "@/services/TaggingPipeline";
import type { Logger } from "~shared/Logger";

/** 依設定組裝所有服務，秒數設定在此轉為毫秒 */
export function buildServices(config: AppConfig, logger: Logger) {
  const classifier = new ClassifierHttp({
    baseUrl: config.AUTOTAG_CLASSIFIER_URL,
    timeoutMs: config.AUTOTAG_CLASSIFIER_TIMEOUT * 1000,
    minPersonHeight: config.AUTOTAG_MIN_PERSON_HEIGHT,
    logger,
  });
  const validator = new ImageValidatorSharp();
  const pipeline = new TaggingPipelineDefault({ classifier, logger });
  const writer = new MetadataWriterExifTool({
    runner: new CommandRunnerSpawn(),
    toolCommand: [config.AUTOTAG_EXIFTOOL_PATH],
    timeoutMs: config.AUTOTAG_EXIFTOOL_TIMEOUT * 1000,
    logger,
  });
  const store = new JobStatusStore();
  const orchestrator = new BatchOrchestratorDefault({
    scanner: new FileSystemScannerDefault(),
    validator,
    pipeline,
    writer,
    store,
    logger,
  });
  return { validator, pipeline, writer, store, orchestrator };
}
