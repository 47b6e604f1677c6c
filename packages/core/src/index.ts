export * from "./catalog/CatalogRegistry.js";
export * from "./catalog/SystemPromptCatalog.js";
export * from "./catalog/TaskCatalog.js";
export * from "./config/Config.js";
export * from "./config/ConfigLoader.js";
export * from "./context/ContextAggregator.js";
export * from "./context/PathResolver.js";
export type { AggregationResult, ContextEntry, PipelineWarning } from "./context/Types.js";
export type { ExtractionResult, FormatReader } from "./extract/FormatReader.js";
export * from "./extract/TextExtractor.js";
export * from "./models/ModelCatalog.js";
export * from "./prompts/PromptComposer.js";
export * from "./request/HttpTransport.js";
export * from "./request/InteractionRecorder.js";
export * from "./request/RequestBuilder.js";
export * from "./request/RequestDispatcher.js";
export * from "./request/RequestTypes.js";
export * from "./services/AskService.js";
export * from "./services/PromptAssemblyService.js";
export * from "./tokens/TokenCounter.js";
