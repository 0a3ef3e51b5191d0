export * from "./config/ConfigLoader.js";
export * from "./logging/RunLogger.js";
export * from "./services/request/PlaceholderResolver.js";
export * from "./services/request/AuthSynthesizer.js";
export * from "./services/request/TargetExpander.js";
export * from "./services/request/ExecutionReporter.js";
export * from "./services/request/ResponseReport.js";
export * from "./services/request/RequestExecutor.js";
export * from "./services/transport/Transport.js";
export * from "./services/transport/FetchTransport.js";
export * from "./services/transport/MockResponder.js";
export * from "./services/assertions/AssertionEvaluator.js";
export * from "./services/assertions/ScriptRunner.js";
export * from "./services/library/CurlConverter.js";
export * from "./services/library/DescriptorCodec.js";
export * from "./services/library/LibraryService.js";
export * from "./services/history/LineDiff.js";
export * from "./services/history/HistoryService.js";
export * from "./services/chain/ChainRunner.js";
