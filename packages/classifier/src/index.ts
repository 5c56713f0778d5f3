export type {
  ClassifyOptions,
  HarnessFailure,
  HarnessFailureDetail,
  HarnessSuccess,
  HarnessVerdict,
} from "./classify.js";
export { classifyOutput, verdictError } from "./classify.js";
export type { HarnessDialect } from "./dialect.js";
export { DEFAULT_DIALECT, isHarnessLine, relabelSources } from "./dialect.js";
export { parseDeclaredParameters } from "./probe.js";
