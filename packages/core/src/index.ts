export type {
  CharacterizationKind,
  CharacterizationResult,
  DeclaredParameter,
  ErrorGrid,
  ErrorModel,
  ExactLookupModel,
  ExhaustiveResult,
  MedCell,
  ModuleKind,
  OperandPairKey,
  PairedError,
  Random2DResult,
  Random3DResult,
  RegressionSegment,
  ResultMeta,
  RunMetadata,
  SegmentedMedModel,
  SegmentedRegressionModel,
} from "./types.js";
export { isCharacterizationKind, isModuleKind, pairKey } from "./types.js";
export type {
  BindingErrorCode,
  ErrorCode,
  ErrorDetails,
  HarnessErrorCode,
  InvocationErrorCode,
  ProtocolErrorCode,
  RangeErrorCode,
} from "./errors.js";
export { CharacterizationError, describeParameters, formatError, isCharacterizationError } from "./errors.js";
export type { Severity, SeverityVocabulary } from "./severity.js";
export { COLOR_VOCABULARY, PLAIN_VOCABULARY, SEVERITIES, ansiHighlight, relabel, stripAnsi } from "./severity.js";
export type { MemoryReporter, Reporter, ReportedLine, StreamReporterOptions } from "./reporter.js";
export { createMemoryReporter, createStreamReporter, silentReporter } from "./reporter.js";
