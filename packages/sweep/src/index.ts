export type { ExpandedToken, IntegerRange } from "./range.js";
export { RANGE_SEPARATOR, expandRange, expandToken, isRangeToken, parseRange, rangeValues } from "./range.js";
export type { ArgumentBinding, ArgumentToken, BoundArgument } from "./bind.js";
export { bindArguments, parseArgumentToken } from "./bind.js";
export type { SweepParameter, SweepPoint } from "./product.js";
export { sweepPoints, toSweepParameters } from "./product.js";
export type { HarnessConfig } from "./config.js";
export { DEFAULT_HARNESS_CONFIG, ENV_PREFIX, resolveHarnessConfig } from "./config.js";
export type { HarnessFlag, HarnessRunner, ProcessRunnerOptions } from "./runner.js";
export { ProcessHarnessRunner, harnessArguments, resultFilePath } from "./runner.js";
export type { ResultReader, SweepDependencies, SweepPlan, SweepRequest } from "./orchestrator.js";
export { planSweep, probeParameters, runSweep } from "./orchestrator.js";
