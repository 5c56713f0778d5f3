export { DOMAIN_BITS, DOMAIN_COUNT, domainOf, domainShift } from "./segments.js";
export type { Observation } from "./regression.js";
export { fitLine, meanOf } from "./regression.js";
export { modelName, varyingParameterIndices } from "./naming.js";
export type { SynthesizedModel } from "./synthesize.js";
export { synthesizeModel, synthesizeModels } from "./synthesize.js";
export type { OperandRange, UnitShape } from "./apply.js";
export { applyModel, operandRange } from "./apply.js";
export type { CellArtifact, ModelArtifact, ModelKind, SegmentArtifact } from "./schemas.js";
export { modelArtifactSchema } from "./schemas.js";
export { assertModelArtifact, parseModelArtifact, toModelArtifact, writeModelArtifacts } from "./artifacts.js";
