export { createConfig, configFingerprint, describeConfig, featureTags, CONFIG_FIELDS } from "./config.js";
export type { ConfigField, SramConfig } from "./config.js";
export { PROCESS_NODES, PROCESS_NODE_FIELDS, lookupNode, mergeProcessTable, supportedNodes } from "./process_nodes.js";
export type { ProcessNode, ProcessTable } from "./process_nodes.js";
export { estimateArea } from "./area.js";
export type { AreaEstimate } from "./area.js";
export { estimateTiming } from "./timing.js";
export type { TimingEstimate } from "./timing.js";
export { DEFAULT_ACTIVITY_FACTOR, DEFAULT_ACTIVITY_SWEEP, estimatePower, sweepActivity } from "./power.js";
export type { PowerEstimate, PowerOptions } from "./power.js";
export { decodeWord, eccCheckBits, eccLayout, encodeWord, hammingBits } from "./ecc.js";
export type { DecodedWord, EccLayout } from "./ecc.js";
export { describeDesign, findModule, moduleBaseName } from "./rtl_structure.js";
export type { ModuleRole, RtlModule, SramDesign } from "./rtl_structure.js";
export { renderDesign, renderModule } from "./rtl_render.js";
export type { VerilogArtifact } from "./rtl_render.js";
export { generateVerilog, writeArtifacts } from "./generate_verilog.js";
export { designGraph, renderBlockDiagram } from "./diagram.js";
export { areaTimingAnalysis, powerAnalysis, renderComparisonMarkdown, renderDesignReport, summarize } from "./report.js";
export type { ComparisonRow, DesignSummary } from "./report.js";
export { listTemplates, loadTemplates, resolveConfigSource } from "./templates.js";
export type { ConfigSource, TemplateDoc } from "./templates.js";
export { createLogger } from "./logger.js";
export type { Logger, LogLevel } from "./logger.js";
export {
  ArtifactWriteError,
  ConfigurationError,
  InvalidActivityFactorError,
  ModelRangeError,
  SramError,
} from "./errors.js";
