export type * from "./types.js";

export { cleanNetlist, removeEnclosedSpace } from "./netlist/clean.js";
export { ELEMENT_TYPES, identifyLineType, resolvePorts, type ElementType, type ElementTypeKey } from "./netlist/elementTypes.js";
export { ROOT_FRAME, elementId, parseLine, parseNetlist, type ParsedLine } from "./netlist/parse.js";
export { elementToLine, synthesize } from "./netlist/synthesize.js";
export { CircuitSection, cloneElement, type ElementTransform } from "./netlist/circuit.js";
export { compilePattern, filterElements, matchElements, normalizeCriteria } from "./netlist/filter.js";
export { repackArgs, replaceArgument, unpackArgs, type ArgumentEntry, type ArgumentList } from "./netlist/args.js";
export { circuitToDot } from "./netlist/graph.js";
export * from "./netlist/errors.js";

export {
  ExternalControlSection,
  LogicalControlSection,
  extractCircuit,
  extractControl,
  type ControlOption,
  type ControlSection,
  type ExtractControlOptions,
  type LogicalControlOptions,
} from "./control/controlSection.js";
export * from "./control/simulations.js";

export { readNetlist, writeNetlist, writeSimNetlist, writeJson, type NetlistSource } from "./util/io.js";
export { extractOutputData, runSimulation, type SimulationRun } from "./sim/ngspice.js";
export { mergeSweepConfig, parseSweepConfig, readSweepConfig, type SweepConfig, type SweepFilter, type SweepSpec } from "./util/runConfig.js";
export { defaultLogger, silentLogger, type Logger } from "./util/logger.js";
export { applySweepValue, cartesian, runSweep, type SweepOptions, type SweepResult, type SweepStep } from "./sweep.js";
