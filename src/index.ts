/**
 * fluxgen: typed builder for impulse-driven node graphs
 */

// Types and errors
export * from './datatypes.js';
export * from './errors.js';
export * from './constants.js';

// Registry
export * from './registry/node-spec.js';
export { NodeSpecRegistry } from './registry/registry.js';
export {
  catalogSchema,
  loadBuiltinRegistry,
  loadCatalogFile,
  registryFromCatalog,
  type TCatalog,
} from './registry/catalog.js';

// Graph construction
export { Graph, type TGraphOptions } from './graph/graph.js';
export { GraphNode } from './graph/node.js';
export { Port, InputPort, OutputPort } from './graph/ports.js';
export { combine, operandDatatype, toOperand, type TOperand, type TOperandSource } from './graph/combine.js';
export { IntValue, SlotValue } from './values.js';

// Control flow
export { ImpulseChain, assertImpulse } from './control-flow/impulse-chain.js';
export {
  BranchScope,
  ControlFlowBuilder,
  FlowScope,
  type TBranchFrame,
  type TBranchState,
  type TScopeKind,
} from './control-flow/builder.js';

// Lint
export { LintEngine, type TLintEngineOptions } from './lint/engine.js';
export type { TLintPass, TLintWarning } from './lint/types.js';
export {
  builtinLintPasses,
  createLintEngine,
  dynVarNamingPass,
  unboundInputPass,
  type TCreateLintEngineOptions,
} from './lint/passes/index.js';

// Ambient
export { loadConfig, loadConfigFromPath, loadEnvConfig, mergeConfig } from './config/loader.js';
export type { FluxgenConfig, LintConfig, PartialFluxgenConfig } from './config/types.js';
export { createSession, registryFromConfig, type TSession, type TSessionOptions } from './session.js';
export { logger, type TLogger } from './logger.js';
export { findClosestMatches, levenshteinDistance } from './utils/string-distance.js';
