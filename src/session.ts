import { loadConfig } from './config/loader.js';
import type { FluxgenConfig } from './config/types.js';
import { Graph } from './graph/graph.js';
import type { LintEngine } from './lint/engine.js';
import { createLintEngine } from './lint/passes/index.js';
import { logger as defaultLogger, type TLogger } from './logger.js';
import { loadBuiltinRegistry, loadCatalogFile } from './registry/catalog.js';
import type { NodeSpecRegistry } from './registry/registry.js';

export type TSession = {
  graph: Graph;
  lint: LintEngine;
};

export type TSessionOptions = {
  /** Defaults to `loadConfig()` */
  config?: FluxgenConfig;
  logger?: TLogger;
};

/** Builtin registry with the configured extra catalog layered over it */
export function registryFromConfig(config: FluxgenConfig): NodeSpecRegistry {
  const builtin = loadBuiltinRegistry();
  return config.catalog ? builtin.merge(loadCatalogFile(config.catalog)) : builtin;
}

/**
 * A fresh graph and lint engine. Sessions share no state; call this once per
 * program being built.
 */
export function createSession(options: TSessionOptions = {}): TSession {
  const config = options.config ?? loadConfig();
  const logger = options.logger ?? defaultLogger;
  const registry = registryFromConfig(config);
  logger.debug(`Session registry has ${registry.names().length} node types`);
  return {
    graph: new Graph(registry, { logger }),
    lint: createLintEngine({ disabled: config.lint.disabled, logger }),
  };
}
