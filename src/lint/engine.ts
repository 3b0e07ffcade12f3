import type { Graph } from '../graph/graph.js';
import { logger as defaultLogger, type TLogger } from '../logger.js';
import type { TLintPass, TLintWarning } from './types.js';

export type TLintEngineOptions = {
  logger?: TLogger;
};

/**
 * Ordered collection of lint passes.
 *
 * Each engine owns its passes; create one per session rather than sharing a
 * registry between graphs.
 */
export class LintEngine {
  private readonly registered: TLintPass[] = [];
  private readonly logger: TLogger;

  constructor(passes: Iterable<TLintPass> = [], options: TLintEngineOptions = {}) {
    this.logger = options.logger ?? defaultLogger;
    for (const pass of passes) {
      this.register(pass);
    }
  }

  register(pass: TLintPass): this {
    this.registered.push(pass);
    return this;
  }

  passes(): readonly TLintPass[] {
    return this.registered;
  }

  /** Warnings from every pass, in registration order */
  collect(graph: Graph): TLintWarning[] {
    const nodes = graph.nodes();
    return this.registered.flatMap((pass) => pass.run(nodes));
  }

  /**
   * Runs every pass, logs each warning and returns how many there were.
   * Warnings are advisory; nothing here throws on their account.
   */
  run(graph: Graph): number {
    const warnings = this.collect(graph);
    for (const warning of warnings) {
      const where = warning.node === undefined ? '' : ` (node ${warning.node})`;
      this.logger.warn(`[${warning.pass}] ${warning.code}${where}: ${warning.message}`);
    }
    this.logger.debug(`Lint finished with ${warnings.length} warning(s) from ${this.registered.length} pass(es)`);
    return warnings.length;
  }
}
