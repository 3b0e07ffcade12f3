import type { TLogger } from '../../logger.js';
import { LintEngine } from '../engine.js';
import type { TLintPass } from '../types.js';
import { dynVarNamingPass } from './dyn-var-naming.js';
import { unboundInputPass } from './unbound-input.js';

export { dynVarNamingPass } from './dyn-var-naming.js';
export { unboundInputPass } from './unbound-input.js';

/** Builtin passes in the order they run */
export const builtinLintPasses: readonly TLintPass[] = [dynVarNamingPass, unboundInputPass];

export type TCreateLintEngineOptions = {
  /** Names of builtin passes to leave out */
  disabled?: readonly string[];
  logger?: TLogger;
};

/** A new engine with every builtin pass that isn't disabled */
export function createLintEngine(options: TCreateLintEngineOptions = {}): LintEngine {
  const disabled = new Set(options.disabled ?? []);
  const passes = builtinLintPasses.filter((pass) => !disabled.has(pass.name));
  return new LintEngine(passes, { logger: options.logger });
}
