/**
 * Configuration types for a construction session
 */

export interface FluxgenConfig {
  /** Extra node catalog layered over the builtin one (path to a JSON file) */
  catalog?: string;

  /** Lint configuration */
  lint: LintConfig;
}

export interface LintConfig {
  /** Names of lint passes to skip */
  disabled: string[];
}

/** Config as read from a file or the environment; every key optional */
export interface PartialFluxgenConfig {
  catalog?: string;
  lint?: Partial<LintConfig>;
}
