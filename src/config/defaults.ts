import type { FluxgenConfig } from './types.js';

export const DEFAULT_CONFIG: FluxgenConfig = {
  lint: {
    disabled: [],
  },
};

export function getDefaultConfig(): FluxgenConfig {
  return {
    ...DEFAULT_CONFIG,
    lint: { disabled: [...DEFAULT_CONFIG.lint.disabled] },
  };
}
