import { isList } from '../../datatypes.js';
import type { TLintPass, TLintWarning } from '../types.js';

const PASS_NAME = 'unbound-input';

/**
 * Scalar inputs left unbound fall back to the host's default value, which is
 * rarely what a generated program means.
 */
export const unboundInputPass: TLintPass = {
  name: PASS_NAME,
  description: 'Scalar inputs should be bound',
  run(nodes) {
    const warnings: TLintWarning[] = [];

    for (const node of nodes) {
      for (const input of node.spec.inputs) {
        if (isList(input.datatype) || node.boundTo(input.name).length > 0) continue;
        warnings.push({
          pass: PASS_NAME,
          code: 'UNBOUND_INPUT',
          message: `Input ${input.name} (${input.datatype}) of node ${node.label} is not connected.`,
          node: node.id,
        });
      }
    }

    return warnings;
  },
};
