import { DYN_VAR_SPACE_SEPARATOR, DYN_VAR_WRITER_PREFIX, LITERAL_NODE_NAMES } from '../../constants.js';
import { findInput } from '../../registry/node-spec.js';
import type { TLintPass, TLintWarning } from '../types.js';

const PASS_NAME = 'dyn-var-naming';
const NAME_INPUT = 'name';

/**
 * Dynamic variable writers should name their variable as `space/name`.
 *
 * Only literal names (a StringInput bound straight to the name input) are
 * checked; computed names can't be known while building.
 */
export const dynVarNamingPass: TLintPass = {
  name: PASS_NAME,
  description: 'Dynamic variable writers need a literal name that includes a variable space',
  run(nodes) {
    const warnings: TLintWarning[] = [];

    for (const node of nodes) {
      if (!node.name.startsWith(DYN_VAR_WRITER_PREFIX) || !findInput(node.spec, NAME_INPUT)) {
        continue;
      }

      const [source] = node.boundTo(NAME_INPUT);
      if (!source) {
        warnings.push({
          pass: PASS_NAME,
          code: 'DYN_VAR_NAME_UNBOUND',
          message: `Node ${node.label} has no name input connected.`,
          node: node.id,
        });
        continue;
      }

      if (source.node.name !== LITERAL_NODE_NAMES.STRING) continue;

      const varName = source.node.getContent();
      if (varName === undefined || varName === '') {
        warnings.push({
          pass: PASS_NAME,
          code: 'DYN_VAR_NAME_EMPTY',
          message: `Name input for ${node.label} is empty.`,
          node: node.id,
        });
        continue;
      }

      if (!String(varName).includes(DYN_VAR_SPACE_SEPARATOR)) {
        warnings.push({
          pass: PASS_NAME,
          code: 'DYN_VAR_NAME_UNSCOPED',
          message:
            `Name "${String(varName)}" for ${node.label} does not include a variable space ` +
            `("space${DYN_VAR_SPACE_SEPARATOR}name"). Consider adding a space.`,
          node: node.id,
        });
      }
    }

    return warnings;
  },
};
