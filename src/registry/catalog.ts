/**
 * Node catalog loading
 *
 * Node specs live in JSON catalogs. The builtin catalog ships at
 * `catalog/node-specs.json`; projects can layer an extra catalog over it
 * through the `catalog` config key.
 */

import * as fs from 'node:fs';
import { z } from 'zod';
import { DATATYPES } from '../datatypes.js';
import { getErrorMessage, GraphBuildError } from '../errors.js';
import { NodeSpecBuilder, type TNodeSpec } from './node-spec.js';
import { NodeSpecRegistry } from './registry.js';

const BUILTIN_CATALOG_URL = new URL('../../catalog/node-specs.json', import.meta.url);

const datatypeSchema = z.enum(DATATYPES);

const portSchema = z.object({
  name: z.string().min(1),
  type: datatypeSchema,
});

const nodeSpecSchema = z.object({
  name: z.string().min(1),
  inputs: z.array(portSchema).default([]),
  outputs: z.array(portSchema).default([]),
  content: datatypeSchema.optional(),
});

export const catalogSchema = z.object({
  nodes: z.array(nodeSpecSchema),
});

export type TCatalog = z.input<typeof catalogSchema>;

function toNodeSpec(entry: z.output<typeof nodeSpecSchema>): TNodeSpec {
  const builder = new NodeSpecBuilder(entry.name);
  entry.inputs.forEach((port) => builder.input(port.name, port.type));
  entry.outputs.forEach((port) => builder.output(port.name, port.type));
  if (entry.content) {
    builder.content(entry.content);
  }
  return builder.build();
}

/**
 * Build a registry from parsed catalog JSON.
 * @throws GraphBuildError INVALID_CATALOG when the data doesn't match the catalog schema
 */
export function registryFromCatalog(data: unknown, source = 'catalog'): NodeSpecRegistry {
  const result = catalogSchema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ');
    throw new GraphBuildError('INVALID_CATALOG', `Invalid node catalog ${source}: ${issues}`);
  }
  return new NodeSpecRegistry(result.data.nodes.map(toNodeSpec));
}

/**
 * Read and validate a catalog file.
 * @throws GraphBuildError INVALID_CATALOG, with the read failure as `cause` when the file can't be read
 */
export function loadCatalogFile(filePath: string | URL): NodeSpecRegistry {
  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf8');
  } catch (error) {
    throw new GraphBuildError(
      'INVALID_CATALOG',
      `Cannot read node catalog ${String(filePath)}: ${getErrorMessage(error)}`,
      {},
      { cause: error }
    );
  }
  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    throw new GraphBuildError('INVALID_CATALOG', `Node catalog ${String(filePath)} is not valid JSON.`, {
      actual: getErrorMessage(error),
    });
  }
  return registryFromCatalog(data, String(filePath));
}

/** Registry holding the node types shipped with the package */
export function loadBuiltinRegistry(): NodeSpecRegistry {
  return loadCatalogFile(BUILTIN_CATALOG_URL);
}
