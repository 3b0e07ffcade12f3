import { GraphBuildError } from '../errors.js';
import { findClosestMatches, didYouMean } from '../utils/string-distance.js';
import type { TNodeSpec } from './node-spec.js';

/**
 * Read-only lookup from node type name to its spec.
 *
 * A graph consults the registry once per node creation and never mutates it.
 * `register` exists for assembling a registry before a session starts.
 */
export class NodeSpecRegistry {
  private readonly specsByName = new Map<string, TNodeSpec>();

  constructor(specs: Iterable<TNodeSpec> = []) {
    for (const spec of specs) {
      this.register(spec);
    }
  }

  /** Adds a spec, replacing any spec already registered under the same name */
  register(spec: TNodeSpec): this {
    this.specsByName.set(spec.name, spec);
    return this;
  }

  has(name: string): boolean {
    return this.specsByName.has(name);
  }

  names(): string[] {
    return [...this.specsByName.keys()];
  }

  specs(): TNodeSpec[] {
    return [...this.specsByName.values()];
  }

  /**
   * @throws GraphBuildError UNKNOWN_NODE_TYPE when no spec has this name
   */
  specOf(name: string): TNodeSpec {
    const spec = this.specsByName.get(name);
    if (!spec) {
      const known = this.names();
      throw new GraphBuildError(
        'UNKNOWN_NODE_TYPE',
        `Unknown node type "${name}".${didYouMean(name, known)}`,
        { nodeType: name, suggestions: findClosestMatches(name, known) }
      );
    }
    return spec;
  }

  /** A new registry with the other registry's specs layered over this one */
  merge(other: NodeSpecRegistry): NodeSpecRegistry {
    return new NodeSpecRegistry([...this.specs(), ...other.specs()]);
  }
}
