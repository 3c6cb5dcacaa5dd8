/** Node graph validation -- reference resolution plus topological sort via Kahn's algorithm. */

import { isNodeRef, type NodeGraph } from '../models/comfy.js';

export class GraphValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'GraphValidationError';
  }
}

/** Map of node name -> names of the nodes it reads from. */
export function nodeDependencies(graph: NodeGraph): Map<string, Set<string>> {
  const deps = new Map<string, Set<string>>();
  for (const [name, node] of Object.entries(graph)) {
    const set = new Set<string>();
    for (const [input, value] of Object.entries(node.inputs)) {
      if (!isNodeRef(value)) continue;
      const [target, slot] = value;
      if (!Object.hasOwn(graph, target)) {
        throw new GraphValidationError(`Node "${name}" input "${input}" references unknown node "${target}"`);
      }
      if (!Number.isInteger(slot) || slot < 0) {
        throw new GraphValidationError(`Node "${name}" input "${input}" has invalid output slot ${slot}`);
      }
      set.add(target);
    }
    deps.set(name, set);
  }
  return deps;
}

/**
 * Validate a node graph and return its node names in dependency order.
 * Throws GraphValidationError on dangling references or cycles.
 */
export function validateNodeGraph(graph: NodeGraph): string[] {
  const deps = nodeDependencies(graph);
  const inDegree = new Map<string, number>();
  const dependents = new Map<string, string[]>();

  for (const [node, nodeDeps] of deps) {
    inDegree.set(node, nodeDeps.size);
    for (const dep of nodeDeps) {
      const list = dependents.get(dep) ?? [];
      list.push(node);
      dependents.set(dep, list);
    }
  }

  const queue: string[] = [];
  for (const [node, deg] of inDegree) {
    if (deg === 0) queue.push(node);
  }

  const result: string[] = [];
  for (let i = 0; i < queue.length; i++) {
    const node = queue[i];
    result.push(node);
    for (const next of dependents.get(node) ?? []) {
      const deg = (inDegree.get(next) ?? 1) - 1;
      inDegree.set(next, deg);
      if (deg === 0) queue.push(next);
    }
  }

  if (result.length !== inDegree.size) {
    const stuck = [...inDegree].filter(([, deg]) => deg > 0).map(([node]) => node);
    throw new GraphValidationError(`Circular references between nodes: ${stuck.join(', ')}`);
  }

  return result;
}
