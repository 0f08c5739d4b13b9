/**
 * Graph utilities
 */

export {
  buildAdjacencyList,
  detectCycle,
  getTopologicalOrder,
  computeDepths,
  type Adjacency,
} from "./cycle-detection.js";
