// Circuit statistics: level assignment and size summaries

import type { Circuit } from './circuit.js';
import type { Gate } from './gate.js';

export interface CircuitStats {
  totalGates: number;
  inputGates: number;
  outputGates: number;
  interiorGates: number;
  depth: number;
  gatesPerLevel: number[];
  avgFanout: number;
}

/**
 * Assign each gate a level: gates without inputs are level 0, every other
 * gate sits one level above its deepest input.
 */
export function levelize(circuit: Circuit): Gate[][] {
  const levelOf = new Map<Gate, number>();
  const levels: Gate[][] = [];

  for (const g of circuit.gates) {
    let level = 0;
    for (const ig of g.inputs) {
      const inputLevel = levelOf.get(ig);
      if (inputLevel === undefined) {
        throw new Error(`Gate at position ${g.position} precedes its input at ${ig.position}`);
      }
      level = Math.max(level, inputLevel + 1);
    }
    levelOf.set(g, level);

    while (levels.length <= level) {
      levels.push([]);
    }
    levels[level].push(g);
  }

  return levels;
}

export function getStats(circuit: Circuit): CircuitStats {
  const inputGates = circuit.count((g) => g.isInput);
  const outputGates = circuit.count((g) => g.isOutput);

  let totalFanout = 0;
  let drivers = 0;
  for (const g of circuit.gates) {
    if (g.outputs.length > 0) {
      totalFanout += g.outputs.length;
      drivers++;
    }
  }

  return {
    totalGates: circuit.gates.length,
    inputGates,
    outputGates,
    interiorGates: circuit.gates.length - inputGates - outputGates,
    depth: circuit.depth(),
    gatesPerLevel: levelize(circuit).map((level) => level.length),
    avgFanout: drivers > 0 ? totalFanout / drivers : 0,
  };
}
