import type { RunConfig } from '@cloverrun/core';

/**
 * One flat row per deck, in deck order, for table and CSV output
 */
export function flattenRunConfig(config: RunConfig): Record<string, number | string> {
  return {
    density1: config.state1.density,
    energy1: config.state1.energy,
    density2: config.state2.density,
    energy2: config.state2.energy,
    geometry: config.state2.geometry,
    state2Xmin: config.state2.xmin,
    state2Xmax: config.state2.xmax,
    state2Ymin: config.state2.ymin,
    state2Ymax: config.state2.ymax,
    cells: config.cells,
    xmin: config.domain.xmin,
    ymin: config.domain.ymin,
    xmax: config.domain.xmax,
    ymax: config.domain.ymax,
    initialTimestep: config.timestep.initial,
    timestepRise: config.timestep.rise,
    maxTimestep: config.timestep.max,
    steps: config.steps,
    testProblem: config.testProblem,
    visitFrequency: config.visitFrequency,
  };
}
