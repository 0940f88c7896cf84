/**
 * File names the simulation binary reads and writes in its working
 * directory. These are part of the binary's external contract.
 */

export interface SimulationFileNames {
  /** Input deck the binary discovers by name */
  deck: string;
  /** Log the completion marker is written to */
  log: string;
  /** Index file referencing every snapshot of a run */
  manifest: string;
  /** Extension of snapshot files, including the dot */
  snapshotExtension: string;
}

export const SIMULATION_FILES: SimulationFileNames = {
  deck: 'clover.in',
  log: 'clover.out',
  manifest: 'clover.visit',
  snapshotExtension: '.vtk',
};

/**
 * Literal the binary writes to its log once a run has finished. Matched
 * verbatim.
 */
export const COMPLETION_MARKER = 'Calculation complete';
