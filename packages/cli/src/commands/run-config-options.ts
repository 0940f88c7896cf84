import type { Command } from 'commander';

/**
 * Deck override flags shared by `simulation run` and `deck generate`
 */
export function addRunConfigOverrideOptions(cmd: Command): Command {
  return cmd
    .option('--density1 <value>', 'State 1 density')
    .option('--energy1 <value>', 'State 1 energy')
    .option('--density2 <value>', 'State 2 density')
    .option('--energy2 <value>', 'State 2 energy')
    .option('--state2-xmin <value>', 'State 2 rectangle xmin')
    .option('--state2-xmax <value>', 'State 2 rectangle xmax')
    .option('--state2-ymin <value>', 'State 2 rectangle ymin')
    .option('--state2-ymax <value>', 'State 2 rectangle ymax')
    .option('--xmin <value>', 'Domain xmin')
    .option('--xmax <value>', 'Domain xmax')
    .option('--ymin <value>', 'Domain ymin')
    .option('--ymax <value>', 'Domain ymax')
    .option('--initial-timestep <value>', 'Initial timestep')
    .option('--timestep-rise <value>', 'Timestep rise factor')
    .option('--max-timestep <value>', 'Maximum timestep')
    .option('--test-problem <n>', 'Test problem number');
}
