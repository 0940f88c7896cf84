/**
 * Simulation Package Logger
 */

import { createLogger } from '@cloverrun/utils';

export const logger = createLogger('@cloverrun/simulation');
