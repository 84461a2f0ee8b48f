/**
 * Simulation Package Logger
 * =========================
 * Centralized logger for the simulation package with namespace '@xolrisk/simulation'
 */

import { createPackageLogger } from '@xolrisk/utils';

export const logger = createPackageLogger('@xolrisk/simulation');
