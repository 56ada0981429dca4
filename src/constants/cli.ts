/**
 * CLI constants — exit codes
 */

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_CONFIG_ERROR = 2;
