/**
 * Version constants shared by discovery, the root endpoint and the CLI.
 */

export const OMP_VERSION = '0.1';
export const PACKAGE_VERSION = '0.1.0';
