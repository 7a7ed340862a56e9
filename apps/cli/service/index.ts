import * as fs from "node:fs";
import debug from "debug";

/**
 * Make the file system promises available to the service helpers.
 */
export const fsp = fs.promises;

/**
 * Loggers for the CLI.
 */
export const logger = debug("edne:cli");
export const error = debug("error");
